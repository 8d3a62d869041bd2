import { readFileSync } from "fs";
import { baselineFromConfig, geoProviderSchema, loadAnalyzerConfig, parseAnalyzerConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";
import { parseFilterConfiguration } from "@/lib/validations/filters";
import { applyFilters } from "@/analysis/filter-engine";
import { runAnalysisPipeline } from "@/analysis/pipeline";
import type { AnalysisPipelineResult, AnnotatedEvent, FilterConfiguration } from "@/analysis/types";

export interface AnalyzeCommandOptions {
  config?: string;
  filter?: string;
  provider?: string;
  summary?: boolean;
}

export interface AnalyzeCommandOutput {
  file: string;
  warning: string | null;
  parseErrors: number;
  stats: AnalysisPipelineResult["stats"];
  frequencyOutliers: string[];
  ipSummary?: AnalysisPipelineResult["ipSummary"];
  compromisedEvents?: AnnotatedEvent[];
  events?: AnnotatedEvent[];
  filter?: FilterConfiguration;
}

function readJsonFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(path, [error instanceof Error ? error.message : String(error)]);
  }
}

/**
 * Run the pipeline on one file and shape the result for printing. With a
 * filter file, `events` holds the filtered subset instead of the timeline.
 */
export async function runAnalyzeCommand(
  file: string,
  options: AnalyzeCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<AnalyzeCommandOutput> {
  let config = loadAnalyzerConfig(options.config, env);
  if (options.provider) {
    const provider = geoProviderSchema.safeParse(options.provider);
    if (!provider.success) {
      throw new ConfigError("--provider", [`expected one of ${geoProviderSchema.options.join(", ")}`]);
    }
    config = parseAnalyzerConfig({ ...config, geolocation: { ...config.geolocation, provider: provider.data } }, {});
  }

  const filter = options.filter ? parseFilterConfiguration(readJsonFile(options.filter), options.filter) : undefined;

  const result = await runAnalysisPipeline(file, {
    config,
    onProgress: (stage, percent) => console.error(`[Pipeline] ${stage} (${percent}%)`),
  });

  const output: AnalyzeCommandOutput = {
    file,
    warning: result.warning,
    parseErrors: result.parseErrors,
    stats: result.stats,
    frequencyOutliers: result.frequencyOutliers,
  };
  if (options.summary) return output;

  output.ipSummary = result.ipSummary;
  output.compromisedEvents = result.compromisedEvents;
  if (filter) {
    output.filter = filter;
    output.events = applyFilters(result.events, filter, baselineFromConfig(config));
  } else {
    output.events = result.events;
  }
  return output;
}

/**
 * JSON replacer that prints timestamps as the naive wall clock they are
 * ("2024-01-01T09:00:00.000"), without a UTC designator.
 */
export function naiveDateReplacer(this: unknown, key: string, value: unknown): unknown {
  if (typeof value === "string" && /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/.test(value)) {
    return value.slice(0, -1);
  }
  return value;
}
