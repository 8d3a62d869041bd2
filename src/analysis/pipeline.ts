import { type AnalyzerConfig, baselineFromConfig, referenceGeoFromConfig } from "@/lib/config";
import type { AnalysisPipelineResult, AnalysisStage, Baseline, LogTable } from "./types";
import { filterFilesAccessed } from "./filter-engine";
import { CachingGeoResolver } from "./geo/resolver";
import { createLookupSource, type GeoLookupSource } from "./geo/sources";
import { detectInputFormat, readTabularFile } from "./log-parser";
import { normalizeLogTable, parseErrorWarning } from "./normalizer";
import { annotateEvents, detectCompromisedEvents, filterAnomalousIpEvents } from "./rule-engine";
import { buildIpSummary, buildTimelineStats, findFrequencyOutliers } from "./summary";

export type AnalysisProgressCallback = (stage: AnalysisStage, percent: number) => void;

export interface AnalysisPipelineOptions {
  config: AnalyzerConfig;
  /** Overrides the source built from `config.geolocation`; the caller keeps ownership */
  source?: GeoLookupSource;
  onProgress?: AnalysisProgressCallback;
}

/**
 * Main analysis pipeline.
 *
 * read → normalize (geolocating every distinct IP once, with a cache that
 * lives only for this call) → annotate risk and anomaly labels → derive the
 * compromised / anomalous / file-access views and the summaries.
 *
 * Fatal: unsupported file type, missing required columns.
 * Non-fatal: rows with bad AuditData (counted, see `warning`), failed lookups
 * (resolved as Unknown).
 */
export async function runAnalysisPipeline(
  filePath: string,
  options: AnalysisPipelineOptions
): Promise<AnalysisPipelineResult> {
  // Reject unknown extensions before touching the file
  detectInputFormat(filePath);

  options.onProgress?.("reading", 10);
  const table = await readTabularFile(filePath);

  return analyzeLogTable(table, options);
}

/**
 * Same as runAnalysisPipeline for rows already in memory.
 */
export async function analyzeLogTable(
  table: LogTable,
  options: AnalysisPipelineOptions
): Promise<AnalysisPipelineResult> {
  const { config, onProgress } = options;
  const baseline = baselineFromConfig(config);
  const referenceGeo = referenceGeoFromConfig(config);

  const ownsSource = !options.source;
  const source = options.source ?? createLookupSource(config.geolocation);

  try {
    const resolver = new CachingGeoResolver({
      source,
      reference: config.referenceIp && referenceGeo ? { ip: config.referenceIp.ip, geo: referenceGeo } : null,
      knownIps: config.knownIps,
    });

    onProgress?.("geolocating", 50);
    const { events, parseErrors } = await normalizeLogTable(table, resolver);

    if (parseErrors > 0) {
      console.warn(`[Pipeline] ${parseErrors} of ${table.rows.length} rows skipped due to invalid AuditData`);
    }

    onProgress?.("analyzing", 80);
    const result = summarize(annotateEvents(events, baseline), baseline, parseErrors);

    onProgress?.("complete", 100);
    return result;
  } finally {
    if (ownsSource) source.close?.();
  }
}

function summarize(
  events: AnalysisPipelineResult["events"],
  baseline: Baseline,
  parseErrors: number
): AnalysisPipelineResult {
  const compromisedEvents = detectCompromisedEvents(events, baseline);
  const anomalousIpEvents = filterAnomalousIpEvents(events, baseline);
  const filesAccessed = filterFilesAccessed(events);

  return {
    events,
    compromisedEvents,
    anomalousIpEvents,
    filesAccessed,
    stats: buildTimelineStats(events, {
      compromised: compromisedEvents.length,
      filesAccessed: filesAccessed.length,
      anomalousIpEvents: anomalousIpEvents.length,
    }),
    ipSummary: buildIpSummary(events, baseline),
    frequencyOutliers: findFrequencyOutliers(events),
    parseErrors,
    warning: parseErrorWarning(parseErrors),
  };
}
