import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod/v4";
import {
  DEFAULT_BASELINE_COUNTRY,
  DEFAULT_BASELINE_REGION,
  IP_API_ENDPOINT,
  IP_API_REQUESTS_PER_MINUTE,
  UNKNOWN,
} from "@/lib/constants";
import { ConfigError } from "@/lib/errors";
import { describeIssues } from "@/lib/validations/filters";
import type { Baseline, GeoRecord } from "@/analysis/types";

export const DEFAULT_CONFIG_FILE = "analyzer.config.json";

const geoRecordSchema = z.object({
  country: z.string().min(1),
  region: z.string().min(1),
  city: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const geoProviderSchema = z.enum(["ip-api", "geoip-lite", "none"]);
export type GeoProvider = z.infer<typeof geoProviderSchema>;

export const analyzerConfigSchema = z.object({
  baseline: z
    .object({
      country: z.string().min(1).default(DEFAULT_BASELINE_COUNTRY),
      region: z.string().min(1).default(DEFAULT_BASELINE_REGION),
    })
    .default({ country: DEFAULT_BASELINE_COUNTRY, region: DEFAULT_BASELINE_REGION }),
  referenceIp: z
    .object({
      ip: z.string().min(1),
      geo: geoRecordSchema.optional(),
    })
    .nullable()
    .default(null),
  knownIps: z.record(z.string(), geoRecordSchema).default({}),
  geolocation: z
    .object({
      provider: geoProviderSchema.default("ip-api"),
      endpoint: z.url().default(IP_API_ENDPOINT),
      requestsPerMinute: z.number().int().positive().default(IP_API_REQUESTS_PER_MINUTE),
    })
    .default({
      provider: "ip-api",
      endpoint: IP_API_ENDPOINT,
      requestsPerMinute: IP_API_REQUESTS_PER_MINUTE,
    }),
});

export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema>;
export type GeolocationConfig = AnalyzerConfig["geolocation"];

/**
 * Parse and validate a raw config object, then apply environment overrides.
 * Environment variables win over file values.
 */
export function parseAnalyzerConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  source = "analyzer config"
): AnalyzerConfig {
  const merged = applyEnvOverrides(raw ?? {}, env);
  const result = analyzerConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(source, describeIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Load the analyzer config from `configPath`, or from analyzer.config.json in
 * the working directory when it exists. Missing default file means defaults.
 */
export function loadAnalyzerConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): AnalyzerConfig {
  const path = resolve(configPath ?? DEFAULT_CONFIG_FILE);
  if (!configPath && !existsSync(path)) {
    return parseAnalyzerConfig({}, env, "environment");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(path, [error instanceof Error ? error.message : String(error)]);
  }
  return parseAnalyzerConfig(raw, env, path);
}

function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw;

  const baseline: Record<string, unknown> = isRecord(raw.baseline) ? { ...raw.baseline } : {};
  if (env.BASELINE_COUNTRY) baseline.country = env.BASELINE_COUNTRY;
  if (env.BASELINE_REGION) baseline.region = env.BASELINE_REGION;

  const geolocation: Record<string, unknown> = isRecord(raw.geolocation) ? { ...raw.geolocation } : {};
  if (env.GEO_PROVIDER) geolocation.provider = env.GEO_PROVIDER;
  if (env.GEO_ENDPOINT) geolocation.endpoint = env.GEO_ENDPOINT;

  let referenceIp = raw.referenceIp;
  if (env.REFERENCE_IP) {
    // Keep a configured static location only when it belongs to the same address
    const geo = isRecord(referenceIp) && referenceIp.ip === env.REFERENCE_IP ? referenceIp.geo : undefined;
    referenceIp = { ip: env.REFERENCE_IP, geo };
  }

  return { ...raw, baseline, geolocation, referenceIp };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function baselineFromConfig(config: AnalyzerConfig): Baseline {
  return {
    country: config.baseline.country,
    region: config.baseline.region,
    referenceIp: config.referenceIp?.ip ?? null,
  };
}

/**
 * The reference address is the analyst's own location: without an explicit
 * geo it resolves to the baseline country and region.
 */
export function referenceGeoFromConfig(config: AnalyzerConfig): GeoRecord | null {
  if (!config.referenceIp) return null;
  return (
    config.referenceIp.geo ?? {
      country: config.baseline.country,
      region: config.baseline.region,
      city: UNKNOWN,
      latitude: 0,
      longitude: 0,
    }
  );
}
