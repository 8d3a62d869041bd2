import { z } from "zod/v4";
import { ConfigError } from "@/lib/errors";
import type { FilterConfiguration } from "@/analysis/types";

const CLOCK_TIME = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

const clockTime = z.string().regex(CLOCK_TIME, "Expected HH:MM or HH:MM:SS");

export const riskLevelSchema = z.enum(["HIGH", "MEDIUM", "LOW"]);

export const anomalyTypeSchema = z.enum([
  "GEOGRAPHIC_ANOMALY",
  "TIME_ANOMALY",
  "ACCESS_PATTERN_ANOMALY",
  "FAILED_AUTHENTICATION",
  "PRIVILEGE_ESCALATION",
  "GENERAL_ANOMALY",
]);

export const timeFilterSchema = z
  .object({
    type: z.enum([
      "NONE",
      "BUSINESS_HOURS_ONLY",
      "OUTSIDE_BUSINESS_HOURS",
      "WEEKENDS_ONLY",
      "CUSTOM_RANGE",
    ]),
    startTime: clockTime.optional(),
    endTime: clockTime.optional(),
  })
  .refine((f) => f.type !== "CUSTOM_RANGE" || (f.startTime !== undefined && f.endTime !== undefined), {
    message: "CUSTOM_RANGE requires startTime and endTime",
    path: ["startTime"],
  });

export const filterConfigurationSchema = z.object({
  riskLevels: z.array(riskLevelSchema).optional(),
  anomalyTypes: z.array(anomalyTypeSchema).optional(),
  excludedCountries: z.array(z.string().min(1)).optional(),
  timeFilter: timeFilterSchema.optional(),
  ipPatterns: z.array(z.enum(["FIRST_TIME", "FREQUENT", "SINGLE_USE", "CROSS_COUNTRY"])).optional(),
});

/** Format zod issues as "path: message" strings. */
export function describeIssues(
  issues: ReadonlyArray<{ path: readonly PropertyKey[]; message: string }>
): string[] {
  return issues.map((issue) => {
    const path = issue.path.map(String).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseFilterConfiguration(input: unknown, source = "filter configuration"): FilterConfiguration {
  const result = filterConfigurationSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(source, describeIssues(result.error.issues));
  }
  return result.data;
}
