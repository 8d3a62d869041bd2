import type { AnomalyType, AuditEvent, Baseline } from "@/analysis/types";
import { hourOf, isWeekend } from "../utils";
import { isAnomalousIp } from "./anomalous-ip";

interface AnomalyPattern {
  type: AnomalyType;
  description: string;
  matches: (event: AuditEvent, baseline: Baseline) => boolean;
}

const EXPECTED_COUNTRIES: ReadonlySet<string> = new Set(["US", "Local"]);

const ACCESS_PATTERN_OPERATIONS: ReadonlySet<string> = new Set(["SoftDelete", "MoveToDeletedItems", "PasswordReset"]);

const FAILED_AUTH_MARKERS = ["Failed", "Denied"];
const ESCALATION_MARKERS = ["Admin", "Elevate", "Grant"];

export const ANOMALY_PATTERNS: AnomalyPattern[] = [
  {
    type: "GEOGRAPHIC_ANOMALY",
    description: "Access from outside the United States from an address that deviates from the baseline location",
    matches: (event, baseline) => !EXPECTED_COUNTRIES.has(event.geo.country) && isAnomalousIp(event, baseline),
  },
  {
    type: "TIME_ANOMALY",
    description: "Activity between 23:00 and 05:59, or on a weekend",
    matches: (event) => {
      if (!event.timestamp) return false;
      const hour = hourOf(event.timestamp);
      return hour < 6 || hour > 22 || isWeekend(event.timestamp);
    },
  },
  {
    type: "ACCESS_PATTERN_ANOMALY",
    description: "Deletion or password reset",
    matches: (event) => ACCESS_PATTERN_OPERATIONS.has(event.operation),
  },
  {
    type: "FAILED_AUTHENTICATION",
    description: "Operation name reports a failed or denied action",
    matches: (event) => FAILED_AUTH_MARKERS.some((marker) => event.operation.includes(marker)),
  },
  {
    type: "PRIVILEGE_ESCALATION",
    description: "Operation name refers to admin roles, elevation or grants",
    matches: (event) => ESCALATION_MARKERS.some((marker) => event.operation.includes(marker)),
  },
];

/**
 * Every label whose pattern matches, in pattern order; GENERAL_ANOMALY when
 * none does.
 */
export function classifyAnomalyTypes(event: AuditEvent, baseline: Baseline): AnomalyType[] {
  const types = ANOMALY_PATTERNS.filter((pattern) => pattern.matches(event, baseline)).map(
    (pattern) => pattern.type
  );
  return types.length > 0 ? types : ["GENERAL_ANOMALY"];
}
