import type { AuditEvent, RiskLevel } from "@/analysis/types";
import { UNKNOWN } from "@/lib/constants";
import { hourOf, isWeekend } from "../utils";

/** Unresolved locations and high-risk jurisdictions */
export const HIGH_RISK_COUNTRIES: ReadonlySet<string> = new Set([UNKNOWN, "CN", "RU", "KP", "IR"]);

/** Countries whose traffic is routine for the tenant */
export const TRUSTED_COUNTRIES: ReadonlySet<string> = new Set(["US", "CA", "GB", "DE", "FR", "AU", "JP"]);

export const LOCAL_COUNTRY = "Local";

export const HIGH_RISK_OPERATIONS: ReadonlySet<string> = new Set([
  "SoftDelete",
  "MoveToDeletedItems",
  "UserLoginFailed",
  "PasswordReset",
]);

export const ELEVATED_RISK_OPERATIONS: ReadonlySet<string> = new Set(["FileAccessed", "FileModified", "UserLogin"]);

export const BUSINESS_DAY_START_HOUR = 8;
export const BUSINESS_DAY_END_HOUR = 18;

export const HIGH_RISK_THRESHOLD = 5;
export const MEDIUM_RISK_THRESHOLD = 2;

export interface RiskBreakdown {
  geography: number;
  operation: number;
  time: number;
  total: number;
}

function geographyScore(country: string): number {
  if (country === LOCAL_COUNTRY) return 0;
  if (HIGH_RISK_COUNTRIES.has(country)) return 3;
  if (!TRUSTED_COUNTRIES.has(country)) return 2;
  return 0;
}

function operationScore(operation: string): number {
  if (HIGH_RISK_OPERATIONS.has(operation)) return 3;
  if (ELEVATED_RISK_OPERATIONS.has(operation)) return 1;
  return 0;
}

function timeScore(timestamp: Date | null): number {
  if (!timestamp) return 0;
  const hour = hourOf(timestamp);
  let score = 0;
  if (hour < BUSINESS_DAY_START_HOUR || hour > BUSINESS_DAY_END_HOUR) score += 1;
  if (isWeekend(timestamp)) score += 1;
  return score;
}

/**
 * Additive risk score over geography, operation and time of access.
 * Events without a timestamp get no time component.
 */
export function computeRiskScore(event: AuditEvent): RiskBreakdown {
  const geography = geographyScore(event.geo.country);
  const operation = operationScore(event.operation);
  const time = timeScore(event.timestamp);
  return { geography, operation, time, total: geography + operation + time };
}

export function riskLevelForScore(score: number): RiskLevel {
  if (score >= HIGH_RISK_THRESHOLD) return "HIGH";
  if (score >= MEDIUM_RISK_THRESHOLD) return "MEDIUM";
  return "LOW";
}

export function assessRiskLevel(event: AuditEvent): RiskLevel {
  return riskLevelForScore(computeRiskScore(event).total);
}
