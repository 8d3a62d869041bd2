import type { AnnotatedEvent, AuditEvent, Baseline } from "@/analysis/types";
import { classifyAnomalyTypes } from "./rules/anomaly-types";
import { assessRiskLevel } from "./rules/risk-score";

export { isAnomalousIp, filterAnomalousIpEvents } from "./rules/anomalous-ip";
export {
  buildUserIpIndex,
  isSuspiciousActivity,
  isCompromised,
  detectCompromisedEvents,
  type UserIpIndex,
} from "./rules/compromise";
export { computeRiskScore, riskLevelForScore, assessRiskLevel, type RiskBreakdown } from "./rules/risk-score";
export { classifyAnomalyTypes, ANOMALY_PATTERNS } from "./rules/anomaly-types";

/**
 * Attach risk level and anomaly labels. Both are recomputed from the base
 * event fields, so annotating an already annotated event gives the same result.
 */
export function annotateEvent<T extends AuditEvent>(event: T, baseline: Baseline): T & AnnotatedEvent {
  const annotated = {
    ...event,
    riskLevel: assessRiskLevel(event),
    anomalyTypes: Object.freeze(classifyAnomalyTypes(event, baseline)),
  };
  Object.freeze(annotated);
  return annotated;
}

export function annotateEvents<T extends AuditEvent>(events: readonly T[], baseline: Baseline): (T & AnnotatedEvent)[] {
  return events.map((event) => annotateEvent(event, baseline));
}
