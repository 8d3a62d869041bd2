import type { AuditEvent, Baseline } from "@/analysis/types";

/**
 * An IP is anomalous when its resolved location is not exactly the
 * analyst's baseline country and region. The reference IP is exempt no
 * matter what it resolved to. Unresolved ("Unknown") addresses are anomalous.
 */
export function isAnomalousIp(event: AuditEvent, baseline: Baseline): boolean {
  if (baseline.referenceIp !== null && event.clientIp === baseline.referenceIp) {
    return false;
  }
  return event.geo.country !== baseline.country || event.geo.region !== baseline.region;
}

export function filterAnomalousIpEvents<T extends AuditEvent>(events: readonly T[], baseline: Baseline): T[] {
  return events.filter((event) => isAnomalousIp(event, baseline));
}
