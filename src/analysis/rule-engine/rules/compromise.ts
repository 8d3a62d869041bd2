import type { AuditEvent, Baseline } from "@/analysis/types";
import { isAnomalousIp } from "./anomalous-ip";

/** Operations that destroy mailbox or file content */
export const DESTRUCTIVE_OPERATIONS: ReadonlySet<string> = new Set(["SoftDelete", "MoveToDeletedItems"]);

/** A user seen from more than this many distinct IPs is suspicious */
export const MAX_DISTINCT_IPS_PER_USER = 3;

/** Distinct client IPs per user over the whole batch. */
export type UserIpIndex = ReadonlyMap<string, ReadonlySet<string>>;

export function buildUserIpIndex(events: readonly AuditEvent[]): UserIpIndex {
  const index = new Map<string, Set<string>>();
  for (const event of events) {
    let ips = index.get(event.userId);
    if (!ips) {
      ips = new Set();
      index.set(event.userId, ips);
    }
    ips.add(event.clientIp);
  }
  return index;
}

export function isSuspiciousActivity(event: AuditEvent, userIps: UserIpIndex): boolean {
  if (DESTRUCTIVE_OPERATIONS.has(event.operation)) return true;
  return (userIps.get(event.userId)?.size ?? 0) > MAX_DISTINCT_IPS_PER_USER;
}

/**
 * Suspicious activity from an anomalous IP. `userIps` must be built from the
 * full batch the event belongs to.
 */
export function isCompromised(event: AuditEvent, userIps: UserIpIndex, baseline: Baseline): boolean {
  return isSuspiciousActivity(event, userIps) && isAnomalousIp(event, baseline);
}

export function detectCompromisedEvents<T extends AuditEvent>(events: readonly T[], baseline: Baseline): T[] {
  const userIps = buildUserIpIndex(events);
  return events.filter((event) => isCompromised(event, userIps, baseline));
}
