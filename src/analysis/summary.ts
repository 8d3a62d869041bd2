import { MISSING_VALUE } from "@/lib/constants";
import type {
  AnnotatedEvent,
  AuditEvent,
  Baseline,
  IpSummaryEntry,
  RiskLevel,
  TimelineStats,
} from "@/analysis/types";
import { isAnomalousIp } from "./rule-engine";

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function buildTimelineStats(
  events: readonly AnnotatedEvent[],
  derived: { compromised: number; filesAccessed: number; anomalousIpEvents: number }
): TimelineStats {
  const operationCounts: Record<string, number> = {};
  const countryCounts: Record<string, number> = {};
  const riskLevelCounts: Record<RiskLevel, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };

  for (const event of events) {
    increment(operationCounts, event.operation);
    increment(countryCounts, event.geo.country);
    riskLevelCounts[event.riskLevel]++;
  }

  return {
    totalEvents: events.length,
    compromisedEvents: derived.compromised,
    filesAccessed: derived.filesAccessed,
    anomalousIpEvents: derived.anomalousIpEvents,
    uniqueUsers: new Set(events.map((e) => e.userId)).size,
    uniqueIps: new Set(events.map((e) => e.clientIp)).size,
    uniqueOperations: Object.keys(operationCounts).length,
    operationCounts,
    countryCounts,
    riskLevelCounts,
  };
}

/**
 * One entry per client IP in first-seen order, skipping events without an
 * IP. Geo and the anomalous flag come from the IP's first event.
 */
export function buildIpSummary(events: readonly AuditEvent[], baseline: Baseline): IpSummaryEntry[] {
  const entries = new Map<string, IpSummaryEntry & { opSet: Set<string>; userSet: Set<string> }>();

  for (const event of events) {
    if (event.clientIp === MISSING_VALUE) continue;

    let entry = entries.get(event.clientIp);
    if (!entry) {
      entry = {
        ip: event.clientIp,
        count: 0,
        geo: { ...event.geo },
        operations: [],
        users: [],
        isAnomalous: isAnomalousIp(event, baseline),
        firstSeen: null,
        lastSeen: null,
        opSet: new Set(),
        userSet: new Set(),
      };
      entries.set(event.clientIp, entry);
    }

    entry.count++;
    entry.opSet.add(event.operation);
    entry.userSet.add(event.userId);

    const ts = event.timestamp;
    if (ts) {
      if (!entry.firstSeen || ts < entry.firstSeen) entry.firstSeen = ts;
      if (!entry.lastSeen || ts > entry.lastSeen) entry.lastSeen = ts;
    }
  }

  return [...entries.values()].map(({ opSet, userSet, ...entry }) => ({
    ...entry,
    operations: [...opSet],
    users: [...userSet],
  }));
}

/**
 * IPs whose event count is unusually low or high for this file: below
 * max(1, mean - std) or above mean + 2·std, using the sample standard
 * deviation. Needs at least two distinct IPs.
 */
export function findFrequencyOutliers(events: readonly AuditEvent[]): string[] {
  const counts = new Map<string, number>();
  for (const event of events) {
    if (event.clientIp === MISSING_VALUE) continue;
    counts.set(event.clientIp, (counts.get(event.clientIp) ?? 0) + 1);
  }
  if (counts.size < 2) return [];

  const values = [...counts.values()];
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
  const std = Math.sqrt(variance);

  const low = Math.max(1, mean - std);
  const high = mean + 2 * std;
  return [...counts.entries()].filter(([, count]) => count < low || count > high).map(([ip]) => ip);
}
