import type {
  AnnotatedEvent,
  AuditEvent,
  Baseline,
  FilterConfiguration,
  IpPatternOption,
  TimeFilterType,
} from "@/analysis/types";
import { ConfigError } from "@/lib/errors";
import { annotateEvents } from "./rule-engine";
import { hourOf, isWeekend, parseClockTime, secondsOfDay } from "./rule-engine/utils";

/** An IP seen more than this many times counts as frequent */
export const FREQUENT_IP_THRESHOLD = 10;

const BUSINESS_START_HOUR = 8;
const BUSINESS_END_HOUR = 17;

type EventPredicate = (event: AnnotatedEvent) => boolean;

function isBusinessHours(timestamp: Date): boolean {
  const hour = hourOf(timestamp);
  return !isWeekend(timestamp) && hour >= BUSINESS_START_HOUR && hour <= BUSINESS_END_HOUR;
}

/**
 * Inclusive clock-time window. A start after the end wraps past midnight
 * (22:00–06:00).
 */
function inClockRange(timestamp: Date, start: number, end: number): boolean {
  const seconds = secondsOfDay(timestamp);
  return start <= end ? seconds >= start && seconds <= end : seconds >= start || seconds <= end;
}

function timeMatcher(filter: NonNullable<FilterConfiguration["timeFilter"]>): ((timestamp: Date) => boolean) | null {
  const type: TimeFilterType = filter.type;
  switch (type) {
    case "NONE":
      return null;
    case "BUSINESS_HOURS_ONLY":
      return isBusinessHours;
    case "OUTSIDE_BUSINESS_HOURS":
      return (timestamp) => !isBusinessHours(timestamp);
    case "WEEKENDS_ONLY":
      return isWeekend;
    case "CUSTOM_RANGE": {
      const start = parseClockTime(filter.startTime ?? "");
      const end = parseClockTime(filter.endTime ?? "");
      if (start === null || end === null) {
        throw new ConfigError("timeFilter", ["CUSTOM_RANGE requires valid startTime and endTime"]);
      }
      return (timestamp) => inClockRange(timestamp, start, end);
    }
  }
}

function ipPatternPredicate(events: readonly AnnotatedEvent[], options: IpPatternOption[]): EventPredicate {
  const counts = new Map<string, number>();
  const countries = new Map<string, Set<string>>();
  for (const event of events) {
    counts.set(event.clientIp, (counts.get(event.clientIp) ?? 0) + 1);
    let seen = countries.get(event.clientIp);
    if (!seen) {
      seen = new Set();
      countries.set(event.clientIp, seen);
    }
    seen.add(event.geo.country);
  }

  const checks = options.map((option): EventPredicate => {
    switch (option) {
      // Both are "seen exactly once in the current set"
      case "FIRST_TIME":
      case "SINGLE_USE":
        return (event) => counts.get(event.clientIp) === 1;
      case "FREQUENT":
        return (event) => (counts.get(event.clientIp) ?? 0) > FREQUENT_IP_THRESHOLD;
      case "CROSS_COUNTRY":
        return (event) => (countries.get(event.clientIp)?.size ?? 0) > 1;
    }
  });

  return (event) => checks.some((check) => check(event));
}

/**
 * Annotate events, then keep those passing every configured dimension.
 *
 * Dimensions run in a fixed order: risk level, anomaly type, excluded
 * countries, time window, IP pattern. IP-pattern counts are taken over what
 * is left after the first four, so the order changes the result. An absent or
 * empty dimension does not restrict. The input array is never modified.
 */
export function applyFilters(
  events: readonly AuditEvent[],
  config: FilterConfiguration,
  baseline: Baseline
): AnnotatedEvent[] {
  let current: AnnotatedEvent[] = annotateEvents(events, baseline);

  if (config.riskLevels && config.riskLevels.length > 0) {
    const levels = new Set(config.riskLevels);
    current = current.filter((event) => levels.has(event.riskLevel));
  }

  if (config.anomalyTypes && config.anomalyTypes.length > 0) {
    const wanted = new Set(config.anomalyTypes);
    current = current.filter((event) => event.anomalyTypes.some((type) => wanted.has(type)));
  }

  if (config.excludedCountries && config.excludedCountries.length > 0) {
    const excluded = new Set(config.excludedCountries);
    current = current.filter((event) => !excluded.has(event.geo.country));
  }

  const matchesTime = config.timeFilter ? timeMatcher(config.timeFilter) : null;
  if (matchesTime) {
    // Undated events are kept under every time filter
    current = current.filter((event) => event.timestamp === null || matchesTime(event.timestamp));
  }

  if (config.ipPatterns && config.ipPatterns.length > 0) {
    current = current.filter(ipPatternPredicate(current, config.ipPatterns));
  }

  return current;
}

export function filterFilesAccessed<T extends AuditEvent>(events: readonly T[]): T[] {
  return events.filter((event) => event.operation === "FileAccessed");
}
