/**
 * Timestamps are timezone-naive: the wall clock written in the export is
 * stored in the UTC fields of a Date and always read back through the UTC
 * accessors, so no host timezone ever shifts an hour or a weekday.
 */

const ISO_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(?:Z|[+-]\d{2}:?\d{2})?$/i;

const US_DATETIME =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([AP]M))?)?$/i;

function buildNaiveDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  ms: number
): Date | null {
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));
  // Reject rollovers such as 2024-02-30
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) return null;
  return date;
}

/**
 * Parse an export timestamp.
 * Supports:
 *   - ISO 8601: 2024-01-01T09:00:00, 2024-01-01 09:00:00.1234567Z (offset dropped)
 *   - US export format: 1/1/2024 9:00:00 AM
 *   - Date objects from spreadsheet cells
 * Returns null if not parseable.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string") return null;
  const text = value.trim();

  const iso = text.match(ISO_DATETIME);
  if (iso) {
    const ms = iso[7] ? Number(iso[7].slice(0, 3).padEnd(3, "0")) : 0;
    return buildNaiveDate(
      Number(iso[1]),
      Number(iso[2]),
      Number(iso[3]),
      Number(iso[4] ?? 0),
      Number(iso[5] ?? 0),
      Number(iso[6] ?? 0),
      ms
    );
  }

  const us = text.match(US_DATETIME);
  if (us) {
    let hour = Number(us[4] ?? 0);
    const meridiem = us[7]?.toUpperCase();
    if (meridiem) {
      if (hour < 1 || hour > 12) return null;
      if (meridiem === "AM" && hour === 12) hour = 0;
      if (meridiem === "PM" && hour !== 12) hour += 12;
    }
    return buildNaiveDate(
      Number(us[3]),
      Number(us[1]),
      Number(us[2]),
      hour,
      Number(us[5] ?? 0),
      Number(us[6] ?? 0),
      0
    );
  }

  return null;
}

export function hourOf(timestamp: Date): number {
  return timestamp.getUTCHours();
}

/** Saturday or Sunday */
export function isWeekend(timestamp: Date): boolean {
  const day = timestamp.getUTCDay();
  return day === 0 || day === 6;
}

export function secondsOfDay(timestamp: Date): number {
  return timestamp.getUTCHours() * 3600 + timestamp.getUTCMinutes() * 60 + timestamp.getUTCSeconds();
}

/** Parse HH:MM or HH:MM:SS into seconds since midnight. */
export function parseClockTime(value: string): number | null {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})(?::(\d{2}))?$/);
  if (!match) return null;
  const [hours, minutes, seconds] = [Number(match[1]), Number(match[2]), Number(match[3] ?? 0)];
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return hours * 3600 + minutes * 60 + seconds;
}
