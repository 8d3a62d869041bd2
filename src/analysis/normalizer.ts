import { MISSING_VALUE, REQUIRED_COLUMNS } from "@/lib/constants";
import { SchemaError } from "@/lib/errors";
import type { AuditBlob, AuditEvent, GeoRecord, LogTable, NormalizeResult } from "@/analysis/types";
import type { GeoResolver } from "./geo/resolver";
import { parseTimestamp } from "./rule-engine/utils";

const FILE_ACCESS_OPERATION = "FileAccessed";

interface PendingEvent {
  timestamp: Date | null;
  operation: string;
  userId: string;
  clientIp: string;
  resultStatus: string;
  fileName: string;
}

/**
 * Fail fast when the export lacks a required column. Runs before any row.
 */
export function validateColumns(columns: readonly string[]): void {
  const present = new Set(columns);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function classifyAuditBlob(value: unknown): AuditBlob {
  if (typeof value === "string") return { kind: "text", text: value };
  if (isPlainObject(value)) return { kind: "structured", data: value };
  return { kind: "unsupported", value };
}

/**
 * Turn an audit blob into its key/value mapping, or null when the row has to
 * be dropped (invalid JSON, JSON that is not an object, unexpected cell type).
 */
export function parseAuditBlob(blob: AuditBlob): Record<string, unknown> | null {
  switch (blob.kind) {
    case "structured":
      return blob.data;
    case "text": {
      try {
        const parsed: unknown = JSON.parse(blob.text);
        return isPlainObject(parsed) ? parsed : null;
      } catch {
        return null;
      }
    }
    case "unsupported":
      return null;
  }
}

function stringField(value: unknown, fallback: string): string {
  if (value === null || value === undefined) return fallback;
  const text = String(value).trim();
  return text === "" ? fallback : text;
}

function cellText(value: unknown): string {
  return value === null || value === undefined ? "" : String(value).trim();
}

/**
 * Build events from an audit export, geolocate each distinct client IP once
 * and return them in timestamp order (stable; undated events last).
 *
 * Missing required columns abort the whole batch. Rows with an unusable
 * AuditData blob are dropped and counted in `parseErrors`.
 */
export async function normalizeLogTable(table: LogTable, resolver: GeoResolver): Promise<NormalizeResult> {
  validateColumns(table.columns);

  const pending: PendingEvent[] = [];
  let parseErrors = 0;

  table.rows.forEach((row, index) => {
    const audit = parseAuditBlob(classifyAuditBlob(row.AuditData));
    if (!audit) {
      parseErrors++;
      console.warn(`[Normalizer] Skipping row ${index + 2}: AuditData is not a valid JSON object`);
      return;
    }

    const operation = cellText(row.Operation);
    pending.push({
      timestamp: parseTimestamp(row.CreationDate),
      operation,
      userId: cellText(row.UserId),
      clientIp: stringField(audit.ClientIP, MISSING_VALUE),
      resultStatus: stringField(audit.ResultStatus, MISSING_VALUE),
      fileName: operation === FILE_ACCESS_OPERATION ? stringField(audit.SourceFileName, MISSING_VALUE) : "",
    });
  });

  const geoByIp = new Map<string, Readonly<GeoRecord>>();
  const events: AuditEvent[] = [];
  for (const event of pending) {
    let geo = geoByIp.get(event.clientIp);
    if (!geo) {
      geo = Object.freeze(await resolver.resolve(event.clientIp));
      geoByIp.set(event.clientIp, geo);
    }
    events.push(Object.freeze({ ...event, geo }));
  }

  return { events: sortByTimestamp(events), parseErrors };
}

/**
 * Stable ascending sort by timestamp; events without one keep their relative
 * order after all dated events.
 */
export function sortByTimestamp<T extends { timestamp: Date | null }>(events: readonly T[]): T[] {
  return [...events].sort((a, b) => {
    if (a.timestamp === null) return b.timestamp === null ? 0 : 1;
    if (b.timestamp === null) return -1;
    return a.timestamp.getTime() - b.timestamp.getTime();
  });
}

export function parseErrorWarning(parseErrors: number): string | null {
  if (parseErrors === 0) return null;
  return parseErrors === 1
    ? "1 record had invalid audit data and was skipped."
    : `${parseErrors} records had invalid audit data and were skipped.`;
}
