export type RiskLevel = "HIGH" | "MEDIUM" | "LOW";

export type AnomalyType =
  | "GEOGRAPHIC_ANOMALY"
  | "TIME_ANOMALY"
  | "ACCESS_PATTERN_ANOMALY"
  | "FAILED_AUTHENTICATION"
  | "PRIVILEGE_ESCALATION"
  | "GENERAL_ANOMALY";

export interface GeoRecord {
  country: string;
  region: string;
  city: string;
  latitude: number;
  longitude: number;
}

/** A single cell as it comes out of a CSV file or a spreadsheet. */
export type CellValue = string | number | boolean | Date | null;

export interface TabularData {
  columns: string[];
  rows: Record<string, CellValue>[];
}

/**
 * The AuditData column, classified once per row.
 * CSV exports carry JSON text; spreadsheets and in-memory callers may hand
 * over an already-parsed object.
 */
export type AuditBlob =
  | { kind: "text"; text: string }
  | { kind: "structured"; data: Record<string, unknown> }
  | { kind: "unsupported"; value: unknown };

/** Rows handed to the normalizer; AuditData may already be structured. */
export interface LogTable {
  columns: readonly string[];
  rows: readonly Record<string, unknown>[];
}

export interface AuditEvent {
  /** Wall-clock time as written in the export (read through the UTC accessors), null if unparseable */
  readonly timestamp: Date | null;
  readonly operation: string;
  readonly userId: string;
  readonly clientIp: string;
  readonly resultStatus: string;
  readonly fileName: string;
  readonly geo: Readonly<GeoRecord>;
}

export interface AnnotatedEvent extends AuditEvent {
  readonly riskLevel: RiskLevel;
  readonly anomalyTypes: readonly AnomalyType[];
}

/** The analyst's expected location and exempted address. */
export interface Baseline {
  country: string;
  region: string;
  referenceIp: string | null;
}

export type TimeFilterType =
  | "NONE"
  | "BUSINESS_HOURS_ONLY"
  | "OUTSIDE_BUSINESS_HOURS"
  | "WEEKENDS_ONLY"
  | "CUSTOM_RANGE";

export type IpPatternOption = "FIRST_TIME" | "FREQUENT" | "SINGLE_USE" | "CROSS_COUNTRY";

export interface FilterConfiguration {
  riskLevels?: RiskLevel[];
  anomalyTypes?: AnomalyType[];
  excludedCountries?: string[];
  timeFilter?: {
    type: TimeFilterType;
    /** HH:MM or HH:MM:SS, required for CUSTOM_RANGE */
    startTime?: string;
    endTime?: string;
  };
  ipPatterns?: IpPatternOption[];
}

export interface NormalizeResult {
  events: AuditEvent[];
  parseErrors: number;
}

export interface TimelineStats {
  totalEvents: number;
  compromisedEvents: number;
  filesAccessed: number;
  anomalousIpEvents: number;
  uniqueUsers: number;
  uniqueIps: number;
  uniqueOperations: number;
  operationCounts: Record<string, number>;
  countryCounts: Record<string, number>;
  riskLevelCounts: Record<RiskLevel, number>;
}

export interface IpSummaryEntry {
  ip: string;
  count: number;
  geo: GeoRecord;
  operations: string[];
  users: string[];
  isAnomalous: boolean;
  firstSeen: Date | null;
  lastSeen: Date | null;
}

export type AnalysisStage = "reading" | "geolocating" | "analyzing" | "complete";

export interface AnalysisPipelineResult {
  events: AnnotatedEvent[];
  compromisedEvents: AnnotatedEvent[];
  anomalousIpEvents: AnnotatedEvent[];
  filesAccessed: AnnotatedEvent[];
  stats: TimelineStats;
  ipSummary: IpSummaryEntry[];
  frequencyOutliers: string[];
  parseErrors: number;
  /** Non-fatal notice about skipped rows, null when every row parsed */
  warning: string | null;
}
