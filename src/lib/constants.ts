import type { GeoRecord } from "@/analysis/types";

export const MAX_FILE_SIZE = 50 * 1024 * 1024; // 50MB
export const DELIMITED_EXTENSIONS = [".csv", ".tsv", ".txt"];
export const SPREADSHEET_EXTENSIONS = [".xlsx"];

/** Columns every audit export must carry. Extra columns are ignored. */
export const REQUIRED_COLUMNS = ["CreationDate", "Operation", "UserId", "AuditData"] as const;

/** Stand-in for a client IP the audit blob does not carry. */
export const MISSING_VALUE = "N/A";

export const UNKNOWN = "Unknown";

export const UNKNOWN_GEO: GeoRecord = {
  country: UNKNOWN,
  region: UNKNOWN,
  city: UNKNOWN,
  latitude: 0,
  longitude: 0,
};

export const PRIVATE_GEO: GeoRecord = {
  country: "Local",
  region: "Network",
  city: "Private",
  latitude: 0,
  longitude: 0,
};

export const DEFAULT_BASELINE_COUNTRY = "US";
export const DEFAULT_BASELINE_REGION = "Massachusetts";

/** Default request budget for the free ip-api.com tier */
export const IP_API_ENDPOINT = "http://ip-api.com/json";
export const IP_API_REQUESTS_PER_MINUTE = 45;
