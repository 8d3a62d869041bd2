/**
 * Fatal pipeline errors. Anything recoverable (a bad row, a failed
 * geolocation lookup) is absorbed into counters or sentinel values instead.
 */
export class AnalysisError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
  }
}

export class SchemaError extends AnalysisError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super("MISSING_COLUMNS", `Missing required columns: ${missingColumns.join(", ")}`);
    this.name = "SchemaError";
    this.missingColumns = missingColumns;
  }
}

export class UnsupportedFormatError extends AnalysisError {
  readonly extension: string;

  constructor(extension: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported file format: ${extension || "(none)"}`);
    this.name = "UnsupportedFormatError";
    this.extension = extension;
  }
}

export class ConfigError extends AnalysisError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super("INVALID_CONFIG", `Invalid configuration in ${source}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
