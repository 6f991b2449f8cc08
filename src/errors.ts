/**
 * Structural errors abort a sync run. Row and cell anomalies are not errors:
 * they travel as data-quality warnings (see services/sync/quality.ts).
 */

// ============================================================================
// Source Errors
// ============================================================================

export class SourceFetchError extends Error {
  code = "SOURCE_FETCH_FAILED" as const;
  readonly sourceId: string;
  readonly statusCode?: number;

  constructor(
    sourceId: string,
    message: string,
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "SourceFetchError";
    this.sourceId = sourceId;
    this.statusCode = options?.statusCode;
  }
}

export class SourceTimeoutError extends Error {
  code = "SOURCE_TIMEOUT" as const;
  readonly sourceId: string;
  readonly timeoutMs: number;

  constructor(sourceId: string, timeoutMs: number) {
    super(
      `Source ${sourceId} did not respond within ${String(timeoutMs)}ms`
    );
    this.name = "SourceTimeoutError";
    this.sourceId = sourceId;
    this.timeoutMs = timeoutMs;
  }
}

export class EmptySourceError extends Error {
  code = "EMPTY_SOURCE" as const;
  readonly sourceId: string;

  constructor(sourceId: string) {
    super(`Source ${sourceId} returned no data rows`);
    this.name = "EmptySourceError";
    this.sourceId = sourceId;
  }
}

export class MalformedSourceError extends Error {
  code = "MALFORMED_SOURCE" as const;
  readonly sourceId: string;
  details?: Record<string, unknown>;

  constructor(
    sourceId: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(`Source ${sourceId}: ${message}`);
    this.name = "MalformedSourceError";
    this.sourceId = sourceId;
    this.details = details;
  }
}

// ============================================================================
// Processing Errors
// ============================================================================

export class ReconciliationConflictError extends Error {
  code = "RECONCILIATION_CONFLICT" as const;
  details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "ReconciliationConflictError";
    this.details = details;
  }
}

export class WriteError extends Error {
  code = "WRITE_FAILED" as const;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "WriteError";
  }
}

export class ConfigError extends Error {
  code = "INVALID_CONFIG" as const;
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type StructuralError =
  | SourceFetchError
  | SourceTimeoutError
  | EmptySourceError
  | MalformedSourceError
  | ReconciliationConflictError
  | WriteError
  | ConfigError;

export function isStructuralError(error: unknown): error is StructuralError {
  return (
    error instanceof SourceFetchError ||
    error instanceof SourceTimeoutError ||
    error instanceof EmptySourceError ||
    error instanceof MalformedSourceError ||
    error instanceof ReconciliationConflictError ||
    error instanceof WriteError ||
    error instanceof ConfigError
  );
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
