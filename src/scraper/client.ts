import { CsvError, parse } from "csv-parse/sync";

import {
  MalformedSourceError,
  SourceFetchError,
  SourceTimeoutError,
  errorMessage,
} from "../errors.js";
import { sourceLogger } from "../logger.js";
import {
  NonRetryableError,
  RETRY_STATUS_CODES,
  RetryableError,
  withRetry,
} from "../utils/retry.js";

import type { SourceDefinition, WideTable } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface FetchOptions {
  /** Per-attempt timeout covering connect and body read */
  timeoutMs: number;
  maxRetries: number;
  /** First backoff delay; doubles per retry (default: 1000) */
  retryBaseDelayMs?: number;
  /** Minimum spacing between two requests (default: 750) */
  minIntervalMs?: number;
}

/**
 * Anything that can produce the wide table of a source
 */
export type TableFetcher = (source: SourceDefinition) => Promise<WideTable>;

const DEFAULT_RATE_LIMIT_MS = 750;

// ============================================================================
// HTTP
// ============================================================================

let lastRequestTime = 0;

async function rateLimitedFetch(
  url: string,
  minIntervalMs: number,
  options?: RequestInit
): Promise<Response> {
  const now = Date.now();
  const elapsed = now - lastRequestTime;

  if (elapsed < minIntervalMs) {
    const waitTime = minIntervalMs - elapsed;
    sourceLogger.debug({ waitTime }, "Rate limiting: waiting before request");
    await new Promise((resolve) => setTimeout(resolve, waitTime));
  }

  lastRequestTime = Date.now();

  sourceLogger.debug({ url }, "Sending request");

  const startTime = performance.now();
  const response = await fetch(url, options);
  const duration = Math.round(performance.now() - startTime);

  sourceLogger.debug(
    {
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response"
  );

  return response;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

/**
 * One attempt: status and network failures are classified for withRetry,
 * a timeout ends the fetch
 */
async function fetchCsvOnce(
  source: SourceDefinition,
  options: FetchOptions
): Promise<string> {
  const signal = AbortSignal.timeout(options.timeoutMs);

  let response: Response;
  try {
    response = await rateLimitedFetch(
      source.url,
      options.minIntervalMs ?? DEFAULT_RATE_LIMIT_MS,
      { signal, headers: { Accept: "text/csv" } }
    );
  } catch (error) {
    if (isTimeout(error)) {
      throw new SourceTimeoutError(source.id, options.timeoutMs);
    }
    throw new RetryableError(
      `Network error: ${errorMessage(error)}`,
      undefined,
      error
    );
  }

  if (!response.ok) {
    const message = `HTTP ${String(response.status)} ${response.statusText}`;
    if (RETRY_STATUS_CODES.includes(response.status)) {
      throw new RetryableError(message, response.status);
    }
    throw new NonRetryableError(message, response.status);
  }

  try {
    return await response.text();
  } catch (error) {
    if (isTimeout(error)) {
      throw new SourceTimeoutError(source.id, options.timeoutMs);
    }
    throw new RetryableError(
      `Failed to read body: ${errorMessage(error)}`,
      undefined,
      error
    );
  }
}

// ============================================================================
// CSV
// ============================================================================

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) =>
        Array.isArray(row) && row.every((cell) => typeof cell === "string")
    )
  );
}

/**
 * Parse a wide CSV body: first record is the header, the rest are rows.
 * An empty body yields an empty table.
 */
export function parseWideCsv(sourceId: string, text: string): WideTable {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new MalformedSourceError(sourceId, `invalid CSV: ${error.message}`, {
        csvCode: error.code,
      });
    }
    throw error;
  }

  if (!isStringMatrix(records)) {
    throw new MalformedSourceError(sourceId, "CSV did not parse into rows");
  }

  const [header = [], ...rows] = records;
  return { header, rows };
}

// ============================================================================
// Source Fetch
// ============================================================================

/**
 * Download a source and return it as a wide table.
 *
 * Network errors, 429 and 5xx are retried with backoff; other statuses fail
 * at once. A timeout is never retried.
 */
export async function fetchSourceTable(
  source: SourceDefinition,
  options: FetchOptions
): Promise<WideTable> {
  sourceLogger.info({ sourceId: source.id, url: source.url }, "Fetching source");

  let text: string;
  try {
    text = await withRetry(() => fetchCsvOnce(source, options), {
      maxRetries: options.maxRetries,
      baseDelayMs: options.retryBaseDelayMs ?? 1000,
      jitterMs: options.retryBaseDelayMs === 0 ? 0 : 100,
      onRetry: (attempt, error, delayMs) => {
        sourceLogger.warn(
          {
            sourceId: source.id,
            attempt,
            delayMs: Math.round(delayMs),
            error: error.message,
          },
          "Retrying source fetch"
        );
      },
    });
  } catch (error) {
    if (error instanceof SourceTimeoutError) {
      sourceLogger.error(
        { sourceId: source.id, timeoutMs: options.timeoutMs },
        "Source fetch timed out"
      );
      throw error;
    }
    const statusCode =
      error instanceof RetryableError || error instanceof NonRetryableError
        ? error.statusCode
        : undefined;
    sourceLogger.error(
      { sourceId: source.id, statusCode, error: errorMessage(error) },
      "Source fetch failed"
    );
    throw new SourceFetchError(
      source.id,
      `Failed to fetch ${source.id}: ${errorMessage(error)}`,
      { statusCode, cause: error }
    );
  }

  const table = parseWideCsv(source.id, text);
  sourceLogger.debug(
    {
      sourceId: source.id,
      columns: table.header.length,
      rows: table.rows.length,
    },
    "Parsed source table"
  );
  return table;
}

/**
 * Bind fetch options into a TableFetcher
 */
export function createSourceFetcher(options: FetchOptions): TableFetcher {
  return (source) => fetchSourceTable(source, options);
}
