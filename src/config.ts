import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const EnvSchema = Type.Object({
  DATABASE_URL: Type.String({
    minLength: 1,
    default: "postgresql://localhost:5432/ipc",
  }),
  START_DATE: Type.String({
    pattern: "^\\d{4}-\\d{2}-01$",
    default: "2023-12-01",
  }),
  FETCH_TIMEOUT_MS: Type.Integer({ minimum: 1000, default: 30_000 }),
  FETCH_MAX_RETRIES: Type.Integer({ minimum: 0, maximum: 10, default: 3 }),
  REVISION_WINDOW_MONTHS: Type.Integer({
    minimum: 1,
    maximum: 24,
    default: 2,
  }),
  TIE_BREAK: Type.Union([Type.Literal("first-wins"), Type.Literal("reject")], {
    default: "first-wins",
  }),
});

type Env = Static<typeof EnvSchema>;

export type TieBreakPolicy = Env["TIE_BREAK"];

export interface AppConfig {
  databaseUrl: string;
  /** First period loaded when the store is empty (YYYY-MM-01) */
  startDate: string;
  fetchTimeoutMs: number;
  fetchMaxRetries: number;
  /** Months re-processed behind the latest loaded period */
  revisionWindowMonths: number;
  tieBreak: TieBreakPolicy;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Build the application config from environment variables.
 * Missing keys take their schema defaults; numeric strings are coerced.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const keys = Object.keys(EnvSchema.properties);
  const raw: Record<string, string> = {};
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const candidate = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));

  if (!Value.Check(EnvSchema, candidate)) {
    const issues = [...Value.Errors(EnvSchema, candidate)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
    );
    throw new ConfigError(issues);
  }

  return {
    databaseUrl: candidate.DATABASE_URL,
    startDate: candidate.START_DATE,
    fetchTimeoutMs: candidate.FETCH_TIMEOUT_MS,
    fetchMaxRetries: candidate.FETCH_MAX_RETRIES,
    revisionWindowMonths: candidate.REVISION_WINDOW_MONTHS,
    tieBreak: candidate.TIE_BREAK,
  };
}
