import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import type { Database } from "./types.js";

/**
 * Open a SQLite-backed store (file path or ":memory:").
 * Used for local runs and as the in-process store in tests.
 */
export function createSqliteDatabase(path = ":memory:"): Kysely<Database> {
  if (path !== ":memory:") {
    // Ensure data directory exists
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(path);
  database.pragma("foreign_keys = ON");

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database }),
  });
}
