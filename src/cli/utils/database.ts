import { createSqliteDatabase } from "../../db/sqlite.js";

import type { SqlDialect } from "../../db/migrate.js";
import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

export interface CliDatabase {
  db: Kysely<Database>;
  dialect: SqlDialect;
  /** Human-readable target, password masked */
  target: string;
  close: () => Promise<void>;
}

/**
 * Open the store a command works on: a SQLite file when --sqlite is given,
 * the configured PostgreSQL database otherwise
 */
export async function openDatabase(sqlitePath?: string): Promise<CliDatabase> {
  if (sqlitePath !== undefined) {
    const db = createSqliteDatabase(sqlitePath);
    return {
      db,
      dialect: "sqlite",
      target: `sqlite:${sqlitePath}`,
      close: () => db.destroy(),
    };
  }

  // Imported lazily so SQLite runs never build a pg pool
  const { db, closeConnection, getDatabaseUrl } = await import(
    "../../db/connection.js"
  );
  return {
    db,
    dialect: "postgres",
    target: getDatabaseUrl(),
    close: closeConnection,
  };
}
