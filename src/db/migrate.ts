import { sql, type ColumnDefinitionBuilder, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

export type SqlDialect = "postgres" | "sqlite";

export const TABLE_NAMES = [
  "dim_region",
  "dim_category",
  "fact_inflation",
  "load_runs",
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the star schema. Idempotent: existing tables and indexes are kept.
 * The same definition runs on PostgreSQL and SQLite; only the surrogate key
 * and timestamp column types differ.
 */
export async function runMigration(
  db: Kysely<Database>,
  options: { dialect: SqlDialect; fresh?: boolean }
): Promise<void> {
  const { dialect } = options;
  const idType = dialect === "postgres" ? "serial" : "integer";
  const timestampType = dialect === "postgres" ? "timestamptz" : "text";
  const surrogateKey = (col: ColumnDefinitionBuilder): ColumnDefinitionBuilder =>
    dialect === "postgres" ? col.primaryKey() : col.primaryKey().autoIncrement();

  if (options.fresh === true) {
    dbLogger.info("Dropping existing tables (--fresh mode)...");
    for (const table of [...TABLE_NAMES].reverse()) {
      await db.schema.dropTable(table).ifExists().execute();
    }
  }

  dbLogger.info({ dialect }, "Running schema migration...");

  await db.transaction().execute(async (trx) => {
    await trx.schema
      .createTable("dim_region")
      .ifNotExists()
      .addColumn("region_id", idType, surrogateKey)
      .addColumn("region_name", "varchar(64)", (col) => col.notNull().unique())
      .execute();

    await trx.schema
      .createTable("dim_category")
      .ifNotExists()
      .addColumn("category_id", idType, surrogateKey)
      .addColumn("category_name", "varchar(64)", (col) => col.notNull())
      .addColumn("classification", "varchar(128)", (col) => col.notNull())
      .addColumn("nature", "varchar(16)")
      .addUniqueConstraint("dim_category_name_classification_uq", [
        "category_name",
        "classification",
      ])
      .addCheckConstraint(
        "dim_category_nature_check",
        sql`nature in ('GOODS', 'SERVICES', 'MIXED')`
      )
      .execute();

    await trx.schema
      .createTable("fact_inflation")
      .ifNotExists()
      .addColumn("period", "date", (col) => col.notNull())
      .addColumn("region_id", "integer", (col) => col.notNull())
      .addColumn("category_id", "integer", (col) => col.notNull())
      .addColumn("incidence", "numeric(18, 4)")
      .addColumn("mom_variation", "numeric(18, 4)")
      .addPrimaryKeyConstraint("fact_inflation_pk", [
        "period",
        "region_id",
        "category_id",
      ])
      .addForeignKeyConstraint(
        "fact_inflation_region_fk",
        ["region_id"],
        "dim_region",
        ["region_id"]
      )
      .addForeignKeyConstraint(
        "fact_inflation_category_fk",
        ["category_id"],
        "dim_category",
        ["category_id"]
      )
      .execute();

    await trx.schema
      .createIndex("idx_fact_inflation_region_category")
      .ifNotExists()
      .on("fact_inflation")
      .columns(["region_id", "category_id"])
      .execute();

    await trx.schema
      .createTable("load_runs")
      .ifNotExists()
      .addColumn("run_id", idType, surrogateKey)
      .addColumn("started_at", timestampType, (col) => col.notNull())
      .addColumn("finished_at", timestampType, (col) => col.notNull())
      .addColumn("status", "varchar(16)", (col) => col.notNull())
      .addColumn("window_reason", "varchar(16)", (col) => col.notNull())
      .addColumn("period_from", "date", (col) => col.notNull())
      .addColumn("period_to", "date")
      .addColumn("rows_inserted", "integer", (col) => col.notNull())
      .addColumn("rows_updated", "integer", (col) => col.notNull())
      .addColumn("warnings", "integer", (col) => col.notNull())
      .addColumn("error", "text")
      .addCheckConstraint(
        "load_runs_status_check",
        sql`status in ('SUCCEEDED', 'FAILED')`
      )
      .execute();
  });

  dbLogger.info("Schema migration completed successfully");
}

/**
 * Check if the schema exists (all tables present)
 */
export async function hasSchema(db: Kysely<Database>): Promise<boolean> {
  const tables = await db.introspection.getTables();
  const present = new Set(tables.map((table) => table.name));
  return TABLE_NAMES.every((name) => present.has(name));
}

export interface TableStat {
  table_name: TableName;
  row_count: number;
}

/**
 * Get table row counts
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of TABLE_NAMES) {
    const row = await db
      .selectFrom(table)
      .select((eb) => eb.fn.countAll<number | string>().as("count"))
      .executeTakeFirstOrThrow();
    // pg returns COUNT(*) as a bigint string
    stats.push({ table_name: table, row_count: Number(row.count) });
  }
  return stats;
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const fresh = args.includes("--fresh");

  if (fresh) {
    console.log("Running migration with --fresh flag (will drop all tables)");
  }

  const { db, closeConnection } = await import("./connection.js");

  try {
    await runMigration(db, { dialect: "postgres", fresh });
    console.log("Migration completed successfully!");

    const stats = await getTableStats(db);
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// Only run main() if this file is executed directly (not imported)
const isMainModule = /migrate\.[jt]s$/.test(process.argv[1] ?? "");
if (isMainModule) {
  void main();
}
