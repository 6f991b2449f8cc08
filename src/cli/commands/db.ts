import ora from "ora";

import { errorMessage } from "../../errors.js";
import { getTableStats, hasSchema, runMigration } from "../../db/migrate.js";
import { displayTableStats } from "../utils/display.js";
import { openDatabase, type CliDatabase } from "../utils/database.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the star schema (idempotent)")
    .option("--fresh", "Drop all tables first (destructive!)")
    .option("--sqlite <file>", "Use a SQLite file instead of PostgreSQL")
    .action(async (options: { fresh?: boolean; sqlite?: string }) => {
      const spinner = ora("Running migration...").start();
      let store: CliDatabase;
      try {
        store = await openDatabase(options.sqlite);
      } catch (error) {
        spinner.fail(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      try {
        if (options.fresh === true) {
          spinner.text = "Dropping existing tables...";
        }

        await runMigration(store.db, {
          dialect: store.dialect,
          fresh: options.fresh,
        });
        spinner.succeed(`Migration completed on ${store.target}`);

        displayTableStats(await getTableStats(store.db));
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await store.close();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .option("--sqlite <file>", "Use a SQLite file instead of PostgreSQL")
    .action(async (options: { sqlite?: string }) => {
      const spinner = ora("Checking database connection...").start();
      let store: CliDatabase;
      try {
        store = await openDatabase(options.sqlite);
      } catch (error) {
        spinner.fail(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      try {
        if (store.dialect === "postgres") {
          const { checkConnection, getPoolStats } = await import(
            "../../db/connection.js"
          );
          if (!(await checkConnection())) {
            spinner.fail("Database connection failed");
            console.log(`\nDatabase URL: ${store.target}`);
            process.exitCode = 1;
            return;
          }

          const poolStats = getPoolStats();
          spinner.succeed("Database connected");
          console.log(`\nDatabase URL: ${store.target}`);
          console.log("\nPool statistics:");
          console.log(`  Total connections: ${String(poolStats.totalCount)}`);
          console.log(`  Idle connections: ${String(poolStats.idleCount)}`);
          console.log(`  Waiting requests: ${String(poolStats.waitingCount)}`);
        } else {
          spinner.succeed(`Opened ${store.target}`);
        }

        if (!(await hasSchema(store.db))) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        } else {
          displayTableStats(await getTableStats(store.db));
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await store.close();
      }
    });
}
