import { readFileSync } from "node:fs";
import { basename } from "node:path";

import ora from "ora";

import { loadConfig } from "../../config.js";
import { errorMessage, isStructuralError } from "../../errors.js";
import { hasSchema, runMigration } from "../../db/migrate.js";
import { logger } from "../../logger.js";
import { LongCsvCollector, SyncService } from "../../services/sync/index.js";
import { displaySyncSummary } from "../utils/display.js";
import { openDatabase, type CliDatabase } from "../utils/database.js";

import type { AppConfig } from "../../config.js";
import type { ObservationCollector } from "../../services/sync/index.js";
import type { Command } from "commander";

// ============================================================================
// Sync Command
// ============================================================================

interface SyncCommandOptions {
  from?: string;
  dryRun?: boolean;
  file?: string;
  sqlite?: string;
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Load consumer price series into the star schema")
    .option(
      "--from <date>",
      "Reprocess from this month on (YYYY-MM or YYYY-MM-DD)"
    )
    .option("--dry-run", "Fetch, reshape and reconcile without writing")
    .option("--file <csv>", "Load a long CSV (see 'export') instead of the sources")
    .option("--sqlite <file>", "Use a SQLite file instead of PostgreSQL")
    .addHelpText(
      "after",
      `
Without --from, a run starts a few months before the latest stored period
(REVISION_WINDOW_MONTHS) so revised figures are picked up; an empty store is
loaded from START_DATE. Re-running over unchanged data writes nothing.

Examples:
  ipc-loader sync
  ipc-loader sync --from 2024-01 --dry-run
  ipc-loader sync --sqlite ./data/ipc.db
  ipc-loader sync --file ./data/ipc.csv --from 2023-12
`
    )
    .action(async (options: SyncCommandOptions) => {
      const spinner = ora("Preparing sync...").start();

      let config: AppConfig;
      let collector: ObservationCollector | undefined;
      let store: CliDatabase;
      try {
        config = loadConfig();
        if (options.file !== undefined) {
          collector = new LongCsvCollector(
            basename(options.file),
            readFileSync(options.file, "utf-8")
          );
        }
        store = await openDatabase(options.sqlite);
      } catch (error) {
        spinner.fail(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      try {
        if (store.dialect === "sqlite") {
          await runMigration(store.db, { dialect: "sqlite" });
        } else if (!(await hasSchema(store.db))) {
          spinner.fail("Schema not initialized (run 'db migrate')");
          process.exitCode = 1;
          return;
        }

        const reading =
          options.file === undefined ? "Fetching sources" : `Reading ${options.file}`;
        spinner.text =
          options.dryRun === true ? `${reading} (dry run)...` : `${reading}...`;

        const service = new SyncService(store.db, config, { collector });
        const summary = await service.run({
          from: options.from,
          dryRun: options.dryRun,
        });

        spinner.succeed(
          options.dryRun === true
            ? `Dry run: ${String(summary.records)} records reconciled`
            : `Inserted ${String(summary.rowsInserted)}, updated ${String(summary.rowsUpdated)}`
        );
        displaySyncSummary(summary);
      } catch (error) {
        const code = isStructuralError(error) ? error.code : "UNEXPECTED";
        spinner.fail(`Sync failed [${code}]: ${errorMessage(error)}`);
        logger.error({ error }, "Sync command failed");
        process.exitCode = 1;
      } finally {
        await store.close();
      }
    });
}
