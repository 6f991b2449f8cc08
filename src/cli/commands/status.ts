import chalk from "chalk";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import { getTableStats, hasSchema } from "../../db/migrate.js";
import { getLatestPeriod, RunJournal } from "../../services/sync/index.js";
import { displayRunsTable, displayTableStats } from "../utils/display.js";
import { openDatabase, type CliDatabase } from "../utils/database.js";

import type { Command } from "commander";

// ============================================================================
// Status Command
// ============================================================================

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show latest loaded period, row counts and recent runs")
    .option("--runs <n>", "Number of runs to show", "10")
    .option("--sqlite <file>", "Use a SQLite file instead of PostgreSQL")
    .action(async (options: { runs: string; sqlite?: string }) => {
      const limit = Number.parseInt(options.runs, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        console.error(chalk.red(`Invalid --runs value: ${options.runs}`));
        process.exitCode = 1;
        return;
      }

      const spinner = ora("Reading store status...").start();
      let store: CliDatabase;
      try {
        store = await openDatabase(options.sqlite);
      } catch (error) {
        spinner.fail(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      try {
        if (!(await hasSchema(store.db))) {
          spinner.warn("Schema not initialized (run 'db migrate')");
          return;
        }

        const journal = new RunJournal(store.db);
        const [latest, stats, runs, lastSuccessful] = await Promise.all([
          getLatestPeriod(store.db),
          getTableStats(store.db),
          journal.listRecent(limit),
          journal.getLastSuccessful(),
        ]);
        spinner.succeed(`Store: ${store.target}`);

        console.log(
          `\nLatest loaded period: ${latest ?? chalk.gray("none (empty store)")}`
        );
        if (lastSuccessful !== undefined) {
          console.log(
            `Last successful run:  #${String(lastSuccessful.run_id)} at ${lastSuccessful.finished_at.slice(0, 19)}`
          );
        }
        displayTableStats(stats);

        console.log(chalk.bold("\nRecent runs:"));
        displayRunsTable(runs);
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await store.close();
      }
    });
}
