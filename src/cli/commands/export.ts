import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import ora from "ora";

import { loadConfig } from "../../config.js";
import { errorMessage, isStructuralError } from "../../errors.js";
import { logger } from "../../logger.js";
import { createSourceFetcher } from "../../scraper/client.js";
import { IPC_SOURCES } from "../../scraper/sources.js";
import {
  DataQualityLog,
  RemoteSourceCollector,
  buildRecords,
  computeRevisionWindow,
  formatLongCsv,
  summarizeLongRows,
  toLongRows,
} from "../../services/sync/index.js";
import { displayDistribution } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Export Command
// ============================================================================

export function registerExportCommand(program: Command): void {
  program
    .command("export <file>")
    .description("Write the reconciled series to a long CSV file")
    .option("--from <date>", "First month to export (default: START_DATE)")
    .addHelpText(
      "after",
      `
Reads the published sources without touching the database. The file has one
row per period, series and metric and can be loaded with 'sync --file'.

Examples:
  ipc-loader export ./data/ipc.csv
  ipc-loader export ./data/ipc-2024.csv --from 2024-01
`
    )
    .action(async (file: string, options: { from?: string }) => {
      const spinner = ora("Fetching sources...").start();

      try {
        const config = loadConfig();
        const window = computeRevisionWindow({
          latestLoaded: null,
          revisionMonths: config.revisionWindowMonths,
          initialStart: config.startDate,
          explicitStart: options.from,
        });

        const quality = new DataQualityLog();
        const collector = new RemoteSourceCollector(
          createSourceFetcher({
            timeoutMs: config.fetchTimeoutMs,
            maxRetries: config.fetchMaxRetries,
          }),
          IPC_SOURCES
        );
        const batch = await buildRecords(
          collector,
          window.start,
          config.tieBreak,
          quality
        );
        const rows = toLongRows(batch.records);

        mkdirSync(dirname(file), { recursive: true });
        writeFileSync(file, formatLongCsv(rows), "utf-8");

        spinner.succeed(`Wrote ${String(rows.length)} rows to ${file}`);
        displayDistribution(summarizeLongRows(rows), quality.total);
      } catch (error) {
        const code = isStructuralError(error) ? error.code : "UNEXPECTED";
        spinner.fail(`Export failed [${code}]: ${errorMessage(error)}`);
        logger.error({ error }, "Export command failed");
        process.exitCode = 1;
      }
    });
}
