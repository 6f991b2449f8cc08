/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStat } from "../../db/migrate.js";
import type { LoadRun } from "../../db/types.js";
import type { LongDistribution } from "../../services/sync/long-csv.js";
import type { SyncRunSummary } from "../../services/sync/pipeline.js";

/**
 * Display the outcome of a sync run
 */
export function displaySyncSummary(summary: SyncRunSummary): void {
  console.log(
    chalk.bold(
      `\nSync ${summary.dryRun ? "dry run" : "run"} (${summary.window.reason} window)\n`
    )
  );

  const range = `${summary.periodFrom} → ${summary.periodTo ?? chalk.gray("no data")}`;
  console.log(`  Periods:        ${range}`);
  if (summary.window.latestLoaded !== null) {
    console.log(`  Latest stored:  ${summary.window.latestLoaded}`);
  }
  console.log(`  Records:        ${String(summary.records)}`);
  console.log(`  Duration:       ${String(summary.durationMs)}ms`);
  console.log();

  const table = new CliTable3({
    head: [chalk.cyan("Metric"), chalk.cyan("Count")],
    colWidths: [28, 12],
  });
  table.push(
    ["Inserted", chalk.green(String(summary.rowsInserted))],
    ["Updated", chalk.yellow(String(summary.rowsUpdated))],
    ["Unchanged", String(summary.rowsUnchanged)],
    ["Source overlaps", String(summary.overlaps)],
    ["Slot policy drops", String(summary.slotPolicyDrops)],
    [
      "Warnings",
      summary.warnings > 0
        ? chalk.yellow(String(summary.warnings))
        : String(summary.warnings),
    ]
  );
  console.log(table.toString());

  if (summary.warnings > 0) {
    console.log(chalk.bold("\nWarnings by kind:"));
    for (const [kind, count] of Object.entries(summary.warningsByKind)) {
      if (count > 0) {
        console.log(`  ${kind}: ${String(count)}`);
      }
    }
  }

  console.log(chalk.bold("\nSources:"));
  for (const source of summary.sources) {
    console.log(
      `  ${chalk.cyan(source.id.padEnd(24))} ${String(source.observations)} observations`
    );
  }
  console.log();
}

/**
 * Display table row counts
 */
export function displayTableStats(stats: readonly TableStat[]): void {
  console.log(chalk.bold("\nTable statistics:"));
  for (const row of stats) {
    console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
  }
}

/**
 * Display the load_runs journal
 */
export function displayRunsTable(runs: readonly LoadRun[]): void {
  if (runs.length === 0) {
    console.log(chalk.gray("No runs recorded yet"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Run"),
      chalk.cyan("Started"),
      chalk.cyan("Status"),
      chalk.cyan("Window"),
      chalk.cyan("From"),
      chalk.cyan("To"),
      chalk.cyan("Ins"),
      chalk.cyan("Upd"),
      chalk.cyan("Warn"),
    ],
  });

  for (const run of runs) {
    table.push([
      String(run.run_id),
      run.started_at.slice(0, 19),
      run.status === "SUCCEEDED" ? chalk.green(run.status) : chalk.red(run.status),
      run.window_reason,
      run.period_from.slice(0, 10),
      run.period_to?.slice(0, 10) ?? chalk.gray("-"),
      String(run.rows_inserted),
      String(run.rows_updated),
      String(run.warnings),
    ]);
  }

  console.log(table.toString());

  const failed = runs.filter((run) => run.status === "FAILED");
  for (const run of failed) {
    console.log(chalk.red(`  Run ${String(run.run_id)}: ${run.error ?? "unknown error"}`));
  }
}

function distributionTable(
  title: string,
  entries: LongDistribution["byRegion"]
): string {
  const table = new CliTable3({
    head: [chalk.cyan(title), chalk.cyan("Rows")],
    colWidths: [28, 12],
  });
  for (const entry of entries) {
    table.push([entry.name, String(entry.rows)]);
  }
  return table.toString();
}

/**
 * Display what an exported long CSV contains
 */
export function displayDistribution(
  distribution: LongDistribution,
  warnings: number
): void {
  const range =
    distribution.periodFrom === null
      ? chalk.gray("no data")
      : `${distribution.periodFrom} → ${distribution.periodTo ?? distribution.periodFrom}`;

  console.log(chalk.bold("\nExported dataset\n"));
  console.log(`  Rows:           ${String(distribution.rows)}`);
  console.log(`  Periods:        ${range}`);
  if (warnings > 0) {
    console.log(`  Warnings:       ${chalk.yellow(String(warnings))}`);
  }
  console.log();
  console.log(distributionTable("Region", distribution.byRegion));
  console.log(distributionTable("Category", distribution.byCategory));
}
