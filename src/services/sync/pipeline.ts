/**
 * Sync pipeline - one incremental load of the consumer price star schema
 *
 * Collect observations (published sources or a long CSV file), reconcile,
 * attach nature, then write. Nothing is written until every source has been
 * read, so a structural failure in any source leaves the store untouched.
 */

import {
  RemoteSourceCollector,
  type ObservationCollector,
  type SourceSummary,
} from "./collect.js";
import { attachNature } from "./nature.js";
import { reconcile } from "./reconcile.js";
import { computeRevisionWindow, type RevisionWindow } from "./revision-window.js";
import { RunJournal } from "./runs.js";
import { DataQualityLog, type WarningCounts } from "./quality.js";
import { getLatestPeriod, IncrementalWriter, type WriteResult } from "./upsert.js";
import { createSourceFetcher, type TableFetcher } from "../../scraper/client.js";
import { IPC_SOURCES } from "../../scraper/sources.js";
import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { AppConfig, TieBreakPolicy } from "../../config.js";
import type { Database } from "../../db/types.js";
import type { SourceDefinition, WritableRecord } from "../../types/index.js";
import type { Kysely } from "kysely";

export type { SourceSummary } from "./collect.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncRunOptions {
  /** Reprocess from this date (YYYY-MM or YYYY-MM-DD) instead of the window */
  from?: string;
  /** Run everything but the write */
  dryRun?: boolean;
}

export interface SyncRunSummary {
  window: RevisionWindow;
  periodFrom: string;
  periodTo: string | null;
  /** Canonical records produced (written or not) */
  records: number;
  rowsInserted: number;
  rowsUpdated: number;
  rowsUnchanged: number;
  warnings: number;
  warningsByKind: WarningCounts;
  overlaps: number;
  slotPolicyDrops: number;
  sources: SourceSummary[];
  dryRun: boolean;
  durationMs: number;
}

export interface SyncServiceOptions {
  /** Replaces the remote sources (e.g. a long CSV file) */
  collector?: ObservationCollector;
  fetchTable?: TableFetcher;
  sources?: readonly SourceDefinition[];
}

export interface RecordBatch {
  records: WritableRecord[];
  overlaps: number;
  slotPolicyDrops: number;
  sources: SourceSummary[];
}

type SyncConfig = Pick<
  AppConfig,
  | "startDate"
  | "fetchTimeoutMs"
  | "fetchMaxRetries"
  | "revisionWindowMonths"
  | "tieBreak"
>;

// ============================================================================
// Record Building
// ============================================================================

/**
 * Collect, reconcile and attach nature: everything a run does before writing
 */
export async function buildRecords(
  collector: ObservationCollector,
  from: string,
  tieBreak: TieBreakPolicy,
  quality: DataQualityLog
): Promise<RecordBatch> {
  const { observations, sources } = await collector.collect(from, quality);
  const reconciled = reconcile(observations, { tieBreak });
  return {
    records: attachNature(reconciled.records, quality),
    overlaps: reconciled.stats.overlaps,
    slotPolicyDrops: reconciled.stats.slotPolicyDrops,
    sources,
  };
}

const NO_WRITES: WriteResult = {
  inserted: 0,
  updated: 0,
  unchanged: 0,
  skippedEmpty: 0,
  regionsCreated: 0,
  categoriesCreated: 0,
  naturesRefreshed: 0,
};

// ============================================================================
// Sync Service
// ============================================================================

export class SyncService {
  private collector: ObservationCollector;
  private journal: RunJournal;

  constructor(
    private db: Kysely<Database>,
    private config: SyncConfig,
    options: SyncServiceOptions = {}
  ) {
    this.collector =
      options.collector ??
      new RemoteSourceCollector(
        options.fetchTable ??
          createSourceFetcher({
            timeoutMs: config.fetchTimeoutMs,
            maxRetries: config.fetchMaxRetries,
          }),
        options.sources ?? IPC_SOURCES
      );
    this.journal = new RunJournal(db);
  }

  async run(options: SyncRunOptions = {}): Promise<SyncRunSummary> {
    const dryRun = options.dryRun === true;
    const startedAt = new Date();
    const startTime = performance.now();
    const quality = new DataQualityLog();

    const latestLoaded = await getLatestPeriod(this.db);
    const window = computeRevisionWindow({
      latestLoaded,
      revisionMonths: this.config.revisionWindowMonths,
      initialStart: this.config.startDate,
      explicitStart: options.from,
    });
    syncLogger.info({ ...window, dryRun }, "Starting sync run");

    try {
      // 1. Collect, reconcile, attach nature
      const { records, overlaps, slotPolicyDrops, sources } =
        await buildRecords(
          this.collector,
          window.start,
          this.config.tieBreak,
          quality
        );

      // 2. Write
      const written = dryRun
        ? NO_WRITES
        : await new IncrementalWriter(this.db).write(records);

      const summary: SyncRunSummary = {
        window,
        periodFrom: window.start,
        periodTo: records.at(-1)?.period ?? null,
        records: records.length,
        rowsInserted: written.inserted,
        rowsUpdated: written.updated,
        rowsUnchanged: written.unchanged,
        warnings: quality.total,
        warningsByKind: quality.counts(),
        overlaps,
        slotPolicyDrops,
        sources,
        dryRun,
        durationMs: Math.round(performance.now() - startTime),
      };

      if (!dryRun) {
        await this.journal.record({
          started_at: startedAt.toISOString(),
          finished_at: new Date().toISOString(),
          status: "SUCCEEDED",
          window_reason: window.reason,
          period_from: summary.periodFrom,
          period_to: summary.periodTo,
          rows_inserted: summary.rowsInserted,
          rows_updated: summary.rowsUpdated,
          warnings: summary.warnings,
          error: null,
        });
      }

      syncLogger.info(
        {
          periodFrom: summary.periodFrom,
          periodTo: summary.periodTo,
          inserted: summary.rowsInserted,
          updated: summary.rowsUpdated,
          unchanged: summary.rowsUnchanged,
          warnings: summary.warnings,
          durationMs: summary.durationMs,
        },
        "Sync run completed"
      );
      return summary;
    } catch (error) {
      syncLogger.error({ error: errorMessage(error) }, "Sync run failed");
      if (!dryRun) {
        await this.recordFailure(startedAt, window, quality.total, error);
      }
      throw error;
    }
  }

  private async recordFailure(
    startedAt: Date,
    window: RevisionWindow,
    warnings: number,
    error: unknown
  ): Promise<void> {
    try {
      await this.journal.record({
        started_at: startedAt.toISOString(),
        finished_at: new Date().toISOString(),
        status: "FAILED",
        window_reason: window.reason,
        period_from: window.start,
        period_to: null,
        rows_inserted: 0,
        rows_updated: 0,
        warnings,
        error: errorMessage(error),
      });
    } catch (journalError) {
      // The run error is what the caller sees
      syncLogger.error(
        { error: errorMessage(journalError) },
        "Failed to journal failed run"
      );
    }
  }
}
