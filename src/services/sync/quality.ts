/**
 * Data-quality log - recoverable row and cell anomalies of a run.
 *
 * Every warning is logged once and counted so the run summary shows
 * what was skipped.
 */

import { syncLogger } from "../../logger.js";

export type DataQualityWarning =
  | {
      kind: "UNPARSEABLE_COLUMN";
      sourceId: string;
      column: string;
      reason: string;
    }
  | {
      kind: "DUPLICATE_SERIES";
      sourceId: string;
      column: string;
      /** Earlier column of the same source holding the same series */
      duplicateOf: string;
    }
  | {
      kind: "INVALID_CELL";
      sourceId: string;
      column: string;
      period: string;
      raw: string;
    }
  | {
      kind: "UNKNOWN_CLASSIFICATION";
      categoryName: string;
      classification: string;
      records: number;
    };

export type WarningKind = DataQualityWarning["kind"];

export type WarningCounts = Record<WarningKind, number>;

export class DataQualityLog {
  private readonly entries: DataQualityWarning[] = [];

  record(warning: DataQualityWarning): void {
    this.entries.push(warning);
    syncLogger.warn(warning, "Data-quality warning");
  }

  get warnings(): readonly DataQualityWarning[] {
    return this.entries;
  }

  get total(): number {
    return this.entries.length;
  }

  counts(): WarningCounts {
    const counts: WarningCounts = {
      UNPARSEABLE_COLUMN: 0,
      DUPLICATE_SERIES: 0,
      INVALID_CELL: 0,
      UNKNOWN_CLASSIFICATION: 0,
    };
    for (const entry of this.entries) {
      counts[entry.kind]++;
    }
    return counts;
  }
}
