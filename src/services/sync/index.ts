// Sync Services - Re-exports
export {
  SyncService,
  buildRecords,
  type RecordBatch,
  type SyncRunOptions,
  type SyncRunSummary,
  type SourceSummary,
} from "./pipeline.js";
export {
  RemoteSourceCollector,
  type ObservationCollector,
  type CollectedObservations,
} from "./collect.js";
export {
  LongCsvCollector,
  formatLongCsv,
  readLongTable,
  summarizeLongRows,
  toLongRows,
  type LongDistribution,
  type LongRow,
} from "./long-csv.js";
export { RunJournal } from "./runs.js";
export {
  IncrementalWriter,
  batchUpsertFacts,
  getLatestPeriod,
  roundDecimal,
  type WriteResult,
} from "./upsert.js";
export { DimensionResolver, type DimensionStats } from "./dimensions.js";
export { reconcile, isSlotAllowed, type ReconcileStats } from "./reconcile.js";
export { reshapeWideTable, filterFromPeriod } from "./reshape.js";
export { computeMomVariation, computeSeriesVariations } from "./variation.js";
export { computeRevisionWindow, type RevisionWindow } from "./revision-window.js";
export { attachNature, deriveNature } from "./nature.js";
export { DataQualityLog, type DataQualityWarning } from "./quality.js";
