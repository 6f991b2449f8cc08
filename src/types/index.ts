// ============================================================================
// Regions
// ============================================================================

export const REGIONS = [
  "Nacional",
  "GBA",
  "Pampeana",
  "NOA",
  "NEA",
  "Cuyo",
  "Patagonia",
] as const;

export type RegionName = (typeof REGIONS)[number];

export const NATIONAL_REGION: RegionName = "Nacional";

// ============================================================================
// Sources
// ============================================================================

/**
 * Taxonomy axis a source publishes its series on
 */
export type SourceAxis = "analytical" | "divisions" | "nature";

/**
 * What the values of a source measure.
 * - incidence: percentage-point contribution, loaded as-is
 * - index: index level, turned into month-over-month variation
 */
export type SourceMeasure = "incidence" | "index";

export interface SourceDefinition {
  id: string;
  description: string;
  url: string;
  axis: SourceAxis;
  measure: SourceMeasure;
  /** Higher wins when two sources supply the same slot */
  priority: number;
  /** Leading token of every series column (e.g. "ipc") */
  seriesPrefix: string;
}

/**
 * A source response as read from CSV: header plus data rows, all strings
 */
export interface WideTable {
  header: string[];
  rows: string[][];
}

// ============================================================================
// Observations
// ============================================================================

export type MetricKind = "INCIDENCE" | "MOM_VARIATION";

export interface SeriesKey {
  region: RegionName;
  categoryName: string;
  classification: string;
}

/**
 * One (period, series) cell of a wide table, before a metric kind is assigned
 */
export interface ReshapedObservation extends SeriesKey {
  /** First day of month, YYYY-MM-01 */
  period: string;
  value: number;
  sourceId: string;
  sourcePriority: number;
}

export interface CanonicalObservation extends ReshapedObservation {
  metricKind: MetricKind;
}

/**
 * One canonical fact per (period, region, category) after reconciliation
 */
export interface ReconciledRecord extends SeriesKey {
  period: string;
  incidence: number | null;
  momVariation: number | null;
}

// ============================================================================
// Nature
// ============================================================================

export type Nature = "GOODS" | "SERVICES" | "MIXED" | "NONE";

export interface WritableRecord extends ReconciledRecord {
  nature: Nature;
}
