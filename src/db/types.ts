import type { Generated, Insertable, Selectable, Updateable } from "kysely";

// ============================================================================
// ENUM Types
// ============================================================================

export type NatureTag = "GOODS" | "SERVICES" | "MIXED";

export type RunStatus = "SUCCEEDED" | "FAILED";

// ============================================================================
// Dimension Tables
// ============================================================================

/**
 * dim_region - closed set of 7 regions, looked up by name
 */
export interface DimRegionTable {
  region_id: Generated<number>;
  region_name: string;
}

/**
 * dim_category - identity is (category_name, classification); only
 * nature is ever refreshed
 */
export interface DimCategoryTable {
  category_id: Generated<number>;
  category_name: string;
  classification: string;
  nature: NatureTag | null;
}

// ============================================================================
// Fact Tables
// ============================================================================

/**
 * fact_inflation - one row per (period, region, category).
 * DATE and NUMERIC are parsed to string and number by the pg type parsers.
 */
export interface FactInflationTable {
  /** YYYY-MM-01 */
  period: string;
  region_id: number;
  category_id: number;
  incidence: number | null;
  mom_variation: number | null;
}

/**
 * load_runs - journal of non-dry sync runs
 */
export interface LoadRunsTable {
  run_id: Generated<number>;
  started_at: string;
  finished_at: string;
  status: RunStatus;
  window_reason: string;
  period_from: string;
  period_to: string | null;
  rows_inserted: number;
  rows_updated: number;
  warnings: number;
  error: string | null;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  dim_region: DimRegionTable;
  dim_category: DimCategoryTable;
  fact_inflation: FactInflationTable;
  load_runs: LoadRunsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type DimRegion = Selectable<DimRegionTable>;
export type NewDimRegion = Insertable<DimRegionTable>;

export type DimCategory = Selectable<DimCategoryTable>;
export type NewDimCategory = Insertable<DimCategoryTable>;
export type DimCategoryUpdate = Updateable<DimCategoryTable>;

export type FactInflation = Selectable<FactInflationTable>;
export type NewFactInflation = Insertable<FactInflationTable>;

export type LoadRun = Selectable<LoadRunsTable>;
export type NewLoadRun = Insertable<LoadRunsTable>;
