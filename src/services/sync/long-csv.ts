/**
 * Long CSV - the consolidated dataset as one row per (period, series, metric)
 *
 * Columns: indice_tiempo, valor, region, categoria, clasificacion, metrica.
 * Files written without `metrica` carry incidence only and still load.
 */

import { stringify } from "csv-stringify/sync";

import { filterFromPeriod, parseCellValue } from "./reshape.js";
import { roundDecimal } from "./upsert.js";
import { EmptySourceError, MalformedSourceError } from "../../errors.js";
import { parseWideCsv } from "../../scraper/client.js";
import { syncLogger } from "../../logger.js";
import { REGIONS } from "../../types/index.js";
import { parsePeriod } from "../../utils/periods.js";

import type {
  CollectedObservations,
  ObservationCollector,
} from "./collect.js";
import type { DataQualityLog } from "./quality.js";
import type {
  CanonicalObservation,
  MetricKind,
  RegionName,
  WideTable,
  WritableRecord,
} from "../../types/index.js";

// ============================================================================
// Format
// ============================================================================

export const LONG_CSV_COLUMNS = [
  "indice_tiempo",
  "valor",
  "region",
  "categoria",
  "clasificacion",
  "metrica",
] as const;

type LongColumn = (typeof LONG_CSV_COLUMNS)[number];

const REQUIRED_COLUMNS: readonly LongColumn[] = LONG_CSV_COLUMNS.filter(
  (column) => column !== "metrica"
);

const METRIC_KINDS: readonly MetricKind[] = ["INCIDENCE", "MOM_VARIATION"];

export interface LongRow {
  period: string;
  value: number;
  region: RegionName;
  categoryName: string;
  classification: string;
  metricKind: MetricKind;
}

function isRegionName(value: string): value is RegionName {
  return REGIONS.some((region) => region === value);
}

function isMetricKind(value: string): value is MetricKind {
  return METRIC_KINDS.some((kind) => kind === value);
}

// ============================================================================
// Export
// ============================================================================

/**
 * Flatten records into long rows, one per filled metric slot
 */
export function toLongRows(records: readonly WritableRecord[]): LongRow[] {
  const rows: LongRow[] = [];
  for (const record of records) {
    const base = {
      period: record.period,
      region: record.region,
      categoryName: record.categoryName,
      classification: record.classification,
    };
    if (record.incidence !== null) {
      rows.push({
        ...base,
        value: roundDecimal(record.incidence),
        metricKind: "INCIDENCE",
      });
    }
    if (record.momVariation !== null) {
      rows.push({
        ...base,
        value: roundDecimal(record.momVariation),
        metricKind: "MOM_VARIATION",
      });
    }
  }
  return rows;
}

/**
 * Render long rows as CSV with a UTF-8 BOM and a header line
 */
export function formatLongCsv(rows: readonly LongRow[]): string {
  return stringify(
    rows.map(
      (row): Record<LongColumn, string | number> => ({
        indice_tiempo: row.period,
        valor: row.value,
        region: row.region,
        categoria: row.categoryName,
        clasificacion: row.classification,
        metrica: row.metricKind,
      })
    ),
    { bom: true, header: true, columns: [...LONG_CSV_COLUMNS] }
  );
}

export interface DistributionEntry {
  name: string;
  rows: number;
}

export interface LongDistribution {
  rows: number;
  periodFrom: string | null;
  periodTo: string | null;
  byRegion: DistributionEntry[];
  byCategory: DistributionEntry[];
}

function countBy(
  rows: readonly LongRow[],
  pick: (row: LongRow) => string
): DistributionEntry[] {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const name = pick(row);
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return [...counts]
    .map(([name, count]) => ({ name, rows: count }))
    .sort((a, b) => b.rows - a.rows || a.name.localeCompare(b.name));
}

/**
 * Row counts per region and per category, largest first
 */
export function summarizeLongRows(rows: readonly LongRow[]): LongDistribution {
  const periods = rows.map((row) => row.period).sort();
  return {
    rows: rows.length,
    periodFrom: periods[0] ?? null,
    periodTo: periods.at(-1) ?? null,
    byRegion: countBy(rows, (row) => row.region),
    byCategory: countBy(rows, (row) => row.categoryName),
  };
}

// ============================================================================
// Load
// ============================================================================

/**
 * Read a long table into canonical observations of one source
 */
export function readLongTable(
  table: WideTable,
  sourceId: string,
  quality: DataQualityLog
): CanonicalObservation[] {
  if (table.header.length === 0 || table.rows.length === 0) {
    throw new EmptySourceError(sourceId);
  }

  const header = table.header.map((column) => column.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new MalformedSourceError(
      sourceId,
      `missing columns: ${missing.join(", ")}`,
      { header: table.header }
    );
  }

  const indexOf = (column: LongColumn): number => header.indexOf(column);
  const metricIndex = indexOf("metrica");
  const observations: CanonicalObservation[] = [];

  table.rows.forEach((row, rowIndex) => {
    const cell = (column: LongColumn): string =>
      (row[indexOf(column)] ?? "").trim();

    const rawPeriod = cell("indice_tiempo");
    const period = parsePeriod(rawPeriod);
    if (period === null) {
      throw new MalformedSourceError(sourceId, "malformed period", {
        row: rowIndex + 1,
        value: rawPeriod,
      });
    }

    const invalid = (column: LongColumn, raw: string): void => {
      quality.record({ kind: "INVALID_CELL", sourceId, column, period, raw });
    };

    const region = cell("region");
    if (!isRegionName(region)) {
      invalid("region", region);
      return;
    }

    const categoryName = cell("categoria");
    const classification = cell("clasificacion");
    if (categoryName === "" || classification === "") {
      invalid(categoryName === "" ? "categoria" : "clasificacion", "");
      return;
    }

    const metric =
      metricIndex === -1 ? "INCIDENCE" : cell("metrica").toUpperCase();
    if (!isMetricKind(metric)) {
      invalid("metrica", metric);
      return;
    }

    const raw = cell("valor");
    const value = parseCellValue(raw);
    if (value === null) {
      return;
    }
    if (value === undefined) {
      invalid("valor", raw);
      return;
    }

    observations.push({
      region,
      categoryName,
      classification,
      period,
      value,
      sourceId,
      sourcePriority: 0,
      metricKind: metric,
    });
  });

  return observations;
}

/**
 * Collects observations from a long CSV file body (see formatLongCsv)
 */
export class LongCsvCollector implements ObservationCollector {
  constructor(
    private sourceId: string,
    private text: string
  ) {}

  async collect(
    from: string,
    quality: DataQualityLog
  ): Promise<CollectedObservations> {
    const table = parseWideCsv(this.sourceId, this.text);
    const observations = filterFromPeriod(
      readLongTable(table, this.sourceId, quality),
      from
    );

    syncLogger.info(
      { sourceId: this.sourceId, observations: observations.length },
      "Long CSV processed"
    );
    return {
      observations,
      sources: [{ id: this.sourceId, observations: observations.length }],
    };
  }
}
