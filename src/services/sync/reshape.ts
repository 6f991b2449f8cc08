/**
 * Reshaper - wide source tables to long observations
 *
 * One observation per (row, series column) with a numeric value. Empty
 * cells mean "not applicable" and are dropped. The period column and at
 * least one series column are a structural contract: a table without them,
 * or with one bad period, fails as a whole.
 */

import { parseColumn, type ColumnParse } from "./columns.js";
import { EmptySourceError, MalformedSourceError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { parsePeriod } from "../../utils/periods.js";

import type { DataQualityLog } from "./quality.js";
import type {
  ReshapedObservation,
  SeriesKey,
  SourceDefinition,
  WideTable,
} from "../../types/index.js";

/** Cell markers the publisher uses for missing values */
const MISSING_MARKERS: ReadonlySet<string> = new Set([
  "",
  "na",
  "n/a",
  "nan",
  "null",
  "-",
  "...",
]);

/** Plain decimal notation; no exponents, hex or thousands separators */
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

interface SeriesColumn {
  index: number;
  column: string;
  key: SeriesKey;
}

/**
 * Parse a numeric cell. Returns null for missing markers and undefined
 * for values that are present but not numbers.
 */
export function parseCellValue(raw: string): number | null | undefined {
  const trimmed = raw.trim();
  if (MISSING_MARKERS.has(trimmed.toLowerCase())) {
    return null;
  }
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

function seriesId(key: SeriesKey): string {
  return [key.region, key.categoryName, key.classification].join("\u0000");
}

function classifyColumns(
  table: WideTable,
  source: SourceDefinition,
  quality: DataQualityLog
): { periodIndex: number; series: SeriesColumn[] } {
  let periodIndex = -1;
  const series: SeriesColumn[] = [];
  const seen = new Map<string, string>();

  table.header.forEach((column, index) => {
    const parsed: ColumnParse = parseColumn(column, source);
    switch (parsed.kind) {
      case "period":
        if (periodIndex === -1) {
          periodIndex = index;
        }
        break;
      case "series": {
        const id = seriesId(parsed.key);
        const first = seen.get(id);
        if (first !== undefined) {
          // Two columns of one series would interleave in the same bucket
          quality.record({
            kind: "DUPLICATE_SERIES",
            sourceId: source.id,
            column,
            duplicateOf: first,
          });
          break;
        }
        seen.set(id, column);
        series.push({ index, column, key: parsed.key });
        break;
      }
      case "metadata":
        syncLogger.debug(
          { sourceId: source.id, column },
          "Passing through metadata column"
        );
        break;
      case "unparseable":
        quality.record({
          kind: "UNPARSEABLE_COLUMN",
          sourceId: source.id,
          column,
          reason: parsed.reason,
        });
        break;
    }
  });

  return { periodIndex, series };
}

/**
 * Reshape a wide table into observations without a metric kind
 */
export function reshapeWideTable(
  table: WideTable,
  source: SourceDefinition,
  quality: DataQualityLog
): ReshapedObservation[] {
  if (table.header.length === 0 || table.rows.length === 0) {
    throw new EmptySourceError(source.id);
  }

  const { periodIndex, series } = classifyColumns(table, source, quality);
  if (periodIndex === -1) {
    throw new MalformedSourceError(source.id, "no period column found", {
      header: table.header,
    });
  }
  if (series.length === 0) {
    throw new MalformedSourceError(source.id, "no series columns found", {
      header: table.header,
    });
  }

  const observations: ReshapedObservation[] = [];

  table.rows.forEach((row, rowIndex) => {
    const rawPeriod = row[periodIndex] ?? "";
    const period = parsePeriod(rawPeriod);
    if (period === null) {
      throw new MalformedSourceError(source.id, "malformed period", {
        row: rowIndex + 1,
        value: rawPeriod,
      });
    }

    for (const { index, column, key } of series) {
      const raw = row[index] ?? "";
      const value = parseCellValue(raw);
      if (value === null) {
        continue;
      }
      if (value === undefined) {
        quality.record({
          kind: "INVALID_CELL",
          sourceId: source.id,
          column,
          period,
          raw,
        });
        continue;
      }

      observations.push({
        ...key,
        period,
        value,
        sourceId: source.id,
        sourcePriority: source.priority,
      });
    }
  });

  syncLogger.debug(
    {
      sourceId: source.id,
      rows: table.rows.length,
      seriesColumns: series.length,
      observations: observations.length,
    },
    "Reshaped source table"
  );

  return observations;
}

/**
 * Keep observations on or after the window start
 */
export function filterFromPeriod<T extends { period: string }>(
  observations: readonly T[],
  from: string
): T[] {
  return observations.filter((observation) => observation.period >= from);
}
