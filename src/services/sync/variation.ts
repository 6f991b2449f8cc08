/**
 * Metric Calculator - month-over-month variation of index series
 *
 * Variations must be computed on the full history of a series and only
 * then cut to the load window: the reference month of the first period in
 * the window usually lies before it.
 */

import { isNextMonth } from "../../utils/periods.js";

import type {
  CanonicalObservation,
  ReshapedObservation,
} from "../../types/index.js";

export interface IndexPoint {
  period: string;
  value: number;
}

export interface VariationPoint {
  period: string;
  /** Percentage change versus the previous month */
  variation: number;
}

/**
 * Percentage change of each point versus the immediately preceding month.
 *
 * The first point never gets a value. A point whose previous month is
 * missing or zero gets none either. A period present more than once is
 * ambiguous: it neither gets a value nor serves as a reference.
 */
export function computeMomVariation(
  points: readonly IndexPoint[]
): VariationPoint[] {
  const occurrences = new Map<string, number>();
  for (const point of points) {
    occurrences.set(point.period, (occurrences.get(point.period) ?? 0) + 1);
  }

  const ordered = points
    .filter((point) => occurrences.get(point.period) === 1)
    .sort((a, b) => a.period.localeCompare(b.period));
  const result: VariationPoint[] = [];

  for (let i = 1; i < ordered.length; i++) {
    const previous = ordered[i - 1];
    const current = ordered[i];
    if (previous === undefined || current === undefined) {
      continue;
    }
    if (!isNextMonth(previous.period, current.period) || previous.value === 0) {
      continue;
    }
    result.push({
      period: current.period,
      variation: (current.value / previous.value - 1) * 100,
    });
  }

  return result;
}

function seriesKey(observation: ReshapedObservation): string {
  return [
    observation.sourceId,
    observation.region,
    observation.categoryName,
    observation.classification,
  ].join("\u0000");
}

/**
 * Turn index observations into MOM_VARIATION observations, one series at a
 * time (series = source + region + category + classification)
 */
export function computeSeriesVariations(
  observations: readonly ReshapedObservation[]
): CanonicalObservation[] {
  const series = new Map<string, ReshapedObservation[]>();
  for (const observation of observations) {
    const key = seriesKey(observation);
    const bucket = series.get(key);
    if (bucket === undefined) {
      series.set(key, [observation]);
    } else {
      bucket.push(observation);
    }
  }

  const result: CanonicalObservation[] = [];
  for (const bucket of series.values()) {
    const [template] = bucket;
    if (template === undefined) {
      continue;
    }
    for (const point of computeMomVariation(bucket)) {
      result.push({
        region: template.region,
        categoryName: template.categoryName,
        classification: template.classification,
        sourceId: template.sourceId,
        sourcePriority: template.sourcePriority,
        period: point.period,
        value: point.variation,
        metricKind: "MOM_VARIATION",
      });
    }
  }

  return result;
}
