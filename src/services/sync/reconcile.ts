/**
 * Reconciler - one canonical record per (period, region, category)
 *
 * Map-reduce over a dictionary keyed by the record key. The two metric
 * slots are merged independently: each takes the value of the
 * highest-priority source that supplies it.
 */

import {
  CATEGORY_NAMES,
  HEADLINE_CLASSIFICATION,
  VARIATION_CATEGORIES,
} from "./taxonomy.js";
import { ReconciliationConflictError } from "../../errors.js";
import { NATIONAL_REGION } from "../../types/index.js";

import type { TieBreakPolicy } from "../../config.js";
import type {
  CanonicalObservation,
  MetricKind,
  ReconciledRecord,
  SeriesKey,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface ReconcileOptions {
  /** What to do when two equal-priority sources disagree on a slot */
  tieBreak: TieBreakPolicy;
}

export interface ReconcileStats {
  observations: number;
  records: number;
  /** Slot values that lost to another source (expected overlap) */
  overlaps: number;
  /** Observations dropped because their slot is not allowed for the key */
  slotPolicyDrops: number;
}

export interface ReconcileResult {
  records: ReconciledRecord[];
  stats: ReconcileStats;
}

interface SlotCandidate {
  value: number;
  sourceId: string;
  priority: number;
}

interface Accumulator extends SeriesKey {
  period: string;
  slots: Partial<Record<MetricKind, SlotCandidate>>;
}

// ============================================================================
// Slot Policy
// ============================================================================

/**
 * Whether a key may carry a metric slot at all.
 * - INCIDENCE: every key but the national headline
 * - MOM_VARIATION: headline and analytical aggregates only
 */
export function isSlotAllowed(key: SeriesKey, metricKind: MetricKind): boolean {
  if (metricKind === "INCIDENCE") {
    return !(
      key.region === NATIONAL_REGION &&
      key.categoryName === CATEGORY_NAMES.HEADLINE &&
      key.classification === HEADLINE_CLASSIFICATION
    );
  }
  return VARIATION_CATEGORIES.has(key.categoryName);
}

function recordKey(observation: CanonicalObservation): string {
  return [
    observation.period,
    observation.region,
    observation.categoryName,
    observation.classification,
  ].join("\u0000");
}

function compareRecords(a: ReconciledRecord, b: ReconciledRecord): number {
  return (
    a.period.localeCompare(b.period) ||
    a.region.localeCompare(b.region) ||
    a.categoryName.localeCompare(b.categoryName) ||
    a.classification.localeCompare(b.classification)
  );
}

// ============================================================================
// Reconciler
// ============================================================================

export function reconcile(
  observations: readonly CanonicalObservation[],
  options: ReconcileOptions
): ReconcileResult {
  const stats: ReconcileStats = {
    observations: observations.length,
    records: 0,
    overlaps: 0,
    slotPolicyDrops: 0,
  };
  const byKey = new Map<string, Accumulator>();

  for (const observation of observations) {
    if (!isSlotAllowed(observation, observation.metricKind)) {
      stats.slotPolicyDrops++;
      continue;
    }

    const key = recordKey(observation);
    let accumulator = byKey.get(key);
    if (accumulator === undefined) {
      accumulator = {
        period: observation.period,
        region: observation.region,
        categoryName: observation.categoryName,
        classification: observation.classification,
        slots: {},
      };
      byKey.set(key, accumulator);
    }

    const incoming: SlotCandidate = {
      value: observation.value,
      sourceId: observation.sourceId,
      priority: observation.sourcePriority,
    };
    const current = accumulator.slots[observation.metricKind];

    if (current === undefined) {
      accumulator.slots[observation.metricKind] = incoming;
      continue;
    }

    stats.overlaps++;

    if (incoming.priority > current.priority) {
      accumulator.slots[observation.metricKind] = incoming;
    } else if (
      incoming.priority === current.priority &&
      options.tieBreak === "reject" &&
      incoming.value !== current.value
    ) {
      throw new ReconciliationConflictError(
        "Equal-priority sources disagree on a metric value",
        {
          period: observation.period,
          region: observation.region,
          categoryName: observation.categoryName,
          classification: observation.classification,
          metricKind: observation.metricKind,
          sources: [current.sourceId, incoming.sourceId],
          values: [current.value, incoming.value],
        }
      );
    }
  }

  const records: ReconciledRecord[] = [];
  for (const accumulator of byKey.values()) {
    records.push({
      period: accumulator.period,
      region: accumulator.region,
      categoryName: accumulator.categoryName,
      classification: accumulator.classification,
      incidence: accumulator.slots.INCIDENCE?.value ?? null,
      momVariation: accumulator.slots.MOM_VARIATION?.value ?? null,
    });
  }
  records.sort(compareRecords);
  stats.records = records.length;

  return { records, stats };
}
