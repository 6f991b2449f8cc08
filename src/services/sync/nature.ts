import { CATEGORY_NAMES, DIVISION_NATURE } from "./taxonomy.js";

import type { DataQualityLog } from "./quality.js";
import type {
  Nature,
  ReconciledRecord,
  WritableRecord,
} from "../../types/index.js";

export type NatureResult =
  | { kind: "derived"; nature: Nature }
  | { kind: "unknown"; categoryName: string; classification: string };

/**
 * Map a category to its economic nature.
 *
 * Only the division axis has a nature; every other axis is NONE. A division
 * missing from the table is reported as unknown instead of defaulting, so
 * upstream taxonomy changes surface as warnings.
 */
export function deriveNature(
  categoryName: string,
  classification: string
): NatureResult {
  if (categoryName !== CATEGORY_NAMES.DIVISION) {
    return { kind: "derived", nature: "NONE" };
  }

  const nature = DIVISION_NATURE.get(classification);
  if (nature === undefined) {
    return { kind: "unknown", categoryName, classification };
  }
  return { kind: "derived", nature };
}

/**
 * Attach nature to every record. Records of a division missing from the
 * nature table are dropped, with one warning per classification.
 */
export function attachNature(
  records: readonly ReconciledRecord[],
  quality: DataQualityLog
): WritableRecord[] {
  const writable: WritableRecord[] = [];
  const unknown = new Map<
    string,
    { categoryName: string; classification: string; records: number }
  >();

  for (const record of records) {
    const result = deriveNature(record.categoryName, record.classification);
    if (result.kind === "derived") {
      writable.push({ ...record, nature: result.nature });
      continue;
    }

    const key = `${result.categoryName}\u0000${result.classification}`;
    const entry = unknown.get(key);
    if (entry === undefined) {
      unknown.set(key, {
        categoryName: result.categoryName,
        classification: result.classification,
        records: 1,
      });
    } else {
      entry.records++;
    }
  }

  for (const entry of unknown.values()) {
    quality.record({ kind: "UNKNOWN_CLASSIFICATION", ...entry });
  }

  return writable;
}
