/**
 * Incremental Writer - idempotent, transactional upsert of canonical facts
 *
 * Each fact is keyed by (period, region_id, category_id). A value that is
 * absent in the incoming record never erases a stored one: slots merge as
 * `incoming ?? stored`. Rows whose merged values equal the stored ones are
 * not written at all, so a re-run over unchanged data performs zero writes.
 */

import { DimensionResolver, type DimensionStats } from "./dimensions.js";
import { errorMessage, WriteError } from "../../errors.js";
import { dbLogger } from "../../logger.js";
import { toStoredPeriod } from "../../utils/periods.js";

import type {
  Database,
  FactInflation,
  NewFactInflation,
} from "../../db/types.js";
import type { WritableRecord } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface WriteResult extends DimensionStats {
  inserted: number;
  updated: number;
  /** Records already stored with identical values */
  unchanged: number;
  /** Records without any metric value */
  skippedEmpty: number;
}

/** Decimal places stored for every metric (NUMERIC(18, 4)) */
export const METRIC_SCALE = 4;

const DEFAULT_BATCH_SIZE = 500;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Round to a fixed number of decimals, the precision the store keeps
 */
export function roundDecimal(value: number, places = METRIC_SCALE): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : roundDecimal(value);
}

function factKey(period: string, regionId: number, categoryId: number): string {
  return `${period}|${String(regionId)}|${String(categoryId)}`;
}

/**
 * Latest period present in fact_inflation, or null for an empty store
 */
export async function getLatestPeriod(
  db: Kysely<Database>
): Promise<string | null> {
  const row = await db
    .selectFrom("fact_inflation")
    .select("period")
    .orderBy("period", "desc")
    .limit(1)
    .executeTakeFirst();
  return row === undefined ? null : toStoredPeriod(row.period);
}

/**
 * Batch upsert facts.
 *
 * The conflict branch still coalesces against the stored row, so a null
 * slot can never overwrite a value even if the caller did not merge first.
 */
export async function batchUpsertFacts(
  db: Kysely<Database>,
  facts: readonly NewFactInflation[],
  batchSize = DEFAULT_BATCH_SIZE
): Promise<void> {
  for (let i = 0; i < facts.length; i += batchSize) {
    const batch = facts.slice(i, i + batchSize);

    await db
      .insertInto("fact_inflation")
      .values(batch)
      .onConflict((oc) =>
        oc.columns(["period", "region_id", "category_id"]).doUpdateSet((eb) => ({
          incidence: eb.fn.coalesce(
            eb.ref("excluded.incidence"),
            eb.ref("fact_inflation.incidence")
          ),
          mom_variation: eb.fn.coalesce(
            eb.ref("excluded.mom_variation"),
            eb.ref("fact_inflation.mom_variation")
          ),
        }))
      )
      .execute();
  }
}

// ============================================================================
// Incremental Writer
// ============================================================================

export class IncrementalWriter {
  constructor(
    private db: Kysely<Database>,
    private batchSize = DEFAULT_BATCH_SIZE
  ) {}

  /**
   * Write records in a single transaction: either every record lands
   * (dimensions included) or none does.
   */
  async write(records: readonly WritableRecord[]): Promise<WriteResult> {
    try {
      return await this.db
        .transaction()
        .execute(async (trx) => this.writeInTransaction(trx, records));
    } catch (error) {
      dbLogger.error({ error: errorMessage(error) }, "Fact write failed");
      throw new WriteError(
        `Failed to write ${String(records.length)} records: ${errorMessage(error)}`,
        error
      );
    }
  }

  private async writeInTransaction(
    trx: Kysely<Database>,
    records: readonly WritableRecord[]
  ): Promise<WriteResult> {
    const resolver = new DimensionResolver(trx);
    let skippedEmpty = 0;

    // 1. Resolve dimensions and normalize values
    const pending: FactInflation[] = [];
    for (const record of records) {
      const incidence = roundOrNull(record.incidence);
      const momVariation = roundOrNull(record.momVariation);
      if (incidence === null && momVariation === null) {
        skippedEmpty++;
        continue;
      }

      const regionId = await resolver.resolveRegion(record.region);
      const categoryId = await resolver.resolveCategory(
        record.categoryName,
        record.classification,
        record.nature
      );
      pending.push({
        period: toStoredPeriod(record.period),
        region_id: regionId,
        category_id: categoryId,
        incidence,
        mom_variation: momVariation,
      });
    }

    // 2. Merge with what is already stored for the covered periods
    const stored = await this.loadStoredFacts(trx, pending);
    const toWrite: FactInflation[] = [];
    let inserted = 0;
    let updated = 0;
    let unchanged = 0;

    for (const fact of pending) {
      const existing = stored.get(
        factKey(fact.period, fact.region_id, fact.category_id)
      );
      if (existing === undefined) {
        toWrite.push(fact);
        inserted++;
        continue;
      }

      const merged: FactInflation = {
        ...fact,
        incidence: fact.incidence ?? existing.incidence,
        mom_variation: fact.mom_variation ?? existing.mom_variation,
      };
      if (
        merged.incidence === existing.incidence &&
        merged.mom_variation === existing.mom_variation
      ) {
        unchanged++;
        continue;
      }
      toWrite.push(merged);
      updated++;
    }

    // 3. Upsert
    await batchUpsertFacts(trx, toWrite, this.batchSize);

    const result: WriteResult = {
      inserted,
      updated,
      unchanged,
      skippedEmpty,
      ...resolver.getStats(),
    };
    dbLogger.info(result, "Facts written");
    return result;
  }

  private async loadStoredFacts(
    trx: Kysely<Database>,
    facts: readonly FactInflation[]
  ): Promise<Map<string, FactInflation>> {
    const stored = new Map<string, FactInflation>();
    if (facts.length === 0) {
      return stored;
    }

    const periods = facts.map((fact) => fact.period).sort();
    const first = periods[0];
    const last = periods[periods.length - 1];
    if (first === undefined || last === undefined) {
      return stored;
    }

    const rows = await trx
      .selectFrom("fact_inflation")
      .selectAll()
      .where("period", ">=", first)
      .where("period", "<=", last)
      .execute();

    for (const row of rows) {
      const period = toStoredPeriod(row.period);
      stored.set(factKey(period, row.region_id, row.category_id), {
        ...row,
        period,
      });
    }
    return stored;
  }
}
