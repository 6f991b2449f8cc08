import { dbLogger } from "../../logger.js";

import type { Database, NatureTag } from "../../db/types.js";
import type { Nature } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface DimensionStats {
  regionsCreated: number;
  categoriesCreated: number;
  naturesRefreshed: number;
}

interface CachedCategory {
  id: number;
  nature: NatureTag | null;
}

export function toNatureTag(nature: Nature): NatureTag | null {
  return nature === "NONE" ? null : nature;
}

// ============================================================================
// Dimension Resolver
// ============================================================================

/**
 * Get-or-create for the region and category dimensions.
 *
 * Natural keys are region_name and (category_name, classification); ids are
 * cached for the lifetime of the resolver, which is one write transaction.
 */
export class DimensionResolver {
  private regionCache = new Map<string, number>();
  private categoryCache = new Map<string, CachedCategory>();
  private stats: DimensionStats = {
    regionsCreated: 0,
    categoriesCreated: 0,
    naturesRefreshed: 0,
  };

  constructor(private db: Kysely<Database>) {}

  getStats(): DimensionStats {
    return { ...this.stats };
  }

  async resolveRegion(regionName: string): Promise<number> {
    const cached = this.regionCache.get(regionName);
    if (cached !== undefined) {
      return cached;
    }

    const existing = await this.db
      .selectFrom("dim_region")
      .select("region_id")
      .where("region_name", "=", regionName)
      .executeTakeFirst();

    let regionId: number;
    if (existing !== undefined) {
      regionId = existing.region_id;
    } else {
      const inserted = await this.db
        .insertInto("dim_region")
        .values({ region_name: regionName })
        .returning("region_id")
        .executeTakeFirstOrThrow();
      regionId = inserted.region_id;
      this.stats.regionsCreated++;
      dbLogger.debug({ regionName, regionId }, "Created region");
    }

    this.regionCache.set(regionName, regionId);
    return regionId;
  }

  /**
   * Resolve a category id. An existing category whose stored nature differs
   * from the derived one gets the new nature.
   */
  async resolveCategory(
    categoryName: string,
    classification: string,
    nature: Nature
  ): Promise<number> {
    const key = `${categoryName}\u0000${classification}`;
    const tag = toNatureTag(nature);

    let entry = this.categoryCache.get(key);
    if (entry === undefined) {
      const existing = await this.db
        .selectFrom("dim_category")
        .select(["category_id", "nature"])
        .where("category_name", "=", categoryName)
        .where("classification", "=", classification)
        .executeTakeFirst();

      if (existing === undefined) {
        const inserted = await this.db
          .insertInto("dim_category")
          .values({
            category_name: categoryName,
            classification,
            nature: tag,
          })
          .returning("category_id")
          .executeTakeFirstOrThrow();
        this.stats.categoriesCreated++;
        dbLogger.debug(
          { categoryName, classification, categoryId: inserted.category_id },
          "Created category"
        );
        entry = { id: inserted.category_id, nature: tag };
      } else {
        entry = { id: existing.category_id, nature: existing.nature };
      }
      this.categoryCache.set(key, entry);
    }

    if (entry.nature !== tag) {
      await this.db
        .updateTable("dim_category")
        .set({ nature: tag })
        .where("category_id", "=", entry.id)
        .execute();
      dbLogger.info(
        { categoryName, classification, from: entry.nature, to: tag },
        "Refreshed category nature"
      );
      entry.nature = tag;
      this.stats.naturesRefreshed++;
    }

    return entry.id;
  }
}
