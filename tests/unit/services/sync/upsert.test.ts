import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { WriteError } from "../../../../src/errors.js";
import {
  IncrementalWriter,
  getLatestPeriod,
  roundDecimal,
} from "../../../../src/services/sync/upsert.js";
import { createTestDatabase } from "../../../helpers/sqlite.js";

import type { Database } from "../../../../src/db/types.js";
import type { WritableRecord } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

function record(overrides: Partial<WritableRecord> = {}): WritableRecord {
  return {
    period: "2024-01-01",
    region: "Nacional",
    categoryName: "Análisis",
    classification: "Núcleo",
    incidence: 14.2,
    momVariation: 1.5,
    nature: "NONE",
    ...overrides,
  };
}

async function readFacts(db: Kysely<Database>) {
  return db
    .selectFrom("fact_inflation")
    .select(["period", "incidence", "mom_variation"])
    .orderBy("period")
    .orderBy("category_id")
    .execute();
}

describe("services/sync/upsert", () => {
  let db: Kysely<Database>;
  let writer: IncrementalWriter;

  beforeEach(async () => {
    db = await createTestDatabase();
    writer = new IncrementalWriter(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe("roundDecimal", () => {
    it("should round to four decimals", () => {
      expect(roundDecimal(1.23456)).toBe(1.2346);
      expect(roundDecimal(-0.980392156862745)).toBe(-0.9804);
      expect(roundDecimal(2.0000000000000018)).toBe(2);
    });
  });

  describe("getLatestPeriod", () => {
    it("should return null for an empty store", async () => {
      expect(await getLatestPeriod(db)).toBeNull();
    });

    it("should return the most recent period", async () => {
      await writer.write([
        record({ period: "2024-02-01" }),
        record({ period: "2024-01-01" }),
      ]);
      expect(await getLatestPeriod(db)).toBe("2024-02-01");
    });
  });

  describe("IncrementalWriter", () => {
    it("should insert new facts and their dimensions", async () => {
      const result = await writer.write([
        record(),
        record({ classification: "Regulados", incidence: 3.1, momVariation: null }),
      ]);

      expect(result).toEqual({
        inserted: 2,
        updated: 0,
        unchanged: 0,
        skippedEmpty: 0,
        regionsCreated: 1,
        categoriesCreated: 2,
        naturesRefreshed: 0,
      });
      expect(await readFacts(db)).toEqual([
        { period: "2024-01-01", incidence: 14.2, mom_variation: 1.5 },
        { period: "2024-01-01", incidence: 3.1, mom_variation: null },
      ]);
    });

    it("should perform zero writes when the same batch is written twice", async () => {
      const batch = [record(), record({ period: "2024-02-01", incidence: 9.1 })];
      await writer.write(batch);

      const second = await writer.write(batch);

      expect(second).toEqual({
        inserted: 0,
        updated: 0,
        unchanged: 2,
        skippedEmpty: 0,
        regionsCreated: 0,
        categoriesCreated: 0,
        naturesRefreshed: 0,
      });
      expect(await db.selectFrom("dim_region").selectAll().execute()).toHaveLength(1);
      expect(await db.selectFrom("dim_category").selectAll().execute()).toHaveLength(1);
    });

    it("should never erase a stored value with a missing one", async () => {
      await writer.write([record({ incidence: 14.2, momVariation: 1.5 })]);

      const incidenceOnly = await writer.write([
        record({ incidence: 14.2, momVariation: null }),
      ]);
      expect(incidenceOnly.unchanged).toBe(1);
      expect(await readFacts(db)).toEqual([
        { period: "2024-01-01", incidence: 14.2, mom_variation: 1.5 },
      ]);

      const variationOnly = await writer.write([
        record({ incidence: null, momVariation: 1.7 }),
      ]);
      expect(variationOnly.updated).toBe(1);
      expect(await readFacts(db)).toEqual([
        { period: "2024-01-01", incidence: 14.2, mom_variation: 1.7 },
      ]);
    });

    it("should update a revised value", async () => {
      await writer.write([record({ incidence: 9.1 })]);

      const result = await writer.write([record({ incidence: 9.3 })]);

      expect(result.updated).toBe(1);
      expect(result.inserted).toBe(0);
      expect(await readFacts(db)).toEqual([
        { period: "2024-01-01", incidence: 9.3, mom_variation: 1.5 },
      ]);
    });

    it("should compare values at the stored precision", async () => {
      await writer.write([record({ incidence: 1.23456 })]);

      const result = await writer.write([record({ incidence: 1.23459 })]);

      expect(result.unchanged).toBe(1);
      expect((await readFacts(db))[0]?.incidence).toBe(1.2346);
    });

    it("should skip records without any value", async () => {
      const result = await writer.write([
        record({ incidence: null, momVariation: null }),
      ]);

      expect(result.skippedEmpty).toBe(1);
      expect(result.regionsCreated).toBe(0);
      expect(await readFacts(db)).toEqual([]);
    });

    it("should refresh the nature of an existing category", async () => {
      const division = record({
        categoryName: "División",
        classification: "Comunicación",
        incidence: 0.4,
        momVariation: null,
        nature: "MIXED",
      });
      await writer.write([division]);

      const result = await writer.write([{ ...division, nature: "SERVICES" }]);

      expect(result.naturesRefreshed).toBe(1);
      expect(result.unchanged).toBe(1);
    });

    it("should write in batches", async () => {
      const batchWriter = new IncrementalWriter(db, 2);
      const records = ["01", "02", "03", "04", "05"].map((month) =>
        record({ period: `2024-${month}-01` })
      );

      const result = await batchWriter.write(records);

      expect(result.inserted).toBe(5);
      expect(await readFacts(db)).toHaveLength(5);
    });

    it("should roll back everything when one record fails", async () => {
      await expect(
        writer.write([
          record({ region: "GBA" }),
          record({ region: "Cuyo", period: "2024-13-01" }),
        ])
      ).rejects.toThrow(WriteError);

      expect(await db.selectFrom("dim_region").selectAll().execute()).toEqual([]);
      expect(await db.selectFrom("dim_category").selectAll().execute()).toEqual([]);
      expect(await readFacts(db)).toEqual([]);
    });
  });
});
