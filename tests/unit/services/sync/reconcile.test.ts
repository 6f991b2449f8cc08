import { describe, it, expect } from "vitest";

import { ReconciliationConflictError } from "../../../../src/errors.js";
import {
  isSlotAllowed,
  reconcile,
} from "../../../../src/services/sync/reconcile.js";

import type { CanonicalObservation } from "../../../../src/types/index.js";

function observation(
  overrides: Partial<CanonicalObservation>
): CanonicalObservation {
  return {
    period: "2024-01-01",
    region: "GBA",
    categoryName: "División",
    classification: "Transporte",
    value: 1,
    sourceId: "divisions-incidence",
    sourcePriority: 10,
    metricKind: "INCIDENCE",
    ...overrides,
  };
}

describe("services/sync/reconcile", () => {
  describe("isSlotAllowed", () => {
    it("should forbid incidence only for the national headline", () => {
      const headline = {
        region: "Nacional" as const,
        categoryName: "Nivel General",
        classification: "Total",
      };
      expect(isSlotAllowed(headline, "INCIDENCE")).toBe(false);
      expect(isSlotAllowed({ ...headline, region: "GBA" }, "INCIDENCE")).toBe(
        true
      );
    });

    it("should allow variation for headline and analytical categories only", () => {
      const base = { region: "GBA" as const, classification: "x" };
      expect(
        isSlotAllowed({ ...base, categoryName: "Nivel General" }, "MOM_VARIATION")
      ).toBe(true);
      expect(
        isSlotAllowed({ ...base, categoryName: "Análisis" }, "MOM_VARIATION")
      ).toBe(true);
      expect(
        isSlotAllowed({ ...base, categoryName: "División" }, "MOM_VARIATION")
      ).toBe(false);
      expect(
        isSlotAllowed({ ...base, categoryName: "Naturaleza" }, "MOM_VARIATION")
      ).toBe(false);
    });
  });

  describe("reconcile", () => {
    it("should let the highest-priority source win whatever the order", () => {
      const low = observation({ value: 2.2, sourcePriority: 10 });
      const high = observation({
        value: 2.5,
        sourceId: "analytical-incidence",
        sourcePriority: 20,
      });

      for (const input of [
        [low, high],
        [high, low],
      ]) {
        const { records, stats } = reconcile(input, { tieBreak: "first-wins" });
        expect(records).toEqual([
          {
            period: "2024-01-01",
            region: "GBA",
            categoryName: "División",
            classification: "Transporte",
            incidence: 2.5,
            momVariation: null,
          },
        ]);
        expect(stats.overlaps).toBe(1);
      }
    });

    it("should merge the two slots independently", () => {
      const key = {
        region: "Nacional" as const,
        categoryName: "Análisis",
        classification: "Núcleo",
      };
      const { records, stats } = reconcile(
        [
          observation({ ...key, value: 14.2, sourcePriority: 20 }),
          observation({
            ...key,
            value: 1.5,
            metricKind: "MOM_VARIATION",
            sourceId: "analytical-index",
            sourcePriority: 30,
          }),
        ],
        { tieBreak: "first-wins" }
      );

      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ incidence: 14.2, momVariation: 1.5 });
      expect(stats.overlaps).toBe(0);
    });

    it("should drop observations for slots a key may not carry", () => {
      const { records, stats } = reconcile(
        [
          observation({
            region: "Nacional",
            categoryName: "Nivel General",
            classification: "Total",
            value: 20.6,
          }),
          observation({ metricKind: "MOM_VARIATION", value: 3 }),
          observation({ value: 2.2 }),
        ],
        { tieBreak: "first-wins" }
      );

      expect(stats.slotPolicyDrops).toBe(2);
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ incidence: 2.2, momVariation: null });
    });

    it("should keep the first value on an equal-priority tie by default", () => {
      const { records, stats } = reconcile(
        [
          observation({ value: 2.2, sourceId: "a" }),
          observation({ value: 2.3, sourceId: "b" }),
        ],
        { tieBreak: "first-wins" }
      );
      expect(records[0]?.incidence).toBe(2.2);
      expect(stats.overlaps).toBe(1);
    });

    it("should reject differing equal-priority values when configured", () => {
      expect(() =>
        reconcile(
          [
            observation({ value: 2.2, sourceId: "a" }),
            observation({ value: 2.3, sourceId: "b" }),
          ],
          { tieBreak: "reject" }
        )
      ).toThrow(ReconciliationConflictError);
    });

    it("should accept agreeing equal-priority values under reject", () => {
      const { records } = reconcile(
        [
          observation({ value: 2.2, sourceId: "a" }),
          observation({ value: 2.2, sourceId: "b" }),
        ],
        { tieBreak: "reject" }
      );
      expect(records[0]?.incidence).toBe(2.2);
    });

    it("should sort records by period, region and category", () => {
      const { records, stats } = reconcile(
        [
          observation({ period: "2024-02-01", region: "Nacional" }),
          observation({ period: "2024-01-01", region: "Nacional" }),
          observation({ period: "2024-01-01", region: "GBA", classification: "Salud" }),
          observation({ period: "2024-01-01", region: "GBA" }),
        ],
        { tieBreak: "first-wins" }
      );

      expect(
        records.map((r) => `${r.period} ${r.region} ${r.classification}`)
      ).toEqual([
        "2024-01-01 GBA Salud",
        "2024-01-01 GBA Transporte",
        "2024-01-01 Nacional Transporte",
        "2024-02-01 Nacional Transporte",
      ]);
      expect(stats).toEqual({
        observations: 4,
        records: 4,
        overlaps: 0,
        slotPolicyDrops: 0,
      });
    });
  });
});
