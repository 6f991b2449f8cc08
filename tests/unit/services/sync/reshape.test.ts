import { describe, it, expect } from "vitest";

import { EmptySourceError, MalformedSourceError } from "../../../../src/errors.js";
import { DataQualityLog } from "../../../../src/services/sync/quality.js";
import {
  filterFromPeriod,
  parseCellValue,
  reshapeWideTable,
} from "../../../../src/services/sync/reshape.js";
import {
  analyticalIncidenceSource,
  analyticalIndexSource,
} from "../../../fixtures/sources.js";

import type { WideTable } from "../../../../src/types/index.js";

describe("services/sync/reshape", () => {
  describe("parseCellValue", () => {
    it("should parse numbers", () => {
      expect(parseCellValue("1.5")).toBe(1.5);
      expect(parseCellValue(" -0.3 ")).toBe(-0.3);
    });

    it("should treat missing markers as null", () => {
      expect(parseCellValue("")).toBeNull();
      expect(parseCellValue("N/A")).toBeNull();
      expect(parseCellValue("...")).toBeNull();
      expect(parseCellValue("-")).toBeNull();
    });

    it("should return undefined for values that are not numbers", () => {
      expect(parseCellValue("abc")).toBeUndefined();
      expect(parseCellValue("1,5")).toBeUndefined();
      expect(parseCellValue("Infinity")).toBeUndefined();
    });

    it("should only accept plain decimal notation", () => {
      expect(parseCellValue("0x1A")).toBeUndefined();
      expect(parseCellValue("1e3")).toBeUndefined();
      expect(parseCellValue("1.")).toBe(1);
      expect(parseCellValue(".5")).toBe(0.5);
      expect(parseCellValue("+2.25")).toBe(2.25);
    });
  });

  describe("reshapeWideTable", () => {
    const table: WideTable = {
      header: [
        "indice_tiempo",
        "ipc_nucleo_gba",
        "ipc_regulados_gba",
        "serie_nota",
        "ipc_vivienda_gba",
      ],
      rows: [
        ["2024-01-01", "1.5", "", "x", "0.1"],
        ["2024-02-01", "n/a", "0.7", "y", "0.2"],
        ["2024-03-01", "abc", "-0.3", "z", ""],
      ],
    };

    it("should emit one observation per numeric cell", () => {
      const quality = new DataQualityLog();
      const observations = reshapeWideTable(
        table,
        analyticalIncidenceSource,
        quality
      );

      expect(observations).toEqual([
        {
          region: "GBA",
          categoryName: "Análisis",
          classification: "Núcleo",
          period: "2024-01-01",
          value: 1.5,
          sourceId: "analytical-incidence",
          sourcePriority: 20,
        },
        {
          region: "GBA",
          categoryName: "Análisis",
          classification: "Regulados",
          period: "2024-02-01",
          value: 0.7,
          sourceId: "analytical-incidence",
          sourcePriority: 20,
        },
        {
          region: "GBA",
          categoryName: "Análisis",
          classification: "Regulados",
          period: "2024-03-01",
          value: -0.3,
          sourceId: "analytical-incidence",
          sourcePriority: 20,
        },
      ]);
    });

    it("should record unparseable columns and invalid cells as warnings", () => {
      const quality = new DataQualityLog();
      reshapeWideTable(table, analyticalIncidenceSource, quality);

      expect(quality.warnings).toEqual([
        {
          kind: "UNPARSEABLE_COLUMN",
          sourceId: "analytical-incidence",
          column: "ipc_vivienda_gba",
          reason: 'no analytical classification matches "vivienda"',
        },
        {
          kind: "INVALID_CELL",
          sourceId: "analytical-incidence",
          column: "ipc_nucleo_gba",
          period: "2024-03-01",
          raw: "abc",
        },
      ]);
      expect(quality.counts()).toEqual({
        UNPARSEABLE_COLUMN: 1,
        DUPLICATE_SERIES: 0,
        INVALID_CELL: 1,
        UNKNOWN_CLASSIFICATION: 0,
      });
    });

    it("should keep the first of two columns holding the same series", () => {
      const quality = new DataQualityLog();
      const observations = reshapeWideTable(
        {
          header: [
            "indice_tiempo",
            "ipc_nivel_general",
            "ipc_nivel_general_nacional",
          ],
          rows: [
            ["2023-12-01", "100", "200"],
            ["2024-01-01", "102", "204"],
          ],
        },
        analyticalIndexSource,
        quality
      );

      expect(
        observations.map((o) => [o.region, o.classification, o.period, o.value])
      ).toEqual([
        ["Nacional", "Total", "2023-12-01", 100],
        ["Nacional", "Total", "2024-01-01", 102],
      ]);
      expect(quality.warnings).toEqual([
        {
          kind: "DUPLICATE_SERIES",
          sourceId: "analytical-index",
          column: "ipc_nivel_general_nacional",
          duplicateOf: "ipc_nivel_general",
        },
      ]);
    });

    it("should fail when no column carries the series prefix", () => {
      expect(() =>
        reshapeWideTable(
          {
            header: ["indice_tiempo", "nivel_general_nacional", "nucleo_nacional"],
            rows: [["2024-01-01", "20.6", "14.2"]],
          },
          analyticalIncidenceSource,
          new DataQualityLog()
        )
      ).toThrow("Source analytical-incidence: no series columns found");
    });

    it("should fail on a table without rows", () => {
      expect(() =>
        reshapeWideTable(
          { header: ["indice_tiempo", "ipc_nucleo_gba"], rows: [] },
          analyticalIncidenceSource,
          new DataQualityLog()
        )
      ).toThrow(EmptySourceError);
    });

    it("should fail when no period column exists", () => {
      expect(() =>
        reshapeWideTable(
          { header: ["ipc_nucleo_gba"], rows: [["1.0"]] },
          analyticalIncidenceSource,
          new DataQualityLog()
        )
      ).toThrow("Source analytical-incidence: no period column found");
    });

    it("should fail on a malformed period with the row number", () => {
      let caught: unknown;
      try {
        reshapeWideTable(
          {
            header: ["indice_tiempo", "ipc_nucleo_gba"],
            rows: [
              ["2024-01-01", "1.0"],
              ["2024-13-01", "1.1"],
            ],
          },
          analyticalIncidenceSource,
          new DataQualityLog()
        );
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedSourceError);
      if (caught instanceof MalformedSourceError) {
        expect(caught.details).toEqual({ row: 2, value: "2024-13-01" });
      }
    });
  });

  describe("filterFromPeriod", () => {
    it("should keep periods on or after the start", () => {
      const items = [
        { period: "2023-12-01" },
        { period: "2024-01-01" },
        { period: "2024-02-01" },
      ];
      expect(filterFromPeriod(items, "2024-01-01")).toEqual([
        { period: "2024-01-01" },
        { period: "2024-02-01" },
      ]);
    });
  });
});
