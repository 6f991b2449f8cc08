import { describe, it, expect } from "vitest";

import { MalformedSourceError } from "../../../../src/errors.js";
import {
  LongCsvCollector,
  formatLongCsv,
  readLongTable,
  summarizeLongRows,
  toLongRows,
  type LongRow,
} from "../../../../src/services/sync/long-csv.js";
import { DataQualityLog } from "../../../../src/services/sync/quality.js";

import type { WritableRecord } from "../../../../src/types/index.js";

const coreRecord: WritableRecord = {
  period: "2024-01-01",
  region: "Nacional",
  categoryName: "Análisis",
  classification: "Núcleo",
  incidence: 14.2,
  momVariation: 1.000004,
  nature: "NONE",
};

const transportRecord: WritableRecord = {
  period: "2024-01-01",
  region: "GBA",
  categoryName: "División",
  classification: "Transporte",
  incidence: 0.31,
  momVariation: null,
  nature: "MIXED",
};

const records: WritableRecord[] = [coreRecord, transportRecord];

describe("services/sync/long-csv", () => {
  // ============================================================================
  // Export
  // ============================================================================

  describe("toLongRows", () => {
    it("should emit one rounded row per filled slot", () => {
      expect(toLongRows(records)).toEqual([
        {
          period: "2024-01-01",
          region: "Nacional",
          categoryName: "Análisis",
          classification: "Núcleo",
          value: 14.2,
          metricKind: "INCIDENCE",
        },
        {
          period: "2024-01-01",
          region: "Nacional",
          categoryName: "Análisis",
          classification: "Núcleo",
          value: 1,
          metricKind: "MOM_VARIATION",
        },
        {
          period: "2024-01-01",
          region: "GBA",
          categoryName: "División",
          classification: "Transporte",
          value: 0.31,
          metricKind: "INCIDENCE",
        },
      ]);
    });
  });

  describe("formatLongCsv", () => {
    it("should write a BOM, the header and one line per row", () => {
      expect(formatLongCsv(toLongRows(records))).toBe(
        "\uFEFF" +
          "indice_tiempo,valor,region,categoria,clasificacion,metrica\n" +
          "2024-01-01,14.2,Nacional,Análisis,Núcleo,INCIDENCE\n" +
          "2024-01-01,1,Nacional,Análisis,Núcleo,MOM_VARIATION\n" +
          "2024-01-01,0.31,GBA,División,Transporte,INCIDENCE\n"
      );
    });
  });

  describe("summarizeLongRows", () => {
    it("should count rows per region and category, largest first", () => {
      const row = (
        period: string,
        region: LongRow["region"],
        categoryName: string
      ): LongRow => ({
        period,
        region,
        categoryName,
        classification: "x",
        value: 1,
        metricKind: "INCIDENCE",
      });

      expect(
        summarizeLongRows([
          row("2024-01-01", "Nacional", "Análisis"),
          row("2024-01-01", "Nacional", "Análisis"),
          row("2024-02-01", "GBA", "División"),
          row("2023-12-01", "GBA", "Nivel General"),
        ])
      ).toEqual({
        rows: 4,
        periodFrom: "2023-12-01",
        periodTo: "2024-02-01",
        byRegion: [
          { name: "GBA", rows: 2 },
          { name: "Nacional", rows: 2 },
        ],
        byCategory: [
          { name: "Análisis", rows: 2 },
          { name: "División", rows: 1 },
          { name: "Nivel General", rows: 1 },
        ],
      });
    });

    it("should report no periods for an empty dataset", () => {
      expect(summarizeLongRows([])).toEqual({
        rows: 0,
        periodFrom: null,
        periodTo: null,
        byRegion: [],
        byCategory: [],
      });
    });
  });

  // ============================================================================
  // Load
  // ============================================================================

  describe("readLongTable", () => {
    it("should read incidence rows when the metric column is absent", () => {
      const quality = new DataQualityLog();
      const observations = readLongTable(
        {
          header: ["indice_tiempo", "valor", "region", "categoria", "clasificacion"],
          rows: [
            ["2024-01-01", "14.2", "Nacional", "Análisis", "Núcleo"],
            ["2024-01-01", "0.5", "Atlantis", "Análisis", "Núcleo"],
            ["2024-02-01", "abc", "GBA", "Análisis", "Regulados"],
            ["2024-02-01", "", "GBA", "Análisis", "Regulados"],
          ],
        },
        "file.csv",
        quality
      );

      expect(observations).toEqual([
        {
          region: "Nacional",
          categoryName: "Análisis",
          classification: "Núcleo",
          period: "2024-01-01",
          value: 14.2,
          sourceId: "file.csv",
          sourcePriority: 0,
          metricKind: "INCIDENCE",
        },
      ]);
      expect(quality.warnings).toEqual([
        {
          kind: "INVALID_CELL",
          sourceId: "file.csv",
          column: "region",
          period: "2024-01-01",
          raw: "Atlantis",
        },
        {
          kind: "INVALID_CELL",
          sourceId: "file.csv",
          column: "valor",
          period: "2024-02-01",
          raw: "abc",
        },
      ]);
    });

    it("should reject unknown metrics", () => {
      const quality = new DataQualityLog();
      const observations = readLongTable(
        {
          header: [
            "indice_tiempo",
            "valor",
            "region",
            "categoria",
            "clasificacion",
            "metrica",
          ],
          rows: [
            ["2024-01-01", "2.1", "GBA", "Nivel General", "Total", "mom_variation"],
            ["2024-01-01", "25.3", "GBA", "Nivel General", "Total", "yoy"],
          ],
        },
        "file.csv",
        quality
      );

      expect(observations.map((o) => [o.metricKind, o.value])).toEqual([
        ["MOM_VARIATION", 2.1],
      ]);
      expect(quality.counts().INVALID_CELL).toBe(1);
      expect(quality.warnings[0]).toMatchObject({ column: "metrica", raw: "YOY" });
    });

    it("should fail when required columns are missing", () => {
      let caught: unknown;
      try {
        readLongTable(
          {
            header: ["indice_tiempo", "valor", "region"],
            rows: [["2024-01-01", "1", "GBA"]],
          },
          "file.csv",
          new DataQualityLog()
        );
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedSourceError);
      expect(caught).toHaveProperty(
        "message",
        "Source file.csv: missing columns: categoria, clasificacion"
      );
    });

    it("should fail on a malformed period", () => {
      expect(() =>
        readLongTable(
          {
            header: ["indice_tiempo", "valor", "region", "categoria", "clasificacion"],
            rows: [["enero", "1", "GBA", "Análisis", "Núcleo"]],
          },
          "file.csv",
          new DataQualityLog()
        )
      ).toThrow("Source file.csv: malformed period");
    });
  });

  describe("LongCsvCollector", () => {
    it("should read back an exported file from the window start", async () => {
      const text = formatLongCsv(
        toLongRows([
          { ...coreRecord, period: "2023-12-01" },
          ...records,
        ])
      );
      const collector = new LongCsvCollector("ipc.csv", text);

      const collected = await collector.collect(
        "2024-01-01",
        new DataQualityLog()
      );

      expect(collected.sources).toEqual([{ id: "ipc.csv", observations: 3 }]);
      expect(
        collected.observations.map((o) => [
          o.period,
          o.region,
          o.classification,
          o.metricKind,
          o.value,
        ])
      ).toEqual([
        ["2024-01-01", "Nacional", "Núcleo", "INCIDENCE", 14.2],
        ["2024-01-01", "Nacional", "Núcleo", "MOM_VARIATION", 1],
        ["2024-01-01", "GBA", "Transporte", "INCIDENCE", 0.31],
      ]);
    });
  });
});
