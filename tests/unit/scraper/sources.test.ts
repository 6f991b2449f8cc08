import { describe, it, expect } from "vitest";

import { IPC_SOURCES } from "../../../src/scraper/sources.js";

describe("scraper/sources", () => {
  it("should have unique ids", () => {
    const ids = IPC_SOURCES.map((source) => source.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("should rank index-derived variation above incidence sources", () => {
    const index = IPC_SOURCES.filter((s) => s.measure === "index");
    const incidence = IPC_SOURCES.filter((s) => s.measure === "incidence");

    expect(index.map((s) => s.id)).toEqual(["index-analytical"]);
    const lowestIndexPriority = Math.min(...index.map((s) => s.priority));
    for (const source of incidence) {
      expect(source.priority).toBeLessThan(lowestIndexPriority);
    }
  });

  it("should read every series through the same prefix", () => {
    expect(new Set(IPC_SOURCES.map((s) => s.seriesPrefix))).toEqual(
      new Set(["ipc"])
    );
  });
});
