import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { RunJournal } from "../../../../src/services/sync/runs.js";
import { createTestDatabase } from "../../../helpers/sqlite.js";

import type { Database, NewLoadRun } from "../../../../src/db/types.js";
import type { Kysely } from "kysely";

function run(overrides: Partial<NewLoadRun> = {}): NewLoadRun {
  return {
    started_at: "2024-03-10T08:00:00.000Z",
    finished_at: "2024-03-10T08:00:05.000Z",
    status: "SUCCEEDED",
    window_reason: "initial",
    period_from: "2023-12-01",
    period_to: "2024-02-01",
    rows_inserted: 10,
    rows_updated: 0,
    warnings: 0,
    error: null,
    ...overrides,
  };
}

describe("services/sync/runs", () => {
  let db: Kysely<Database>;
  let journal: RunJournal;

  beforeEach(async () => {
    db = await createTestDatabase();
    journal = new RunJournal(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should list runs most recent first", async () => {
    const first = await journal.record(run());
    const second = await journal.record(
      run({ status: "FAILED", error: "Source x returned no data rows", period_to: null })
    );

    const runs = await journal.listRecent();

    expect(runs.map((r) => r.run_id)).toEqual([second, first]);
    expect(runs[0]).toMatchObject({
      status: "FAILED",
      error: "Source x returned no data rows",
      period_to: null,
    });
  });

  it("should honor the limit", async () => {
    await journal.record(run());
    await journal.record(run());
    await journal.record(run());

    expect(await journal.listRecent(2)).toHaveLength(2);
  });

  it("should find the last successful run", async () => {
    expect(await journal.getLastSuccessful()).toBeUndefined();

    const ok = await journal.record(run());
    await journal.record(run({ status: "FAILED", error: "boom" }));

    expect((await journal.getLastSuccessful())?.run_id).toBe(ok);
  });
});
