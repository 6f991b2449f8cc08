import { dbLogger } from "../../logger.js";

import type { Database, LoadRun, NewLoadRun } from "../../db/types.js";
import type { Kysely } from "kysely";

/**
 * load_runs journal: one row per non-dry sync run, successful or not
 */
export class RunJournal {
  constructor(private db: Kysely<Database>) {}

  async record(run: NewLoadRun): Promise<number> {
    const row = await this.db
      .insertInto("load_runs")
      .values(run)
      .returning("run_id")
      .executeTakeFirstOrThrow();
    dbLogger.debug({ runId: row.run_id, status: run.status }, "Run recorded");
    return row.run_id;
  }

  /**
   * Most recent runs first
   */
  async listRecent(limit = 10): Promise<LoadRun[]> {
    return this.db
      .selectFrom("load_runs")
      .selectAll()
      .orderBy("run_id", "desc")
      .limit(limit)
      .execute();
  }

  async getLastSuccessful(): Promise<LoadRun | undefined> {
    return this.db
      .selectFrom("load_runs")
      .selectAll()
      .where("status", "=", "SUCCEEDED")
      .orderBy("run_id", "desc")
      .limit(1)
      .executeTakeFirst();
  }
}
