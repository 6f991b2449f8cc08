import { ConfigError } from "../../errors.js";
import { addMonths, parsePeriod } from "../../utils/periods.js";

export type WindowReason = "explicit" | "incremental" | "initial";

export interface RevisionWindow {
  /** First period (inclusive) that is fetched and re-written */
  start: string;
  reason: WindowReason;
  latestLoaded: string | null;
}

export interface RevisionWindowOptions {
  latestLoaded: string | null;
  revisionMonths: number;
  /** Start used when the store is still empty */
  initialStart: string;
  /** Reprocess from this date forward, whatever the store holds */
  explicitStart?: string;
}

/**
 * Work out where a run starts.
 *
 * Published figures get revised after the fact, so an incremental run never
 * starts at the first new month: it goes back `revisionMonths` before the
 * latest loaded period and re-writes everything from there on.
 */
export function computeRevisionWindow(
  options: RevisionWindowOptions
): RevisionWindow {
  const { latestLoaded, revisionMonths, initialStart, explicitStart } = options;

  if (explicitStart !== undefined) {
    const start = parsePeriod(explicitStart);
    if (start === null) {
      throw new ConfigError([`Invalid start date: ${explicitStart}`]);
    }
    return { start, reason: "explicit", latestLoaded };
  }

  if (latestLoaded === null) {
    const start = parsePeriod(initialStart);
    if (start === null) {
      throw new ConfigError([`Invalid initial start date: ${initialStart}`]);
    }
    return { start, reason: "initial", latestLoaded };
  }

  return {
    start: addMonths(latestLoaded, -Math.max(1, revisionMonths)),
    reason: "incremental",
    latestLoaded,
  };
}
