/**
 * Observation collectors - where a run gets its canonical observations from
 */

import { filterFromPeriod, reshapeWideTable } from "./reshape.js";
import { computeSeriesVariations } from "./variation.js";
import { syncLogger } from "../../logger.js";

import type { DataQualityLog } from "./quality.js";
import type { TableFetcher } from "../../scraper/client.js";
import type {
  CanonicalObservation,
  SourceDefinition,
} from "../../types/index.js";

export interface SourceSummary {
  id: string;
  /** Observations inside the window, after metric calculation */
  observations: number;
}

export interface CollectedObservations {
  observations: CanonicalObservation[];
  sources: SourceSummary[];
}

export interface ObservationCollector {
  /** Observations on or after `from`; structural problems throw */
  collect(from: string, quality: DataQualityLog): Promise<CollectedObservations>;
}

/**
 * Downloads and reshapes the published wide tables
 */
export class RemoteSourceCollector implements ObservationCollector {
  constructor(
    private fetchTable: TableFetcher,
    private sources: readonly SourceDefinition[]
  ) {}

  async collect(
    from: string,
    quality: DataQualityLog
  ): Promise<CollectedObservations> {
    const observations: CanonicalObservation[] = [];
    const sources: SourceSummary[] = [];

    for (const source of this.sources) {
      const table = await this.fetchTable(source);
      const reshaped = reshapeWideTable(table, source, quality);

      // Variations need the full history: the month before the window start
      // is the reference of its first period
      const canonical: CanonicalObservation[] =
        source.measure === "index"
          ? computeSeriesVariations(reshaped)
          : reshaped.map((observation) => ({
              ...observation,
              metricKind: "INCIDENCE" as const,
            }));

      const inWindow = filterFromPeriod(canonical, from);
      for (const observation of inWindow) {
        observations.push(observation);
      }
      sources.push({ id: source.id, observations: inWindow.length });
      syncLogger.info(
        { sourceId: source.id, observations: inWindow.length },
        "Source processed"
      );
    }

    return { observations, sources };
  }
}
