import { mean, present } from "crowding-shared/math";
import type { Selection, StationName, TidyRecord, TidyTable, TimeLabel } from "crowding-shared/types";
import * as _ from "radash";
import { filterRecords, groupBy } from "./filter";
import { RUSH_WINDOWS } from "./windows";

export type KpiQuery = Pick<Selection, "dayType" | "line" | "direction">;

export type KpiSummary = {
  kind: "summary";
  overallMean: number;
  topStation: StationName;
  topStationMean: number;
  peakTimeLabel: TimeLabel;
  peakTimeMean: number;
  stationCount: number;
  /** 0 when the window has no observations */
  morningMean: number;
  eveningMean: number;
};

export type KpiResult = KpiSummary | { kind: "empty" };

/** First group with the highest mean; groups without observations are skipped */
function topGroup(groups: Map<string, TidyRecord[]>): { key: string; mean: number } | undefined {
  let best: { key: string; mean: number } | undefined;
  for (const [key, records] of groups) {
    const m = mean(present(records.map((r) => r.crowding)));
    if (m !== null && (!best || m > best.mean)) best = { key, mean: m };
  }
  return best;
}

function windowMean(records: readonly TidyRecord[], labels: readonly TimeLabel[]): number {
  const set = new Set(labels);
  return mean(present(records.filter((r) => set.has(r.timeLabel)).map((r) => r.crowding))) ?? 0;
}

/**
 * Headline numbers for one day type, line and direction.
 * A selection with no observed values yields `{ kind: "empty" }`.
 */
export function summarizeKpis(table: TidyTable, query: KpiQuery): KpiResult {
  const rows = filterRecords(table, query);
  const overallMean = mean(present(rows.map((r) => r.crowding)));
  if (overallMean === null) return { kind: "empty" };

  const station = topGroup(groupBy(rows, (r) => r.stationName));
  const chronological = _.sort(rows, (r) => r.timeOrder);
  const slot = topGroup(groupBy(chronological, (r) => r.timeLabel));
  // both exist whenever overallMean does
  if (!station || !slot) return { kind: "empty" };

  return {
    kind: "summary",
    overallMean,
    topStation: station.key,
    topStationMean: station.mean,
    peakTimeLabel: slot.key,
    peakTimeMean: slot.mean,
    stationCount: new Set(rows.map((r) => r.stationName)).size,
    morningMean: windowMean(rows, RUSH_WINDOWS.morning.labels),
    eveningMean: windowMean(rows, RUSH_WINDOWS.evening.labels),
  };
}
