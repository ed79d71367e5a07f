import { mean } from "crowding-shared/math";
import type { RankingEntry, Selection, TidyTable, TimeLabel } from "crowding-shared/types";
import * as _ from "radash";
import { filterRecords, groupBy } from "./filter";
import { windowLabels } from "./windows";

export const MIN_TOP_N = 5;
export const MAX_TOP_N = 20;
export const DEFAULT_TOP_N = 10;

export type RankingQuery = Pick<Selection, "dayType" | "timeWindow" | "topN"> &
  Partial<Pick<Selection, "line" | "direction">>;

export function clampTopN(n: number): number {
  if (!Number.isFinite(n)) return DEFAULT_TOP_N;
  return Math.min(MAX_TOP_N, Math.max(MIN_TOP_N, Math.trunc(n)));
}

/**
 * Most crowded (station, line, direction) groups over a rush window.
 * Ties keep the order in which groups first appear in the table.
 */
export function rankRushWindow(table: TidyTable, query: RankingQuery): RankingEntry[] {
  const labels = windowLabels(table, query.timeWindow);
  const rows = filterRecords(table, {
    dayType: query.dayType,
    line: query.line,
    direction: query.direction,
  }).filter((r) => labels.has(r.timeLabel));

  const groups = groupBy(rows, (r) => JSON.stringify([r.stationName, r.line, r.direction]));

  const scored: Omit<RankingEntry, "rank">[] = [];
  for (const records of groups.values()) {
    const first = records[0];
    let peak: { label: TimeLabel; value: number } | undefined;
    const values: number[] = [];
    for (const r of records) {
      if (r.crowding === null) continue;
      values.push(r.crowding);
      // strict comparison: the earliest slot wins a tie
      if (!peak || r.crowding > peak.value) peak = { label: r.timeLabel, value: r.crowding };
    }
    const avg = mean(values);
    if (!first || !peak || avg === null) continue;
    scored.push({
      stationName: first.stationName,
      line: first.line,
      direction: first.direction,
      avgCrowding: avg,
      peakTimeLabel: peak.label,
    });
  }

  return _.sort(scored, (e) => e.avgCrowding, true)
    .slice(0, clampTopN(query.topN))
    .map((e, i) => ({ rank: i + 1, ...e }));
}
