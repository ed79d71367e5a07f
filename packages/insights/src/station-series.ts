import { mean, present } from "crowding-shared/math";
import type { Selection, TidyTable, TimeLabel } from "crowding-shared/types";
import * as _ from "radash";
import { describeDirection } from "./directions";
import { filterRecords } from "./filter";

export type StationQuery = Pick<Selection, "dayType" | "line" | "direction"> & {
  stationName: string;
};

export type StationSeries = {
  kind: "series";
  title: string;
  points: { timeLabel: TimeLabel; crowding: number | null }[];
  mean: number | null;
  max: number | null;
};

export type StationSeriesResult = StationSeries | { kind: "empty" };

/**
 * Chronological crowding for a single station and direction, for the detail line chart.
 */
export function stationSeries(table: TidyTable, query: StationQuery): StationSeriesResult {
  const rows = _.sort(filterRecords(table, query), (r) => r.timeOrder);
  if (rows.length === 0) return { kind: "empty" };

  const values = present(rows.map((r) => r.crowding));
  const direction = describeDirection(query.line, query.direction);
  return {
    kind: "series",
    title: `${query.stationName} (${query.line}, ${direction}) - ${query.dayType}`,
    points: rows.map((r) => ({ timeLabel: r.timeLabel, crowding: r.crowding })),
    mean: mean(values),
    max: _.max(values) ?? null,
  };
}
