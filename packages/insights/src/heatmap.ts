import { mean, present, quantile } from "crowding-shared/math";
import type {
  Selection,
  StationCode,
  StationName,
  TidyTable,
  TimeLabel,
} from "crowding-shared/types";
import * as _ from "radash";
import { collator, filterRecords, groupBy } from "./filter";

export type HeatmapQuery = Pick<Selection, "dayType" | "line" | "direction" | "sortMode">;

export type Heatmap = {
  /** Row order of `matrix` */
  stations: StationName[];
  /** Column order of `matrix`, chronological */
  timeLabels: TimeLabel[];
  /** Mean crowding per station and time slot; null where nothing was observed */
  matrix: (number | null)[][];
  /** Color scale bounds; null when no cell has a value */
  colorRange: [number, number] | null;
};

/**
 * Quantiles used for the color scale. Both ends sit at the extremes, so the range is plain
 * min/max; a narrower percentile clip was possibly intended.
 */
export const HEATMAP_COLOR_QUANTILES: readonly [number, number] = [0, 1];

export const emptyHeatmap = (): Heatmap => ({
  stations: [],
  timeLabels: [],
  matrix: [],
  colorRange: null,
});

type StationRow = {
  name: StationName;
  /** first code seen for this name */
  code: StationCode;
  cells: (number | null)[];
  avg: number | null;
};

const byCode = (a: StationRow, b: StationRow) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0);

function orderStations(rows: StationRow[], mode: HeatmapQuery["sortMode"]): StationRow[] {
  switch (mode) {
    case "avg_desc": {
      // stations without any value go last, as in a NaN-last sort
      const [known, unknown] = _.fork(rows, (r) => r.avg !== null);
      return [..._.sort(known, (r) => r.avg ?? 0, true), ...unknown];
    }
    case "name_asc":
      return rows.toSorted((a, b) => collator.compare(a.name, b.name));
    case "code_asc":
      return rows.toSorted(byCode);
  }
}

export function colorRange(matrix: (number | null)[][]): [number, number] | null {
  const values = present(matrix.flat());
  const [lo, hi] = HEATMAP_COLOR_QUANTILES;
  const min = quantile(values, lo);
  const max = quantile(values, hi);
  return min === null || max === null ? null : [min, max];
}

/**
 * Station x time pivot of mean crowding for one day type, line and direction.
 */
export function buildHeatmap(table: TidyTable, query: HeatmapQuery): Heatmap {
  const rows = filterRecords(table, query);
  if (rows.length === 0) return emptyHeatmap();

  const orderOf = new Map<TimeLabel, number>();
  for (const r of rows) {
    const seen = orderOf.get(r.timeLabel);
    if (seen === undefined || r.timeOrder < seen) orderOf.set(r.timeLabel, r.timeOrder);
  }
  const timeLabels = _.sort([...orderOf.keys()], (label) => orderOf.get(label) ?? 0);

  const stations: StationRow[] = [];
  for (const [name, records] of groupBy(rows, (r) => r.stationName)) {
    const byLabel = groupBy(records, (r) => r.timeLabel);
    const cells = timeLabels.map((label) =>
      mean(present((byLabel.get(label) ?? []).map((r) => r.crowding))),
    );
    stations.push({
      name,
      code: records[0]?.stationCode ?? "",
      cells,
      avg: mean(present(cells)),
    });
  }

  const ordered = orderStations(stations, query.sortMode);
  const matrix = ordered.map((s) => s.cells);
  return {
    stations: ordered.map((s) => s.name),
    timeLabels,
    matrix,
    colorRange: colorRange(matrix),
  };
}
