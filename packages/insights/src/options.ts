import type { DayType, Direction, LineId, StationName, TidyTable } from "crowding-shared/types";
import { filterRecords, numericCollator } from "./filter";

/** Weekday first, then Saturday, then Sunday/holiday */
export const DAY_TYPE_ORDER: readonly DayType[] = ["평일", "토요일", "일요일"];

export type SelectionOptions = {
  dayTypes: DayType[];
  lines: LineId[];
  /** The line the station and direction lists belong to */
  line: LineId | undefined;
  stations: StationName[];
  directions: Direction[];
};

const distinct = <T>(values: Iterable<T>) => [...new Set(values)];
const sortLabels = (values: string[]) => values.sort(numericCollator.compare);

/**
 * Option lists for the selection widgets. Stations and directions are those of
 * `line`, or of the first line when none is given.
 */
export function selectionOptions(table: TidyTable, line?: LineId): SelectionOptions {
  const present = new Set(table.map((r) => r.dayType));
  const known = DAY_TYPE_ORDER.filter((d) => present.has(d));
  const extra = sortLabels([...present].filter((d) => !DAY_TYPE_ORDER.includes(d)));

  const lines = sortLabels(distinct(table.map((r) => r.line)));
  const chosen = line ?? lines[0];
  const rows = chosen === undefined ? [] : filterRecords(table, { line: chosen });

  return {
    dayTypes: [...known, ...extra],
    lines,
    line: chosen,
    stations: sortLabels(distinct(rows.map((r) => r.stationName))),
    directions: sortLabels(distinct(rows.map((r) => r.direction))),
  };
}
