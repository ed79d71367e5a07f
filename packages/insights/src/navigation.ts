import type { Selection, StationName } from "crowding-shared/types";

/**
 * Request to open the station detail view, produced by a click in the heatmap
 * or the ranking and handed to the presentation layer as a plain value.
 */
export type NavigationIntent = Readonly<{
  view: "station";
  dayType: string;
  line: string;
  stationName: StationName;
  direction: string;
}>;

export function navigateToStation(
  from: Pick<Selection, "dayType" | "line" | "direction">,
  stationName: StationName,
): NavigationIntent {
  return {
    view: "station",
    dayType: from.dayType,
    line: from.line,
    stationName,
    direction: from.direction,
  };
}

/** The selection the target view should open with; the input is not modified */
export function applyIntent(selection: Selection, intent: NavigationIntent): Selection {
  return {
    ...selection,
    dayType: intent.dayType,
    line: intent.line,
    stationName: intent.stationName,
    direction: intent.direction,
  };
}
