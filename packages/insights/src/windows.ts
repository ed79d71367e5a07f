import type { TidyTable, TimeLabel, TimeWindow } from "crowding-shared/types";

/** Fixed peak-hour slots, also used to shade the station chart */
export const RUSH_WINDOWS = {
  morning: { name: "출근", labels: ["07:30", "08:00", "08:30", "09:00", "09:30"] },
  evening: { name: "퇴근", labels: ["17:30", "18:00", "18:30", "19:00", "19:30"] },
} as const satisfies Record<string, { name: string; labels: readonly TimeLabel[] }>;

export type RushWindow = keyof typeof RUSH_WINDOWS;

export function windowBounds(window: RushWindow): { from: TimeLabel; to: TimeLabel } {
  const { labels } = RUSH_WINDOWS[window];
  return { from: labels[0], to: labels[labels.length - 1] ?? labels[0] };
}

/** Labels covered by a window; all_day is every label present in the table */
export function windowLabels(table: TidyTable, window: TimeWindow): Set<TimeLabel> {
  if (window === "all_day") {
    return new Set(table.map((r) => r.timeLabel));
  }
  return new Set<TimeLabel>(RUSH_WINDOWS[window].labels);
}
