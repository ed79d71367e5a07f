import type { TidyRecord } from "crowding-shared/types";

const SLOTS = ["07:30", "08:00", "18:00"] as const;

type Values = [number | null, number | null, number | null];

/** One station/direction worth of records over the three fixture slots */
export function series(
  dayType: string,
  line: string,
  stationCode: string,
  stationName: string,
  direction: string,
  values: Partial<Values>,
): TidyRecord[] {
  return SLOTS.flatMap((timeLabel, timeOrder) => {
    const crowding = values[timeOrder];
    // undefined means the slot is absent altogether
    if (crowding === undefined) return [];
    return [{ dayType, line, stationCode, stationName, direction, timeLabel, timeOrder, crowding }];
  });
}

/** Small table already in tidy sort order */
export const TABLE: readonly TidyRecord[] = [
  ...series("토요일", "2호선", "222", "강남", "내선", [40]),
  ...series("평일", "1호선", "150", "서울역", "상선", [170, null, 160]),
  ...series("평일", "2호선", "201", "시청", "내선", [90, 200, 130]),
  ...series("평일", "2호선", "222", "강남", "내선", [150, 180, 100]),
  ...series("평일", "2호선", "222", "강남", "외선", [50, 60, 70]),
  ...series("평일", "2호선", "223", "역삼", "내선", [120, 120, null]),
];
