export type DayType = string;
export type LineId = string;
export type StationCode = string;
export type StationName = string;
export type Direction = string;
/** Canonical "HH:MM" time-of-day label */
export type TimeLabel = string;

/** One row of the tidy (long-format) crowding table. */
export type TidyRecord = Readonly<{
  dayType: DayType;
  line: LineId;
  /** Trimmed station number; the identity key used for ordering */
  stationCode: StationCode;
  stationName: StationName;
  direction: Direction;
  timeLabel: TimeLabel;
  /** Zero-based position of the source column; the only authority on chronology */
  timeOrder: number;
  /** Dimensionless load indicator, nominally 0–200. null when the source cell was blank */
  crowding: number | null;
}>;

export type TidyTable = readonly TidyRecord[];

/** Column names of the persisted tidy artifact, in file order. */
export const TIDY_COLUMNS = [
  "day_type",
  "line",
  "station_code",
  "station_name",
  "direction",
  "time_label",
  "time_order",
  "crowding",
] as const;

export type TidyColumn = (typeof TIDY_COLUMNS)[number];

export type CrowdingStats = {
  min: number | null;
  max: number | null;
  mean: number | null;
  median: number | null;
};

export type QualityReport = Readonly<{
  /** ISO wall-clock time the report was produced */
  timestamp: string;
  rowsTidy: number;
  uniqueStations: number;
  uniqueStationDirections: number;
  dayTypes: DayType[];
  lines: LineId[];
  directions: Direction[];
  duplicateKeyRows: number;
  crowdingNullCount: number;
  crowdingNullRate: number;
  negativeCrowdingCount: number;
  /** Advisory only */
  crowdingOver200Count: number;
  /** Station/direction groups whose every value is exactly zero. Advisory only */
  allZeroGroupCount: number;
  crowdingStats: CrowdingStats;
  passed: boolean;
}>;

export type SortMode = "avg_desc" | "name_asc" | "code_asc";
export type TimeWindow = "morning" | "evening" | "all_day";

export const SORT_MODES: readonly SortMode[] = ["avg_desc", "name_asc", "code_asc"];
export const TIME_WINDOWS: readonly TimeWindow[] = ["morning", "evening", "all_day"];

/** UI-held filter state; never persisted. */
export type Selection = {
  dayType: DayType;
  line: LineId;
  stationName?: StationName;
  direction: Direction;
  sortMode: SortMode;
  timeWindow: TimeWindow;
  topN: number;
};

export type RankingEntry = {
  rank: number;
  stationName: StationName;
  line: LineId;
  direction: Direction;
  avgCrowding: number;
  peakTimeLabel: TimeLabel;
};
