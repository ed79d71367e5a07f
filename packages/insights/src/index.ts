export { DIRECTION_CAPTIONS, describeDirection } from "./directions";
export { filterRecords, type RecordFilter } from "./filter";
export {
  buildHeatmap,
  colorRange,
  emptyHeatmap,
  HEATMAP_COLOR_QUANTILES,
  type Heatmap,
  type HeatmapQuery,
} from "./heatmap";
export { type KpiQuery, type KpiResult, type KpiSummary, summarizeKpis } from "./kpi";
export { loadTidyTable, parseTidyCsv, TidyFormatError, TidyTableStore } from "./load";
export { applyIntent, type NavigationIntent, navigateToStation } from "./navigation";
export { DAY_TYPE_ORDER, type SelectionOptions, selectionOptions } from "./options";
export { clampTopN, DEFAULT_TOP_N, MAX_TOP_N, MIN_TOP_N, type RankingQuery, rankRushWindow } from "./ranking";
export { type StationQuery, type StationSeriesResult, stationSeries } from "./station-series";
export { RUSH_WINDOWS, type RushWindow, windowBounds, windowLabels } from "./windows";
