import type { QualityReport } from "crowding-shared/types";

const RULE = "=".repeat(60);

const fmt = (v: number | null) => (v === null ? "N/A" : v.toFixed(1));
const status = (ok: boolean) => (ok ? "[OK] PASS" : "[FAIL]");
const count = (n: number) => n.toLocaleString("en-US");

/**
 * Render the quality report as the console block printed after a pipeline run.
 */
export function formatQualityReport(report: QualityReport): string {
  const { crowdingStats: stats } = report;
  const lines = [
    RULE,
    "[REPORT] Data Quality Report",
    RULE,
    `Timestamp: ${report.timestamp}`,
    "",
    "[Basic Info]",
    `  - Total rows: ${count(report.rowsTidy)}`,
    `  - Unique stations: ${count(report.uniqueStations)}`,
    `  - Station x Direction combinations: ${count(report.uniqueStationDirections)}`,
    `  - Day types: ${report.dayTypes.join(", ")}`,
    `  - Lines: ${report.lines.join(", ")}`,
    `  - Directions: ${report.directions.join(", ")}`,
    "",
    "[Quality Check]",
    `  - Duplicate keys: ${count(report.duplicateKeyRows)} ${status(report.duplicateKeyRows === 0)}`,
    `  - Negative crowding: ${count(report.negativeCrowdingCount)} ${status(report.negativeCrowdingCount === 0)}`,
    `  - Missing: ${count(report.crowdingNullCount)} (${(report.crowdingNullRate * 100).toFixed(2)}%)`,
    `  - Crowding >200 (warning): ${count(report.crowdingOver200Count)}`,
    `  - All-time-zero groups: ${count(report.allZeroGroupCount)}`,
    "",
    "[Crowding Stats]",
    `  - Min: ${fmt(stats.min)}`,
    `  - Max: ${fmt(stats.max)}`,
    `  - Mean: ${fmt(stats.mean)}`,
    `  - Median: ${fmt(stats.median)}`,
    "",
    RULE,
    report.passed
      ? "[OK] Completion criteria: PASSED"
      : "[FAIL] Completion criteria: FAILED - please check data",
    RULE,
  ];
  return lines.join("\n");
}

/** snake_case document written next to the tidy table */
export function qualityReportJson(report: QualityReport) {
  return {
    timestamp: report.timestamp,
    rows_tidy: report.rowsTidy,
    unique_stations: report.uniqueStations,
    unique_station_direction_combinations: report.uniqueStationDirections,
    day_types: report.dayTypes,
    lines: report.lines,
    directions: report.directions,
    duplicate_key_rows: report.duplicateKeyRows,
    crowding_nan_count: report.crowdingNullCount,
    crowding_nan_rate: report.crowdingNullRate,
    negative_crowding_count: report.negativeCrowdingCount,
    crowding_over_200_count: report.crowdingOver200Count,
    all_time_zero_station_direction_rows: report.allZeroGroupCount,
    crowding_stats: report.crowdingStats,
    passed: report.passed,
  };
}
