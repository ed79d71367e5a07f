import { mean, median, present, roundTo } from "crowding-shared/math";
import type { QualityReport, TidyRecord, TidyTable } from "crowding-shared/types";
import * as _ from "radash";

/** Values above this are reported, never rejected */
export const SUSPICIOUS_CROWDING = 200;

const cmp = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const recordKey = (r: TidyRecord) =>
  JSON.stringify([r.dayType, r.line, r.stationCode, r.stationName, r.direction, r.timeLabel]);

export const groupKey = (r: TidyRecord) =>
  JSON.stringify([r.dayType, r.line, r.stationCode, r.stationName, r.direction]);

/** Rows whose key was already seen earlier in the table */
export function countDuplicateKeys(records: TidyTable): number {
  const seen = new Set<string>();
  let dup = 0;
  for (const r of records) {
    const key = recordKey(r);
    if (seen.has(key)) dup++;
    else seen.add(key);
  }
  return dup;
}

/**
 * Station/direction groups with at least one observation where every observation is zero.
 * Nulls are skipped.
 */
export function countAllZeroGroups(records: TidyTable): { groups: number; allZero: number } {
  const groups = new Map<string, (number | null)[]>();
  for (const r of records) {
    const key = groupKey(r);
    const values = groups.get(key);
    if (values) values.push(r.crowding);
    else groups.set(key, [r.crowding]);
  }

  let allZero = 0;
  for (const values of groups.values()) {
    const observed = present(values);
    if (observed.length > 0 && observed.every((v) => v === 0)) allZero++;
  }
  return { groups: groups.size, allZero };
}

/** Passes iff there are no duplicate keys and no negative values */
export const isAccepted = (r: Pick<QualityReport, "duplicateKeyRows" | "negativeCrowdingCount">) =>
  r.duplicateKeyRows === 0 && r.negativeCrowdingCount === 0;

export function buildQualityReport(records: TidyTable, now: Date = new Date()): QualityReport {
  const values = present(records.map((r) => r.crowding));
  const nullCount = records.length - values.length;
  const { groups, allZero } = countAllZeroGroups(records);

  const duplicateKeyRows = countDuplicateKeys(records);
  const negativeCrowdingCount = values.filter((v) => v < 0).length;

  return {
    timestamp: now.toISOString(),
    rowsTidy: records.length,
    uniqueStations: new Set(records.map((r) => JSON.stringify([r.stationCode, r.stationName])))
      .size,
    uniqueStationDirections: groups,
    // Set keeps first-seen order
    dayTypes: [...new Set(records.map((r) => r.dayType))],
    lines: [...new Set(records.map((r) => r.line))].sort(cmp),
    directions: [...new Set(records.map((r) => r.direction))].sort(cmp),
    duplicateKeyRows,
    crowdingNullCount: nullCount,
    crowdingNullRate: records.length ? roundTo(nullCount / records.length, 4) : 0,
    negativeCrowdingCount,
    crowdingOver200Count: values.filter((v) => v > SUSPICIOUS_CROWDING).length,
    allZeroGroupCount: allZero,
    crowdingStats: {
      min: _.min(values) ?? null,
      max: _.max(values) ?? null,
      mean: mean(values),
      median: median(values),
    },
    passed: isAccepted({ duplicateKeyRows, negativeCrowdingCount }),
  };
}
