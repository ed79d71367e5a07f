import type { TidyRecord } from "crowding-shared/types";
import { describe, expect, it } from "vitest";
import { buildQualityReport, countAllZeroGroups, countDuplicateKeys, isAccepted } from "./validate";

const rec = (over: Partial<TidyRecord> = {}): TidyRecord => ({
  dayType: "평일",
  line: "2호선",
  stationCode: "222",
  stationName: "강남",
  direction: "내선",
  timeLabel: "07:30",
  timeOrder: 0,
  crowding: 100,
  ...over,
});

const NOW = new Date("2025-09-30T00:00:00.000Z");

describe("countDuplicateKeys", () => {
  it("counts every repeat after the first occurrence", () => {
    const records = [rec(), rec(), rec(), rec({ timeLabel: "08:00", timeOrder: 1 })];
    expect(countDuplicateKeys(records)).toBe(2);
  });

  it("is zero for distinct keys", () => {
    expect(countDuplicateKeys([rec(), rec({ direction: "외선" })])).toBe(0);
  });
});

describe("countAllZeroGroups", () => {
  it("flags groups whose observed values are all zero", () => {
    const records = [
      rec({ crowding: 0 }),
      rec({ timeLabel: "08:00", timeOrder: 1, crowding: null }),
      rec({ direction: "외선", crowding: 0 }),
      rec({ direction: "외선", timeLabel: "08:00", timeOrder: 1, crowding: 5 }),
      rec({ stationCode: "223", stationName: "역삼", crowding: null }),
    ];
    expect(countAllZeroGroups(records)).toEqual({ groups: 3, allZero: 1 });
  });
});

describe("buildQualityReport", () => {
  it("summarizes a clean table", () => {
    const records = [
      rec({ crowding: 10 }),
      rec({ timeLabel: "08:00", timeOrder: 1, crowding: 30 }),
      rec({ timeLabel: "08:30", timeOrder: 2, crowding: null }),
      rec({ dayType: "토요일", line: "1호선", stationCode: "150", stationName: "서울역", direction: "상선", crowding: 20 }),
    ];
    const report = buildQualityReport(records, NOW);
    expect(report).toEqual({
      timestamp: "2025-09-30T00:00:00.000Z",
      rowsTidy: 4,
      uniqueStations: 2,
      uniqueStationDirections: 2,
      dayTypes: ["평일", "토요일"],
      lines: ["1호선", "2호선"],
      directions: ["내선", "상선"],
      duplicateKeyRows: 0,
      crowdingNullCount: 1,
      crowdingNullRate: 0.25,
      negativeCrowdingCount: 0,
      crowdingOver200Count: 0,
      allZeroGroupCount: 0,
      crowdingStats: { min: 10, max: 30, mean: 20, median: 20 },
      passed: true,
    });
  });

  it("counts each negative cell and fails", () => {
    const records = [
      rec({ crowding: -1 }),
      rec({ timeLabel: "08:00", timeOrder: 1, crowding: -0.5 }),
      rec({ timeLabel: "08:30", timeOrder: 2, crowding: 0 }),
    ];
    const report = buildQualityReport(records, NOW);
    expect(report.negativeCrowdingCount).toBe(2);
    expect(report.passed).toBe(false);
  });

  it("fails on duplicate keys", () => {
    const report = buildQualityReport([rec(), rec()], NOW);
    expect(report.duplicateKeyRows).toBe(1);
    expect(report.passed).toBe(false);
  });

  it("treats values over 200 and all-zero groups as advisory", () => {
    const records = [
      rec({ crowding: 250 }),
      rec({ direction: "외선", crowding: 0 }),
    ];
    const report = buildQualityReport(records, NOW);
    expect(report.crowdingOver200Count).toBe(1);
    expect(report.allZeroGroupCount).toBe(1);
    expect(report.passed).toBe(true);
  });

  it("reports null statistics when nothing was observed", () => {
    const report = buildQualityReport([rec({ crowding: null })], NOW);
    expect(report.crowdingStats).toEqual({ min: null, max: null, mean: null, median: null });
    expect(report.crowdingNullRate).toBe(1);
  });

  it("handles an empty table", () => {
    const report = buildQualityReport([], NOW);
    expect(report.rowsTidy).toBe(0);
    expect(report.crowdingNullRate).toBe(0);
    expect(report.passed).toBe(true);
  });
});

describe("isAccepted", () => {
  it("only looks at duplicates and negatives", () => {
    expect(isAccepted({ duplicateKeyRows: 0, negativeCrowdingCount: 0 })).toBe(true);
    expect(isAccepted({ duplicateKeyRows: 1, negativeCrowdingCount: 0 })).toBe(false);
    expect(isAccepted({ duplicateKeyRows: 0, negativeCrowdingCount: 3 })).toBe(false);
  });
});
