import type { TidyRecord } from "crowding-shared/types";
import { describe, expect, it } from "vitest";
import { serializeTidy } from "./output";
import { normalizeSchema } from "./schema";
import { cleanCrowding, toTidy } from "./tidy";
import type { RawRow, RawTable } from "./types";

const IDS = ["요일구분", "호선", "역번호", "출발역", "상하구분"];

const row = (
  dayType: string,
  line: string,
  code: string,
  name: string,
  direction: string,
  times: Record<string, string>,
): RawRow => ({
  요일구분: dayType,
  호선: line,
  역번호: code,
  출발역: name,
  상하구분: direction,
  ...times,
});

const table = (timeColumns: string[], rows: RawRow[]): RawTable => ({
  columns: [...IDS, ...timeColumns],
  rows,
  encoding: "utf-8-sig",
});

const tidyOf = (raw: RawTable) => toTidy(raw, normalizeSchema(raw.columns));

describe("cleanCrowding", () => {
  it("parses numbers after trimming", () => {
    expect(cleanCrowding(" 12.5 ")).toBe(12.5);
    expect(cleanCrowding("-3")).toBe(-3);
    expect(cleanCrowding("1e2")).toBe(100);
  });

  it("turns blanks and missing tokens into null", () => {
    expect(cleanCrowding("")).toBeNull();
    expect(cleanCrowding("   ")).toBeNull();
    expect(cleanCrowding("nan")).toBeNull();
    expect(cleanCrowding("None")).toBeNull();
    expect(cleanCrowding(undefined)).toBeNull();
  });

  it("turns unparseable text into null", () => {
    expect(cleanCrowding("abc")).toBeNull();
    expect(cleanCrowding("0x10")).toBeNull();
    expect(cleanCrowding("1,234")).toBeNull();
  });
});

describe("toTidy", () => {
  it("unpivots one row into one record per time slot", () => {
    const raw = table(
      ["7시30분", "8시00분"],
      [row("평일", "2호선", "222", "강남", "내선", { "7시30분": "150", "8시00분": "180" })],
    );
    const base = {
      dayType: "평일",
      line: "2호선",
      stationCode: "222",
      stationName: "강남",
      direction: "내선",
    };
    expect(tidyOf(raw)).toEqual<TidyRecord[]>([
      { ...base, timeLabel: "07:30", timeOrder: 0, crowding: 150 },
      { ...base, timeLabel: "08:00", timeOrder: 1, crowding: 180 },
    ]);
  });

  it("produces rows x time columns records", () => {
    const raw = table(
      ["5시30분", "6시00분", "6시30분"],
      [
        row("평일", "1호선", "150", "서울역", "상선", {}),
        row("평일", "1호선", "151", "시청", "상선", { "5시30분": "10" }),
      ],
    );
    const tidy = tidyOf(raw);
    expect(tidy).toHaveLength(6);
    expect(tidy.filter((r) => r.crowding === null)).toHaveLength(5);
  });

  it("trims station codes", () => {
    const raw = table(["5시30분"], [row("평일", "1호선", " 150 ", "서울역", "상선", {})]);
    expect(tidyOf(raw)[0]?.stationCode).toBe("150");
  });

  it("sorts by day type, line, station code, direction and time order", () => {
    const raw = table(
      ["8시00분", "7시30분"],
      [
        row("평일", "2호선", "223", "역삼", "외선", { "8시00분": "1", "7시30분": "2" }),
        row("토요일", "2호선", "222", "강남", "내선", { "8시00분": "3", "7시30분": "4" }),
        row("평일", "2호선", "222", "강남", "외선", { "8시00분": "5", "7시30분": "6" }),
        row("평일", "2호선", "222", "강남", "내선", { "8시00분": "7", "7시30분": "8" }),
      ],
    );
    // "토요일" (U+D1A0) sorts before "평일" (U+D3C9)
    expect(tidyOf(raw).map((r) => [r.dayType, r.stationCode, r.direction, r.timeLabel])).toEqual([
      ["토요일", "222", "내선", "08:00"],
      ["토요일", "222", "내선", "07:30"],
      ["평일", "222", "내선", "08:00"],
      ["평일", "222", "내선", "07:30"],
      ["평일", "222", "외선", "08:00"],
      ["평일", "222", "외선", "07:30"],
      ["평일", "223", "외선", "08:00"],
      ["평일", "223", "외선", "07:30"],
    ]);
  });

  it("is deterministic", () => {
    const raw = table(
      ["5시30분", "6시00분"],
      [
        row("평일", "1호선", "151", "시청", "하선", { "5시30분": "3.5", "6시00분": "" }),
        row("평일", "1호선", "150", "서울역", "상선", { "5시30분": "12", "6시00분": "x" }),
      ],
    );
    expect(serializeTidy(tidyOf(raw))).toBe(serializeTidy(tidyOf(raw)));
  });
});
