import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import iconv from "iconv-lite";
import { describe, expect, it } from "vitest";
import { DecodeError } from "./errors";
import { decodeRawTable, readRawTable } from "./read-raw";

const CSV = [
  "요일구분, 호선 ,역번호,출발역,상하구분,5시30분",
  "평일,2호선,222,강남,내선,31.2",
  "",
  "평일,2호선,222,강남,외선,",
].join("\n");

describe("decodeRawTable", () => {
  it("reads UTF-8 with a BOM and trims header names", () => {
    const table = decodeRawTable(Buffer.from(`\uFEFF${CSV}`, "utf8"));
    expect(table.encoding).toBe("utf-8-sig");
    expect(table.columns).toEqual(["요일구분", "호선", "역번호", "출발역", "상하구분", "5시30분"]);
    expect(table.rows).toEqual([
      { 요일구분: "평일", 호선: "2호선", 역번호: "222", 출발역: "강남", 상하구분: "내선", "5시30분": "31.2" },
      { 요일구분: "평일", 호선: "2호선", 역번호: "222", 출발역: "강남", 상하구분: "외선", "5시30분": "" },
    ]);
  });

  it("falls back to cp949", () => {
    const table = decodeRawTable(iconv.encode(CSV, "cp949"));
    expect(table.encoding).toBe("cp949");
    expect(table.rows[0]?.출발역).toBe("강남");
  });

  it("throws DecodeError once every encoding is exhausted", () => {
    const bytes = Buffer.from([0xff, 0xff, 0x0a, 0xff]);
    expect(() => decodeRawTable(bytes, "bad.csv")).toThrow(DecodeError);
    try {
      decodeRawTable(bytes, "bad.csv");
    } catch (e) {
      expect(e).toBeInstanceOf(DecodeError);
      expect(e instanceof Error && e.cause instanceof Error).toBe(true);
    }
  });

  it("pads rows whose trailing cells were left off", () => {
    const csv = [
      "요일구분,호선,역번호,출발역,상하구분,7시30분,8시00분",
      "평일,2호선,222,강남,내선,150,180",
      "평일,2호선,222,강남,외선,90",
    ].join("\n");
    const table = decodeRawTable(Buffer.from(csv, "utf8"));
    expect(table.encoding).toBe("utf-8-sig");
    expect(table.rows[1]).toEqual({
      요일구분: "평일",
      호선: "2호선",
      역번호: "222",
      출발역: "강남",
      상하구분: "외선",
      "7시30분": "90",
      "8시00분": "",
    });
  });

  it("still rejects rows with more cells than the header", () => {
    const csv = ["요일구분,호선,역번호,출발역,상하구분,7시30분", "평일,2호선,222,강남,내선,150,180"].join("\n");
    expect(() => decodeRawTable(Buffer.from(csv, "utf8"))).toThrow(DecodeError);
  });

  it("keeps the first column of a repeated header", () => {
    const csv = ["요일구분,호선,역번호,출발역,상하구분,7시30분,7시30분", "평일,2호선,222,강남,내선,150,999"].join("\n");
    const table = decodeRawTable(Buffer.from(csv, "utf8"));
    expect(table.rows[0]?.["7시30분"]).toBe("150");
  });

  it("rejects a file with no header", () => {
    expect(() => decodeRawTable(Buffer.alloc(0))).toThrow(DecodeError);
  });
});

describe("readRawTable", () => {
  it("reads from disk", () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), "crowding-raw-"));
    const file = path.join(dir, "raw.csv");
    writeFileSync(file, iconv.encode(CSV, "cp949"));
    expect(readRawTable(file).rows).toHaveLength(2);
  });

  it("lets a missing file surface as an I/O error", () => {
    expect(() => readRawTable("/nonexistent/raw.csv")).toThrow(/ENOENT/);
  });
});
