import fs from "node:fs/promises";
import type { TidyRecord, TidyTable } from "crowding-shared/types";
import { TIDY_COLUMNS } from "crowding-shared/types";
import { parse } from "csv-parse/sync";

export class TidyFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TidyFormatError";
  }
}

const isRowArray = (value: unknown): value is Record<string, unknown>[] =>
  Array.isArray(value) && value.every((row) => typeof row === "object" && row !== null);

const field = (row: Record<string, unknown>, name: string, line: number): string => {
  const v = row[name];
  if (typeof v !== "string") {
    throw new TidyFormatError(`Row ${line}: missing ${name}`);
  }
  return v;
};

/**
 * Parse the persisted tidy CSV. Row order is kept as written.
 */
export function parseTidyCsv(text: string): TidyRecord[] {
  const parsed: unknown = parse(text, { bom: true, columns: true, skip_empty_lines: true });
  if (!isRowArray(parsed)) {
    throw new TidyFormatError("Tidy table is not a list of rows");
  }

  return parsed.map((row, i) => {
    const line = i + 2; // 1-based, after the header
    const [dayType, lineId, stationCode, stationName, direction, timeLabel, timeOrder, crowding] =
      TIDY_COLUMNS.map((c) => field(row, c, line));

    const order = Number(timeOrder);
    if (!Number.isInteger(order) || order < 0) {
      throw new TidyFormatError(`Row ${line}: bad time_order ${timeOrder}`);
    }
    const value = crowding === "" || crowding === undefined ? null : Number(crowding);
    if (value !== null && !Number.isFinite(value)) {
      throw new TidyFormatError(`Row ${line}: bad crowding ${crowding}`);
    }

    return {
      dayType: dayType ?? "",
      line: lineId ?? "",
      stationCode: stationCode ?? "",
      stationName: stationName ?? "",
      direction: direction ?? "",
      timeLabel: timeLabel ?? "",
      timeOrder: order,
      crowding: value,
    };
  });
}

export async function loadTidyTable(csvPath: string): Promise<TidyTable> {
  const text = await fs.readFile(csvPath, "utf8");
  return Object.freeze(parseTidyCsv(text).map((r) => Object.freeze(r)));
}

/**
 * Process-wide holder for the tidy table. The file is read at most once;
 * concurrent callers share the same in-flight load and the same frozen table.
 */
export class TidyTableStore {
  private pending: Promise<TidyTable> | null = null;

  constructor(
    readonly csvPath: string,
    private readonly loader: (p: string) => Promise<TidyTable> = loadTidyTable,
  ) {}

  get(): Promise<TidyTable> {
    if (!this.pending) {
      this.pending = this.loader(this.csvPath).catch((err: unknown) => {
        // A failed load is not cached; the next caller tries again
        this.pending = null;
        throw err;
      });
    }
    return this.pending;
  }
}
