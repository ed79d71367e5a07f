import type { TidyRecord } from "crowding-shared/types";
import type { NormalizedSchema, RawTable } from "./types";

const MISSING_TOKENS = new Set(["", "nan", "none", "null"]);
const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Coerce one raw cell to a crowding value. Anything unreadable becomes null */
export function cleanCrowding(cell: string | undefined): number | null {
  const s = (cell ?? "").trim();
  if (MISSING_TOKENS.has(s.toLowerCase()) || !DECIMAL_RE.test(s)) return null;
  const v = Number(s);
  return Number.isFinite(v) ? v : null;
}

// Plain code-unit order, so the result does not depend on the host locale
const cmp = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export function compareTidy(a: TidyRecord, b: TidyRecord): number {
  return (
    cmp(a.dayType, b.dayType) ||
    cmp(a.line, b.line) ||
    cmp(a.stationCode, b.stationCode) ||
    cmp(a.direction, b.direction) ||
    a.timeOrder - b.timeOrder
  );
}

/**
 * Unpivot the wide raw table into one record per (row, time slot),
 * ordered by day type, line, station code, direction and time order.
 */
export function toTidy(raw: RawTable, schema: NormalizedSchema): TidyRecord[] {
  const { identity, timeSlots } = schema;
  const records: TidyRecord[] = [];

  for (const row of raw.rows) {
    const base = {
      dayType: row[identity.dayType] ?? "",
      line: row[identity.line] ?? "",
      stationCode: (row[identity.stationCode] ?? "").trim(),
      stationName: row[identity.stationName] ?? "",
      direction: row[identity.direction] ?? "",
    };
    for (const slot of timeSlots) {
      records.push({
        ...base,
        timeLabel: slot.label,
        timeOrder: slot.order,
        crowding: cleanCrowding(row[slot.column]),
      });
    }
  }

  // Array.prototype.sort is stable, ties keep the unpivot order
  return records.sort(compareTidy);
}
