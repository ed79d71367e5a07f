import { SchemaError } from "./errors";
import type { IdentityField, NormalizedSchema, TimeSlot } from "./types";

/** Raw export header for each identity field */
export const IDENTITY_COLUMNS: Readonly<Record<IdentityField, string>> = {
  dayType: "요일구분",
  line: "호선",
  stationCode: "역번호",
  stationName: "출발역",
  direction: "상하구분",
};

// e.g. "5시30분", " 23시00분 ". Hour may be one or two digits, minutes always two
export const TIME_COLUMN_RE = /^\s*(\p{Nd}{1,2})시(\p{Nd}{2})분\s*$/u;

const pad2 = (n: number) => n.toString().padStart(2, "0");

const DIGIT_RE = /^\p{Nd}$/u;

// Nd digits come in runs of ten starting at a zero, each run preceded by a non-digit
function digitValue(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  let zero = cp;
  while (zero > 0 && DIGIT_RE.test(String.fromCodePoint(zero - 1))) zero--;
  return (cp - zero) % 10;
}

const toInt = (digits: string) => [...digits].reduce((n, ch) => n * 10 + digitValue(ch), 0);

export const isTimeColumn = (name: string) => TIME_COLUMN_RE.test(name);

/**
 * Parse a localized time column name into hour, minute and a canonical "HH:MM" label.
 */
export function parseTimeColumn(name: string): { hour: number; minute: number; label: string } {
  const m = TIME_COLUMN_RE.exec(name);
  if (!m?.[1] || !m[2]) {
    throw new SchemaError(`Not a time column: ${name}`);
  }
  const hour = toInt(m[1]);
  const minute = toInt(m[2]);
  return { hour, minute, label: `${pad2(hour)}:${pad2(minute)}` };
}

/**
 * Classify the raw header into identity columns and time columns.
 * Time slots are numbered in their left-to-right file order.
 */
export function normalizeSchema(columns: readonly string[]): NormalizedSchema {
  const present = new Set(columns);
  const missing = Object.values(IDENTITY_COLUMNS).filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new SchemaError(`Missing required columns: ${missing.join(", ")}`);
  }

  const identityNames = new Set(Object.values(IDENTITY_COLUMNS));
  const timeSlots: TimeSlot[] = [];
  const ignored: string[] = [];
  const seen = new Set<string>();

  for (const column of columns) {
    if (seen.has(column)) {
      // rows only carry the first column of a repeated name
      ignored.push(column);
      continue;
    }
    seen.add(column);
    if (identityNames.has(column)) continue;
    if (!isTimeColumn(column)) {
      ignored.push(column);
      continue;
    }
    timeSlots.push({ column, order: timeSlots.length, ...parseTimeColumn(column) });
  }

  if (timeSlots.length === 0) {
    throw new SchemaError("No time columns (e.g. 5시30분) detected");
  }

  return { identity: { ...IDENTITY_COLUMNS }, timeSlots, ignored };
}
