import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import iconv from "iconv-lite";
import * as _ from "radash";
import { DecodeError } from "./errors";
import type { RawRow, RawTable } from "./types";

/** Tried in order; the first one that yields a clean table wins. */
export const CANDIDATE_ENCODINGS = ["utf-8-sig", "cp949", "euc-kr"] as const;
export type CandidateEncoding = (typeof CANDIDATE_ENCODINGS)[number];

// iconv-lite strips a leading BOM on its own
const ICONV_NAMES: Record<CandidateEncoding, string> = {
  "utf-8-sig": "utf8",
  cp949: "cp949",
  "euc-kr": "euc-kr",
};

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"));

function decodeWith(bytes: Buffer, encoding: CandidateEncoding): RawTable {
  const text = iconv.decode(bytes, ICONV_NAMES[encoding]);
  if (text.includes("\uFFFD")) {
    throw new Error(`Invalid byte sequence for ${encoding}`);
  }

  // short rows (trailing blanks left off) are padded below; long rows still fail
  const parsed: unknown = parse(text, { skip_empty_lines: true, relax_column_count_less: true });
  if (!isStringMatrix(parsed)) {
    throw new Error("CSV parser returned a non-tabular result");
  }

  const [header, ...body] = parsed;
  if (!header) {
    throw new Error("Empty file: no header row");
  }
  const columns = header.map((c) => c.trim());

  const rows = body.map((cells) => {
    const row: RawRow = {};
    columns.forEach((col, i) => {
      // a repeated header keeps its first column
      if (!Object.hasOwn(row, col)) row[col] = cells[i] ?? "";
    });
    return row;
  });

  return { columns, rows, encoding };
}

/**
 * Decode a raw export whose text encoding is not known up front.
 */
export function decodeRawTable(bytes: Buffer, source = "<buffer>"): RawTable {
  let lastError: unknown;
  for (const encoding of CANDIDATE_ENCODINGS) {
    const [err, table] = _.tryit(decodeWith)(bytes, encoding);
    if (table) return table;
    lastError = err;
  }
  throw new DecodeError(source, CANDIDATE_ENCODINGS, lastError);
}

export function readRawTable(path: string): RawTable {
  console.log(`[*] Reading raw CSV: ${path}`);
  const table = decodeRawTable(readFileSync(path), path);
  console.log(`[OK] Decoded as ${table.encoding}, raw rows: ${table.rows.length.toLocaleString()}`);
  return table;
}
