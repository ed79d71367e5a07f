import type { TimeLabel } from "crowding-shared/types";
import type { CandidateEncoding } from "./read-raw";

/** One raw record, keyed by trimmed header name. Cells are untouched text */
export type RawRow = Record<string, string>;

export interface RawTable {
  columns: string[];
  rows: RawRow[];
  encoding: CandidateEncoding;
}

export type TimeSlot = Readonly<{
  /** Header name exactly as it appears in the raw table */
  column: string;
  label: TimeLabel;
  order: number;
  hour: number;
  minute: number;
}>;

export type IdentityField = "dayType" | "line" | "stationCode" | "stationName" | "direction";

export interface NormalizedSchema {
  /** identity field -> raw header name */
  identity: Record<IdentityField, string>;
  timeSlots: TimeSlot[];
  /** Columns that are neither identity nor time columns */
  ignored: string[];
}
