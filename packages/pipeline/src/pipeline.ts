import type { QualityReport, TidyRecord } from "crowding-shared/types";
import { readRawTable } from "./read-raw";
import { normalizeSchema } from "./schema";
import { toTidy } from "./tidy";
import type { RawTable } from "./types";
import { buildQualityReport } from "./validate";

export type PipelineResult = {
  tidy: TidyRecord[];
  report: QualityReport;
  timeColumns: number;
  ignoredColumns: string[];
};

/** Normalize, reshape and validate an already decoded raw table. */
export function processRawTable(raw: RawTable, now?: Date): PipelineResult {
  const schema = normalizeSchema(raw.columns);
  console.log(`  - Time columns: ${schema.timeSlots.length}`);
  if (schema.ignored.length > 0) {
    console.warn(`  - Ignoring unrecognized columns: ${schema.ignored.join(", ")}`);
  }

  const tidy = toTidy(raw, schema);
  console.log(`[OK] Long format: ${tidy.length.toLocaleString("en-US")} rows`);

  const report = buildQualityReport(tidy, now);
  return { tidy, report, timeColumns: schema.timeSlots.length, ignoredColumns: schema.ignored };
}

export function runPipeline(inputPath: string, now?: Date): PipelineResult {
  return processRawTable(readRawTable(inputPath), now);
}
