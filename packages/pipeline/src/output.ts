import { mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import {
  TIDY_COLUMNS,
  type QualityReport,
  type TidyColumn,
  type TidyTable,
} from "crowding-shared/types";
import { stringify } from "csv-stringify/sync";
import { qualityReportJson } from "./report";

export const TIDY_FILE = "subway_crowding_tidy.csv";
export const REPORT_FILE = "quality_report.json";

/** UTF-8 with BOM so spreadsheet tools pick up the Hangul headers */
export function serializeTidy(records: TidyTable): string {
  const rows = records.map(
    (r): Record<TidyColumn, string | number> => ({
      day_type: r.dayType,
      line: r.line,
      station_code: r.stationCode,
      station_name: r.stationName,
      direction: r.direction,
      time_label: r.timeLabel,
      time_order: r.timeOrder,
      crowding: r.crowding ?? "",
    }),
  );
  return stringify(rows, { bom: true, header: true, columns: [...TIDY_COLUMNS] });
}

export function serializeReport(report: QualityReport): string {
  return `${JSON.stringify(qualityReportJson(report), null, 2)}\n`;
}

/**
 * Write every artifact to a temporary sibling first, then move them all into place.
 * A failure while staging leaves previous outputs untouched. The moves happen one by one
 * in `files` order, so list the file readers load last: if a move fails, the files before
 * it are already replaced and the remaining staging files are removed.
 */
export function writeArtifacts(outDir: string, files: Record<string, string>): string[] {
  mkdirSync(outDir, { recursive: true });
  const staged: [string, string][] = [];
  try {
    for (const [name, content] of Object.entries(files)) {
      const target = path.join(outDir, name);
      const tmp = `${target}.tmp`;
      writeFileSync(tmp, content, "utf8");
      staged.push([tmp, target]);
    }
  } catch (e) {
    for (const [tmp] of staged) rmSync(tmp, { force: true });
    throw e;
  }
  let moved = 0;
  try {
    for (const [tmp, target] of staged) {
      renameSync(tmp, target);
      moved++;
    }
  } catch (e) {
    for (const [tmp] of staged.slice(moved)) rmSync(tmp, { force: true });
    throw e;
  }
  return staged.map(([, target]) => target);
}
