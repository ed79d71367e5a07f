export { DecodeError, SchemaError } from "./errors";
export { REPORT_FILE, serializeReport, serializeTidy, TIDY_FILE, writeArtifacts } from "./output";
export { type PipelineResult, processRawTable, runPipeline } from "./pipeline";
export { CANDIDATE_ENCODINGS, decodeRawTable, readRawTable } from "./read-raw";
export { formatQualityReport, qualityReportJson } from "./report";
export { IDENTITY_COLUMNS, isTimeColumn, normalizeSchema, parseTimeColumn } from "./schema";
export { cleanCrowding, compareTidy, toTidy } from "./tidy";
export type { NormalizedSchema, RawRow, RawTable, TimeSlot } from "./types";
export { buildQualityReport, countAllZeroGroups, countDuplicateKeys, isAccepted } from "./validate";
