import type { Selection, TidyRecord, TidyTable } from "crowding-shared/types";

export type RecordFilter = Partial<Pick<Selection, "dayType" | "line" | "stationName" | "direction">>;

/** Rows matching every given field; omitted fields match anything */
export function filterRecords(table: TidyTable, filter: RecordFilter): TidyRecord[] {
  return table.filter(
    (r) =>
      (filter.dayType === undefined || r.dayType === filter.dayType) &&
      (filter.line === undefined || r.line === filter.line) &&
      (filter.stationName === undefined || r.stationName === filter.stationName) &&
      (filter.direction === undefined || r.direction === filter.direction),
  );
}

/** Map preserving first-insertion order, including for integer-like keys */
export function groupBy<T>(items: Iterable<T>, key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const bucket = groups.get(k);
    if (bucket) bucket.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}

export const collator = new Intl.Collator("ko");
/** For labels like "10호선" that should sort after "2호선" */
export const numericCollator = new Intl.Collator("ko", { numeric: true });
