import type { NormalizedRecord } from '../types';

export interface DedupeResult<T extends NormalizedRecord = NormalizedRecord> {
  duplicateCount: number;
  records: T[];
}

/**
 * Create a deterministic identity string for a normalized record.
 * Two records with the same metric type, workout type, interval and value
 * produce the same key regardless of their source.
 */
export function createRecordKey(record: NormalizedRecord): string {
  const start = record.startUtc.toISOString();
  const end = record.endUtc.toISOString();
  const workoutType = record.workoutType ?? '';
  return `${record.metricType}|${workoutType}|${start}|${end}|${String(record.value)}`;
}

/**
 * Drop structural duplicates, keeping the first occurrence.
 * Re-exported data often repeats records verbatim; running the result
 * through this again yields the same set.
 */
export function dedupeRecords<T extends NormalizedRecord>(records: readonly T[]): DedupeResult<T> {
  const seen = new Set<string>();
  const unique: T[] = [];
  let duplicateCount = 0;

  for (const record of records) {
    const key = createRecordKey(record);
    if (seen.has(key)) {
      duplicateCount++;
    } else {
      seen.add(key);
      unique.push(record);
    }
  }

  return { duplicateCount, records: unique };
}

/**
 * Total order over normalized records: start, end, value, then source.
 * Reducers walk groups in this order so float sums never depend on input order.
 */
export function compareRecords(a: NormalizedRecord, b: NormalizedRecord): number {
  return (
    a.startUtc.getTime() - b.startUtc.getTime() ||
    a.endUtc.getTime() - b.endUtc.getTime() ||
    a.value - b.value ||
    compareStrings(a.source, b.source)
  );
}

/**
 * Code-unit string comparison, independent of the host locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
