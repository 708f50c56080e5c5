/**
 * Daily aggregation.
 * Groups normalized records by (local date, metric type) and reduces each
 * group with the metric's fixed strategy.
 */

import { compareRecords, compareStrings, dedupeRecords } from '../utils/deduplication';
import { METRIC_DEFINITIONS } from './metricTable';
import { roundTo } from './units';

import type { DailyMetric, MetricType, NormalizedRecord } from '../types';
import type { Reduction } from './metricTable';

type DailyReduction = Exclude<Reduction, 'workout_stream'>;

const RESULT_DECIMALS = 6;

const REDUCERS: Record<DailyReduction, (records: readonly NormalizedRecord[]) => number> = {
  interval_duration_sum: (records) =>
    records.reduce((sum, r) => sum + durationSeconds(r), 0),

  // Greatest end, then greatest start, then larger value
  latest: (records) =>
    records.reduce((latest, record) =>
      (record.endUtc.getTime() - latest.endUtc.getTime() ||
        record.startUtc.getTime() - latest.startUtc.getTime() ||
        record.value - latest.value) > 0
        ? record
        : latest,
    ).value,

  mean: (records) => records.reduce((sum, r) => sum + r.value, 0) / records.length,

  sum: (records) => records.reduce((sum, r) => sum + r.value, 0),

  time_weighted_mean: (records) => {
    // Instantaneous samples carry no interval to weight by
    if (records.some((record) => durationSeconds(record) === 0)) return REDUCERS.mean(records);

    let weighted = 0;
    let totalWeight = 0;
    for (const record of records) {
      const weight = durationSeconds(record);
      weighted += record.value * weight;
      totalWeight += weight;
    }
    return weighted / totalWeight;
  },
};

/**
 * Aggregate normalized records into one DailyMetric per (date, metric type).
 * Duplicates are removed first, so aggregating a record set twice over gives
 * the same output as aggregating it once. Workout streams are left to the
 * segmenter. Output is sorted by date, then metric type.
 */
export function aggregate(records: readonly NormalizedRecord[]): DailyMetric[] {
  const { records: unique } = dedupeRecords(records);
  const groups = new Map<string, { localDate: string; metricType: MetricType; records: NormalizedRecord[] }>();

  for (const record of unique) {
    if (METRIC_DEFINITIONS[record.metricType].reduction === 'workout_stream') continue;

    const key = `${record.localDate}|${record.metricType}`;
    let group = groups.get(key);
    if (!group) {
      group = { localDate: record.localDate, metricType: record.metricType, records: [] };
      groups.set(key, group);
    }
    group.records.push(record);
  }

  const result: DailyMetric[] = [];
  for (const group of groups.values()) {
    const { reduction } = METRIC_DEFINITIONS[group.metricType];
    if (reduction === 'workout_stream') continue;

    const ordered = [...group.records].sort(compareRecords);
    result.push({
      aggregateValue: roundTo(REDUCERS[reduction](ordered), RESULT_DECIMALS),
      localDate: group.localDate,
      metricType: group.metricType,
    });
  }

  return result.sort(
    (a, b) => compareStrings(a.localDate, b.localDate) || compareStrings(a.metricType, b.metricType),
  );
}

function durationSeconds(record: NormalizedRecord): number {
  return (record.endUtc.getTime() - record.startUtc.getTime()) / 1000;
}
