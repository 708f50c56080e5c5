/**
 * Record normalization.
 * Converts raw export records into canonical units with a local calendar date.
 */

import {
  InvalidTimeRangeError,
  MissingWorkoutTypeError,
  UnsupportedMetricError,
  UnsupportedUnitError,
} from '../errors';
import { isMetricType, isWorkoutStreamType, isWorkoutType } from '../types';
import {
  formatDateInTimezone,
  parseExportTimestamp,
  startOfNextLocalDay,
} from '../utils/dateUtilities';
import {
  HEALTHKIT_METRIC_ALIASES,
  HEALTHKIT_WORKOUT_ALIASES,
  isAdditive,
  METRIC_DEFINITIONS,
} from './metricTable';
import { convertUnit, roundTo } from './units';

import type {
  MetricType,
  NormalizedRecord,
  PipelineConfig,
  RawRecord,
  WorkoutType,
} from '../types';

/**
 * Resolve a canonical metric name or HealthKit identifier.
 */
export function resolveMetricType(name: string): MetricType | undefined {
  if (isMetricType(name)) return name;
  return Object.hasOwn(HEALTHKIT_METRIC_ALIASES, name) ? HEALTHKIT_METRIC_ALIASES[name] : undefined;
}

/**
 * Resolve a workout type. Names that are neither canonical nor a known
 * HealthKit activity type fall into 'other'.
 */
export function resolveWorkoutType(name: string | undefined): WorkoutType | undefined {
  if (name === undefined || name === '') return undefined;
  if (isWorkoutType(name)) return name;
  return Object.hasOwn(HEALTHKIT_WORKOUT_ALIASES, name) ? HEALTHKIT_WORKOUT_ALIASES[name] : 'other';
}

/**
 * Target unit for a metric: the configured override, else the fixed default.
 */
export function canonicalUnitFor(metricType: MetricType, config: PipelineConfig): string {
  return config.canonicalUnits[metricType] ?? METRIC_DEFINITIONS[metricType].canonicalUnit;
}

/**
 * Normalize one raw record.
 *
 * @throws UnsupportedMetricError if the metric type is unknown
 * @throws UnsupportedUnitError if the unit does not convert to the canonical unit
 * @throws InvalidTimeRangeError if a timestamp does not parse or end is before start
 * @throws MissingWorkoutTypeError if a workout stream record names no workout type
 */
export function normalize(raw: RawRecord, config: PipelineConfig): NormalizedRecord {
  const metricType = resolveMetricType(raw.metricType);
  if (!metricType) {
    throw new UnsupportedMetricError(raw.metricType);
  }

  const startUtc = parseExportTimestamp(raw.start);
  const endUtc = parseExportTimestamp(raw.end);
  if (!startUtc || !endUtc) {
    throw new InvalidTimeRangeError(raw.start, raw.end, 'timestamp does not parse');
  }
  if (endUtc.getTime() < startUtc.getTime()) {
    throw new InvalidTimeRangeError(raw.start, raw.end);
  }

  const definition = METRIC_DEFINITIONS[metricType];
  const fromUnit = raw.unit === undefined || raw.unit === '' ? definition.canonicalUnit : raw.unit;
  const value = convertUnit(
    raw.value,
    fromUnit,
    canonicalUnitFor(metricType, config),
    definition.dimension,
  );
  if (value === undefined) {
    throw new UnsupportedUnitError(metricType, fromUnit);
  }

  const workoutType = resolveWorkoutType(raw.workoutType);
  if (!workoutType && isWorkoutStreamType(metricType)) {
    throw new MissingWorkoutTypeError(metricType);
  }

  return {
    endUtc,
    localDate: formatDateInTimezone(startUtc, config.localTimezone),
    metricType,
    source: raw.source,
    startUtc,
    value,
    ...(workoutType ? { workoutType } : {}),
  };
}

/**
 * Apply the midnight policy to a normalized record.
 *
 * With 'start-day' the record is returned as is. With 'split' a record that
 * crosses local midnight is cut into one piece per local day; additive values
 * are apportioned by each piece's share of the interval. Point samples are
 * never split.
 */
export function attributeToDays(record: NormalizedRecord, config: PipelineConfig): NormalizedRecord[] {
  if (config.midnightPolicy === 'start-day') return [record];

  const { reduction } = METRIC_DEFINITIONS[record.metricType];
  const additive = isAdditive(record.metricType);
  if (!additive && reduction !== 'interval_duration_sum') return [record];

  const startMs = record.startUtc.getTime();
  const endMs = record.endUtc.getTime();
  const totalMs = endMs - startMs;
  if (totalMs === 0) return [record];

  const pieces: NormalizedRecord[] = [];
  let cursor = record.startUtc;
  while (cursor.getTime() < endMs) {
    const boundary = startOfNextLocalDay(cursor, config.localTimezone);
    if (boundary.getTime() <= cursor.getTime()) {
      throw new InvalidTimeRangeError(
        record.startUtc.toISOString(),
        record.endUtc.toISOString(),
        `no local midnight after ${cursor.toISOString()} in ${config.localTimezone}`,
      );
    }
    const pieceEnd = boundary.getTime() < endMs ? boundary : record.endUtc;
    const share = (pieceEnd.getTime() - cursor.getTime()) / totalMs;

    pieces.push({
      ...record,
      endUtc: pieceEnd,
      localDate: formatDateInTimezone(cursor, config.localTimezone),
      startUtc: cursor,
      value: additive ? roundTo(record.value * share, 6) : record.value,
    });
    cursor = pieceEnd;
  }

  return pieces.length === 1 ? [record] : pieces;
}
