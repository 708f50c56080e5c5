/**
 * Transform run type definitions.
 */

import type { DailyMetric, DailyRow } from './daily';
import type { MetricType } from './metricType';
import type { DailyWorkoutSummary, WorkoutSession } from './session';

export type RecordErrorKind =
  | 'invalid_record'
  | 'invalid_time_range'
  | 'missing_workout_type'
  | 'unsupported_metric'
  | 'unsupported_unit';

export type ErrorSummary = Record<RecordErrorKind, number>;

export interface TransformStats {
  duplicateRecords: number;
  inputRecords: number;
  normalizedRecords: number;
  skippedRecords: number;
}

export interface TransformResult {
  dailyMetrics: DailyMetric[];
  errors: ErrorSummary;
  rows: DailyRow[];
  sessions: WorkoutSession[];
  stats: TransformStats;
  workoutSummaries: DailyWorkoutSummary[];
}

/**
 * How a record crossing local midnight is attributed.
 * - start-day: the whole record belongs to the day containing its start
 * - split: the record is cut at each local midnight
 */
export type MidnightPolicy = 'split' | 'start-day';

/**
 * Immutable options threaded through every transform call.
 */
export interface PipelineConfig {
  canonicalUnits: Readonly<Partial<Record<MetricType, string>>>;
  localTimezone: string; // IANA zone name
  mergeGapSeconds: number;
  midnightPolicy: MidnightPolicy;
  since?: string; // YYYY-MM-DD, inclusive
}
