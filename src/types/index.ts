/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

// Daily aggregate types
export type { DailyMetric, DailyRow, Weekday } from './daily';

// Metric types
export { METRIC_TYPES, WORKOUT_STREAM_TYPES, isMetricType, isWorkoutStreamType } from './metricType';
export type { MetricType, WorkoutStreamType } from './metricType';

// Pipeline types
export type {
  ErrorSummary,
  MidnightPolicy,
  PipelineConfig,
  RecordErrorKind,
  TransformResult,
  TransformStats,
} from './pipeline';

// Record types
export type { NormalizedRecord, RawRecord } from './record';

// Session types
export type { DailyWorkoutSummary, WorkoutSession, WorkoutTotals } from './session';

// Workout types
export { WORKOUT_TYPES, isWorkoutType } from './workoutType';
export type { WorkoutType } from './workoutType';
