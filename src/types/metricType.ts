/**
 * Metric types understood by the transform stage.
 */

export const METRIC_TYPES = [
  'active_energy',
  'basal_energy',
  'body_mass',
  'dietary_energy',
  'heart_rate',
  'resting_heart_rate',
  'sleep_awake',
  'sleep_core',
  'sleep_deep',
  'sleep_in_bed',
  'sleep_rem',
  'step_count',
  'vo2_max',
  'walking_heart_rate',
  'workout_distance',
  'workout_duration',
  'workout_elevation',
] as const;

export type MetricType = (typeof METRIC_TYPES)[number];

/**
 * Streams that only carry meaning inside a workout session.
 */
export const WORKOUT_STREAM_TYPES = [
  'workout_distance',
  'workout_duration',
  'workout_elevation',
] as const satisfies readonly MetricType[];

export type WorkoutStreamType = (typeof WORKOUT_STREAM_TYPES)[number];

const METRIC_TYPE_SET = new Set<string>(METRIC_TYPES);
const WORKOUT_STREAM_SET = new Set<string>(WORKOUT_STREAM_TYPES);

export function isMetricType(value: string): value is MetricType {
  return METRIC_TYPE_SET.has(value);
}

export function isWorkoutStreamType(value: string): value is WorkoutStreamType {
  return WORKOUT_STREAM_SET.has(value);
}
