/**
 * Daily aggregate type definitions.
 */

import type { MetricType } from './metricType';

export interface DailyMetric {
  aggregateValue: number;
  localDate: string; // YYYY-MM-DD
  metricType: MetricType;
}

export type Weekday =
  | 'Friday'
  | 'Monday'
  | 'Saturday'
  | 'Sunday'
  | 'Thursday'
  | 'Tuesday'
  | 'Wednesday';

/**
 * One output row per local date.
 * Column names are stable and map one-to-one onto the warehouse schema.
 * `null` means no record contributed to the column that day.
 */
export interface DailyRow {
  local_date: string;
  weekday: Weekday;
  week_ending_date: string;

  active_calories_kcal: number | null;
  basal_calories_kcal: number | null;
  total_calories_kcal: number | null;
  dietary_calories_kcal: number | null;
  step_count: number | null;

  resting_heart_rate_bpm: number | null;
  walking_heart_rate_bpm: number | null;
  avg_heart_rate_bpm: number | null;
  vo2_max: number | null;
  body_mass_kg: number | null;

  core_sleep_seconds: number | null;
  deep_sleep_seconds: number | null;
  rem_sleep_seconds: number | null;
  awake_seconds: number | null;
  in_bed_seconds: number | null;
  total_sleep_seconds: number | null;
  core_sleep_seconds_next_night: number | null;
  deep_sleep_seconds_next_night: number | null;
  rem_sleep_seconds_next_night: number | null;
  total_sleep_seconds_next_night: number | null;

  running_seconds: number | null;
  running_distance_meters: number | null;
  running_elevation_gain_meters: number | null;
  walking_seconds: number | null;
  walking_distance_meters: number | null;
  cycling_seconds: number | null;
  cycling_distance_meters: number | null;
  strength_training_seconds: number | null;
  hiit_seconds: number | null;
  core_training_seconds: number | null;
  total_workout_seconds: number | null;
  workout_count: number | null;

  ran: boolean;
  strength_trained: boolean;
  hiit_trained: boolean;
  core_trained: boolean;
  exercised: boolean;
}
