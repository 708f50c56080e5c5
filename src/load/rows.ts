/**
 * Warehouse row shapes for the transform outputs.
 * Column names are snake_case, matching the daily table.
 */

import { WORKOUT_TYPES } from '../types';

import type { DailyMetric, DailyRow, DailyWorkoutSummary, WorkoutSession, WorkoutType } from '../types';

export interface WorkoutSessionRow {
  local_date: string;
  workout_type: WorkoutType;
  start_utc: string;
  end_utc: string;
  duration_seconds: number;
  distance_meters: number | null;
  elevation_gain_meters: number | null;
  record_count: number;
}

export interface WorkoutDailyRow {
  local_date: string;
  workout_type: WorkoutType;
  session_count: number;
  duration_seconds: number;
  distance_meters: number | null;
  elevation_gain_meters: number | null;
}

export interface Vo2MaxRow {
  local_date: string;
  vo2_max: number;
}

export function toSessionRow(session: WorkoutSession): WorkoutSessionRow {
  return {
    local_date: session.localDate,
    workout_type: session.workoutType,
    start_utc: session.startUtc.toISOString(),
    end_utc: session.endUtc.toISOString(),
    duration_seconds: session.durationSeconds,
    distance_meters: session.distanceMeters,
    elevation_gain_meters: session.elevationGainMeters,
    record_count: session.recordCount,
  };
}

/**
 * One row per (date, workout type) with at least one session.
 */
export function toWorkoutDailyRows(summaries: readonly DailyWorkoutSummary[]): WorkoutDailyRow[] {
  return summaries.flatMap((summary) =>
    WORKOUT_TYPES.flatMap((workoutType) => {
      const totals = summary.byType[workoutType];
      if (!totals) return [];
      return [
        {
          local_date: summary.localDate,
          workout_type: workoutType,
          session_count: totals.sessionCount,
          duration_seconds: totals.durationSeconds,
          distance_meters: totals.distanceMeters,
          elevation_gain_meters: totals.elevationGainMeters,
        },
      ];
    }),
  );
}

export function toVo2MaxRows(dailyMetrics: readonly DailyMetric[]): Vo2MaxRow[] {
  return dailyMetrics
    .filter((metric) => metric.metricType === 'vo2_max')
    .map((metric) => ({ local_date: metric.localDate, vo2_max: metric.aggregateValue }));
}

export const rowKeys = {
  dailyMetrics: (row: DailyRow) => row.local_date,
  vo2Max: (row: Vo2MaxRow) => row.local_date,
  workoutDaily: (row: WorkoutDailyRow) => `${row.local_date}|${row.workout_type}`,
  workoutSessions: (row: WorkoutSessionRow) => `${row.workout_type}|${row.start_utc}`,
} as const;
