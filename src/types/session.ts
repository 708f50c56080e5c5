/**
 * Workout session type definitions.
 */

import type { WorkoutType } from './workoutType';

export interface WorkoutSession {
  distanceMeters: number | null;
  durationSeconds: number;
  elevationGainMeters: number | null;
  endUtc: Date;
  localDate: string; // YYYY-MM-DD, from startUtc
  recordCount: number;
  startUtc: Date;
  workoutType: WorkoutType;
}

export interface WorkoutTotals {
  distanceMeters: number | null;
  durationSeconds: number;
  elevationGainMeters: number | null;
  sessionCount: number;
}

/**
 * Sessions of one local date summed per workout type and overall.
 */
export interface DailyWorkoutSummary extends WorkoutTotals {
  byType: Partial<Record<WorkoutType, WorkoutTotals>>;
  localDate: string;
}
