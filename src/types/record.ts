/**
 * Health record type definitions.
 * Raw records as produced by the export reader and their normalized form.
 */

import type { MetricType } from './metricType';
import type { WorkoutType } from './workoutType';

/**
 * A single record yielded by the Extract stage.
 * Timestamps carry the offset written by the export, e.g.
 * "2024-01-01 08:00:00 -0600" or "2024-01-01T08:00:00-06:00".
 */
export interface RawRecord {
  end: string;
  metricType: string; // canonical name or HealthKit identifier
  source: string;
  start: string;
  value: number;
  unit?: string;
  workoutType?: string;
}

/**
 * Record with its value in the canonical unit and a local calendar date.
 * `localDate` comes from `startUtc` in the configured timezone, never from
 * the offset embedded in the export.
 */
export interface NormalizedRecord {
  endUtc: Date;
  localDate: string; // YYYY-MM-DD
  metricType: MetricType;
  source: string;
  startUtc: Date;
  value: number;
  workoutType?: WorkoutType;
}
