/**
 * Fixed per-metric properties: dimension, canonical unit and reduction.
 * The reduction is chosen once per metric type and cannot be overridden at
 * call time.
 */

import { UnsupportedUnitError } from '../errors';
import { convertUnit } from './units';

import type { MetricType, PipelineConfig, WorkoutType } from '../types';
import type { Dimension } from './units';

export type Reduction =
  | 'interval_duration_sum'
  | 'latest'
  | 'mean'
  | 'sum'
  | 'time_weighted_mean'
  | 'workout_stream';

export interface MetricDefinition {
  canonicalUnit: string;
  dimension: Dimension;
  reduction: Reduction;
}

export const METRIC_DEFINITIONS: Readonly<Record<MetricType, MetricDefinition>> = {
  active_energy: { canonicalUnit: 'kcal', dimension: 'energy', reduction: 'sum' },
  basal_energy: { canonicalUnit: 'kcal', dimension: 'energy', reduction: 'sum' },
  body_mass: { canonicalUnit: 'kg', dimension: 'mass', reduction: 'latest' },
  dietary_energy: { canonicalUnit: 'kcal', dimension: 'energy', reduction: 'sum' },
  heart_rate: { canonicalUnit: 'count/min', dimension: 'frequency', reduction: 'time_weighted_mean' },
  resting_heart_rate: { canonicalUnit: 'count/min', dimension: 'frequency', reduction: 'mean' },
  sleep_awake: { canonicalUnit: 's', dimension: 'time', reduction: 'interval_duration_sum' },
  sleep_core: { canonicalUnit: 's', dimension: 'time', reduction: 'interval_duration_sum' },
  sleep_deep: { canonicalUnit: 's', dimension: 'time', reduction: 'interval_duration_sum' },
  sleep_in_bed: { canonicalUnit: 's', dimension: 'time', reduction: 'interval_duration_sum' },
  sleep_rem: { canonicalUnit: 's', dimension: 'time', reduction: 'interval_duration_sum' },
  step_count: { canonicalUnit: 'count', dimension: 'count', reduction: 'sum' },
  vo2_max: { canonicalUnit: 'mL/(kg·min)', dimension: 'vo2', reduction: 'latest' },
  walking_heart_rate: { canonicalUnit: 'count/min', dimension: 'frequency', reduction: 'mean' },
  workout_distance: { canonicalUnit: 'm', dimension: 'length', reduction: 'workout_stream' },
  workout_duration: { canonicalUnit: 's', dimension: 'time', reduction: 'workout_stream' },
  workout_elevation: { canonicalUnit: 'm', dimension: 'length', reduction: 'workout_stream' },
};

/**
 * Metrics whose value is a quantity spread over the record's interval.
 * Only these are apportioned when a record is split at local midnight.
 */
export function isAdditive(metricType: MetricType): boolean {
  const { reduction } = METRIC_DEFINITIONS[metricType];
  return reduction === 'sum' || reduction === 'workout_stream';
}

/**
 * Convert a value held in the run's canonical unit back to the metric's fixed
 * unit. Output columns name that unit (`_meters`, `_seconds`, `_kg`), so a
 * `canonicalUnits` override never changes what a column holds.
 */
export function toColumnUnit(
  metricType: MetricType,
  value: number,
  canonicalUnits: PipelineConfig['canonicalUnits'] = {},
): number {
  const { canonicalUnit, dimension } = METRIC_DEFINITIONS[metricType];
  const from = canonicalUnits[metricType] ?? canonicalUnit;
  const converted = convertUnit(value, from, canonicalUnit, dimension);
  if (converted === undefined) {
    throw new UnsupportedUnitError(metricType, from);
  }
  return converted;
}

/**
 * HealthKit identifiers accepted in place of the canonical metric names.
 * Sleep stages arrive as sleep analysis category values.
 */
export const HEALTHKIT_METRIC_ALIASES: Readonly<Record<string, MetricType>> = {
  HKCategoryValueSleepAnalysisAsleepCore: 'sleep_core',
  HKCategoryValueSleepAnalysisAsleepDeep: 'sleep_deep',
  HKCategoryValueSleepAnalysisAsleepREM: 'sleep_rem',
  HKCategoryValueSleepAnalysisAwake: 'sleep_awake',
  HKCategoryValueSleepAnalysisInBed: 'sleep_in_bed',
  HKQuantityTypeIdentifierActiveEnergyBurned: 'active_energy',
  HKQuantityTypeIdentifierBasalEnergyBurned: 'basal_energy',
  HKQuantityTypeIdentifierBodyMass: 'body_mass',
  HKQuantityTypeIdentifierDietaryEnergyConsumed: 'dietary_energy',
  HKQuantityTypeIdentifierHeartRate: 'heart_rate',
  HKQuantityTypeIdentifierRestingHeartRate: 'resting_heart_rate',
  HKQuantityTypeIdentifierStepCount: 'step_count',
  HKQuantityTypeIdentifierVO2Max: 'vo2_max',
  HKQuantityTypeIdentifierWalkingHeartRateAverage: 'walking_heart_rate',
};

export const HEALTHKIT_WORKOUT_ALIASES: Readonly<Record<string, WorkoutType>> = {
  HKWorkoutActivityTypeCoreTraining: 'core_training',
  HKWorkoutActivityTypeCycling: 'cycling',
  HKWorkoutActivityTypeHighIntensityIntervalTraining: 'hiit',
  HKWorkoutActivityTypeHiking: 'hiking',
  HKWorkoutActivityTypeRunning: 'running',
  HKWorkoutActivityTypeSwimming: 'swimming',
  HKWorkoutActivityTypeTraditionalStrengthTraining: 'strength_training',
  HKWorkoutActivityTypeWalking: 'walking',
  HKWorkoutActivityTypeYoga: 'yoga',
};
