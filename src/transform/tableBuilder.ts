/**
 * Metric table building.
 * Merges daily metrics and workout summaries into one wide row per date.
 */

import { EmptyInputError } from '../errors';
import { addDays, getWeekday, getWeekEndingDate } from '../utils/dateUtilities';
import { compareStrings } from '../utils/deduplication';
import { toColumnUnit } from './metricTable';
import { addNullable } from './segmenter';

import type {
  DailyMetric,
  DailyRow,
  DailyWorkoutSummary,
  MetricType,
  PipelineConfig,
  WorkoutType,
} from '../types';

type MetricLookup = (metricType: MetricType) => number | null;

export interface BuildOptions {
  /** Units the daily metrics are held in; row columns use the fixed units. */
  canonicalUnits?: PipelineConfig['canonicalUnits'];
  /**
   * Local dates of the normalized records. Each gets a row even when no
   * aggregate or session landed on it, e.g. the second day of a session
   * crossing midnight.
   */
  recordDates?: Iterable<string>;
}

/**
 * Build the ordered daily table.
 *
 * Every date present in any input gets exactly one row. Columns without a
 * contributing aggregate are null, never zero.
 *
 * @throws EmptyInputError when all inputs are empty
 */
export function build(
  dailyMetrics: readonly DailyMetric[],
  workoutSummaries: ReadonlyMap<string, DailyWorkoutSummary>,
  options: BuildOptions = {},
): DailyRow[] {
  const recordDates = [...(options.recordDates ?? [])];
  if (dailyMetrics.length === 0 && workoutSummaries.size === 0 && recordDates.length === 0) {
    throw new EmptyInputError();
  }

  const metricsByDate = new Map<string, Map<MetricType, number>>();
  for (const metric of dailyMetrics) {
    let values = metricsByDate.get(metric.localDate);
    if (!values) {
      values = new Map();
      metricsByDate.set(metric.localDate, values);
    }
    values.set(
      metric.metricType,
      toColumnUnit(metric.metricType, metric.aggregateValue, options.canonicalUnits),
    );
  }

  const dates = [
    ...new Set([...metricsByDate.keys(), ...workoutSummaries.keys(), ...recordDates]),
  ].sort(compareStrings);

  const rows = dates.map((date) => {
    const values = metricsByDate.get(date);
    return buildRow(date, (metricType) => values?.get(metricType) ?? null, workoutSummaries.get(date));
  });

  return attachNextNight(rows);
}

function buildRow(
  date: string,
  metric: MetricLookup,
  workouts: DailyWorkoutSummary | undefined,
): DailyRow {
  const activeCalories = metric('active_energy');
  const basalCalories = metric('basal_energy');
  const coreSleep = metric('sleep_core');
  const deepSleep = metric('sleep_deep');
  const remSleep = metric('sleep_rem');

  const typeSeconds = (workoutType: WorkoutType) =>
    workouts?.byType[workoutType]?.durationSeconds ?? null;
  const typeDistance = (workoutType: WorkoutType) =>
    workouts?.byType[workoutType]?.distanceMeters ?? null;

  const runningSeconds = typeSeconds('running');
  const strengthSeconds = typeSeconds('strength_training');
  const hiitSeconds = typeSeconds('hiit');
  const coreTrainingSeconds = typeSeconds('core_training');
  const totalWorkoutSeconds = workouts?.durationSeconds ?? null;

  return {
    local_date: date,
    weekday: getWeekday(date),
    week_ending_date: getWeekEndingDate(date),

    active_calories_kcal: activeCalories,
    basal_calories_kcal: basalCalories,
    total_calories_kcal: addNullable(activeCalories, basalCalories),
    dietary_calories_kcal: metric('dietary_energy'),
    step_count: metric('step_count'),

    resting_heart_rate_bpm: metric('resting_heart_rate'),
    walking_heart_rate_bpm: metric('walking_heart_rate'),
    avg_heart_rate_bpm: metric('heart_rate'),
    vo2_max: metric('vo2_max'),
    body_mass_kg: metric('body_mass'),

    core_sleep_seconds: coreSleep,
    deep_sleep_seconds: deepSleep,
    rem_sleep_seconds: remSleep,
    awake_seconds: metric('sleep_awake'),
    in_bed_seconds: metric('sleep_in_bed'),
    total_sleep_seconds: addNullable(addNullable(coreSleep, deepSleep), remSleep),
    core_sleep_seconds_next_night: null,
    deep_sleep_seconds_next_night: null,
    rem_sleep_seconds_next_night: null,
    total_sleep_seconds_next_night: null,

    running_seconds: runningSeconds,
    running_distance_meters: typeDistance('running'),
    running_elevation_gain_meters: workouts?.byType.running?.elevationGainMeters ?? null,
    walking_seconds: typeSeconds('walking'),
    walking_distance_meters: typeDistance('walking'),
    cycling_seconds: typeSeconds('cycling'),
    cycling_distance_meters: typeDistance('cycling'),
    strength_training_seconds: strengthSeconds,
    hiit_seconds: hiitSeconds,
    core_training_seconds: coreTrainingSeconds,
    total_workout_seconds: totalWorkoutSeconds,
    workout_count: workouts?.sessionCount ?? null,

    ran: isPositive(runningSeconds),
    strength_trained: isPositive(strengthSeconds),
    hiit_trained: isPositive(hiitSeconds),
    core_trained: isPositive(coreTrainingSeconds),
    exercised: isPositive(totalWorkoutSeconds),
  };
}

/**
 * Copy the sleep of the following calendar date onto each row.
 * The next night stays null when that date has no row.
 */
function attachNextNight(rows: DailyRow[]): DailyRow[] {
  const byDate = new Map(rows.map((row) => [row.local_date, row]));

  return rows.map((row) => {
    const next = byDate.get(addDays(row.local_date, 1));
    if (!next) return row;
    return {
      ...row,
      core_sleep_seconds_next_night: next.core_sleep_seconds,
      deep_sleep_seconds_next_night: next.deep_sleep_seconds,
      rem_sleep_seconds_next_night: next.rem_sleep_seconds,
      total_sleep_seconds_next_night: next.total_sleep_seconds,
    };
  });
}

function isPositive(value: number | null): boolean {
  return value !== null && value > 0;
}
