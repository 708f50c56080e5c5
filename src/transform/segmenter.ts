/**
 * Workout segmentation.
 * Groups workout stream records into sessions and sums sessions per day.
 */

import { isWorkoutStreamType } from '../types';
import { compareStrings, dedupeRecords } from '../utils/deduplication';
import { toColumnUnit } from './metricTable';
import { roundTo } from './units';

import type {
  DailyWorkoutSummary,
  NormalizedRecord,
  PipelineConfig,
  WorkoutSession,
  WorkoutTotals,
  WorkoutType,
} from '../types';

type WorkoutRecord = NormalizedRecord & { workoutType: WorkoutType };

interface OpenSession {
  endMs: number;
  records: WorkoutRecord[];
  workoutType: WorkoutType;
}

/**
 * Split workout records into sessions.
 *
 * Records are ordered by workout type, start, end and source. A session is
 * closed when the type changes or when the next record starts more than
 * `mergeGapSeconds` after the latest end seen in the session. Because the
 * session end only grows, sessions of one type never share an instant.
 * Session totals are in meters and seconds whatever `canonicalUnits` says.
 */
export function segment(
  records: readonly NormalizedRecord[],
  config: Pick<PipelineConfig, 'mergeGapSeconds'> & Partial<Pick<PipelineConfig, 'canonicalUnits'>>,
): WorkoutSession[] {
  const workoutRecords = dedupeRecords(records.filter(isWorkoutRecord)).records;
  if (workoutRecords.length === 0) return [];

  const sorted = [...workoutRecords].sort(
    (a, b) =>
      compareStrings(a.workoutType, b.workoutType) ||
      a.startUtc.getTime() - b.startUtc.getTime() ||
      a.endUtc.getTime() - b.endUtc.getTime() ||
      compareStrings(a.source, b.source),
  );

  const gapMs = config.mergeGapSeconds * 1000;
  const sessions: WorkoutSession[] = [];
  let current: OpenSession | undefined;

  for (const record of sorted) {
    if (
      current &&
      current.workoutType === record.workoutType &&
      record.startUtc.getTime() - current.endMs <= gapMs
    ) {
      current.records.push(record);
      current.endMs = Math.max(current.endMs, record.endUtc.getTime());
      continue;
    }

    if (current) sessions.push(closeSession(current, config.canonicalUnits));
    current = { endMs: record.endUtc.getTime(), records: [record], workoutType: record.workoutType };
  }
  if (current) sessions.push(closeSession(current, config.canonicalUnits));

  return sessions.sort(
    (a, b) =>
      a.startUtc.getTime() - b.startUtc.getTime() || compareStrings(a.workoutType, b.workoutType),
  );
}

/**
 * Sum sessions per local date, overall and per workout type.
 * Null distances and elevations are skipped; an all-null group stays null.
 * The map iterates in ascending date order.
 */
export function summarizeWorkouts(
  sessions: readonly WorkoutSession[],
): ReadonlyMap<string, DailyWorkoutSummary> {
  const byDate = new Map<string, DailyWorkoutSummary>();

  for (const session of sessions) {
    let summary = byDate.get(session.localDate);
    if (!summary) {
      summary = { ...emptyTotals(), byType: {}, localDate: session.localDate };
      byDate.set(session.localDate, summary);
    }

    addSession(summary, session);
    const typeTotals = summary.byType[session.workoutType] ?? emptyTotals();
    addSession(typeTotals, session);
    summary.byType[session.workoutType] = typeTotals;
  }

  const dates = [...byDate.keys()].sort(compareStrings);
  const ordered = new Map<string, DailyWorkoutSummary>();
  for (const date of dates) {
    const summary = byDate.get(date);
    if (summary) ordered.set(date, summary);
  }
  return ordered;
}

/**
 * Add two nullable measurements; null only when both are null.
 */
export function addNullable(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return roundTo(a + b, 6);
}

function isWorkoutRecord(record: NormalizedRecord): record is WorkoutRecord {
  return record.workoutType !== undefined && isWorkoutStreamType(record.metricType);
}

function closeSession(
  session: OpenSession,
  canonicalUnits: PipelineConfig['canonicalUnits'] = {},
): WorkoutSession {
  const first = session.records[0];
  let duration: number | null = null;
  let distance: number | null = null;
  let elevation: number | null = null;

  for (const record of session.records) {
    const value = toColumnUnit(record.metricType, record.value, canonicalUnits);
    switch (record.metricType) {
      case 'workout_distance': {
        distance = addNullable(distance, value);
        break;
      }
      case 'workout_duration': {
        duration = addNullable(duration, value);
        break;
      }
      case 'workout_elevation': {
        elevation = addNullable(elevation, value);
        break;
      }
      default: {
        break;
      }
    }
  }

  const startUtc = first.startUtc;
  const endUtc = new Date(session.endMs);

  return {
    distanceMeters: distance,
    // Sessions without a duration stream fall back to their time span
    durationSeconds: duration ?? (endUtc.getTime() - startUtc.getTime()) / 1000,
    elevationGainMeters: elevation,
    endUtc,
    localDate: first.localDate,
    recordCount: session.records.length,
    startUtc,
    workoutType: session.workoutType,
  };
}

function emptyTotals(): WorkoutTotals {
  return { distanceMeters: null, durationSeconds: 0, elevationGainMeters: null, sessionCount: 0 };
}

function addSession(totals: WorkoutTotals, session: WorkoutSession): void {
  totals.sessionCount++;
  totals.durationSeconds = roundTo(totals.durationSeconds + session.durationSeconds, 6);
  totals.distanceMeters = addNullable(totals.distanceMeters, session.distanceMeters);
  totals.elevationGainMeters = addNullable(totals.elevationGainMeters, session.elevationGainMeters);
}
