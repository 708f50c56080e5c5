/**
 * Transform stage orchestration.
 * raw records -> normalize -> { aggregate, segment } -> build
 */

import { EmptyInputError, isRecordError } from '../errors';
import { debugDedup, debugSkippedRecord, debugStage } from '../utils/debugLogger';
import { dedupeRecords } from '../utils/deduplication';
import { RawRecordSchema } from '../validation/schemas';
import { aggregate } from './aggregator';
import { attributeToDays, normalize } from './normalizer';
import { segment, summarizeWorkouts } from './segmenter';
import { build } from './tableBuilder';

import type {
  DailyRow,
  ErrorSummary,
  NormalizedRecord,
  PipelineConfig,
  TransformResult,
  TransformStats,
} from '../types';
import type { Logger } from '../utils/logger';

/**
 * Run-scoped context for counting skipped records.
 * Keeps per-run state out of module scope.
 */
export interface TransformContext {
  errors: ErrorSummary;
  stats: TransformStats;
  logger?: Logger;
}

export function createTransformContext(logger?: Logger): TransformContext {
  return {
    errors: {
      invalid_record: 0,
      invalid_time_range: 0,
      missing_workout_type: 0,
      unsupported_metric: 0,
      unsupported_unit: 0,
    },
    logger,
    stats: {
      duplicateRecords: 0,
      inputRecords: 0,
      normalizedRecords: 0,
      skippedRecords: 0,
    },
  };
}

/**
 * Validate and normalize raw items, applying the midnight policy.
 * Items that fail are counted per error kind and skipped.
 */
export function normalizeAll(
  items: Iterable<unknown>,
  config: PipelineConfig,
  context: TransformContext,
): NormalizedRecord[] {
  const normalized: NormalizedRecord[] = [];

  for (const item of items) {
    context.stats.inputRecords++;

    const parsed = RawRecordSchema.safeParse(item);
    if (!parsed.success) {
      context.errors.invalid_record++;
      context.stats.skippedRecords++;
      debugSkippedRecord(context.logger, 'invalid_record', item, parsed.error.issues[0]?.message);
      continue;
    }

    try {
      normalized.push(...attributeToDays(normalize(parsed.data, config), config));
    } catch (error) {
      if (!isRecordError(error)) throw error;
      context.errors[error.kind]++;
      context.stats.skippedRecords++;
      debugSkippedRecord(context.logger, error.kind, item, error.message);
    }
  }

  context.stats.normalizedRecords = normalized.length;
  return normalized;
}

/**
 * Run the whole transform on one export's records.
 *
 * Never fails on bad records: they are skipped and counted in `errors`.
 * A run with nothing to build completes with empty outputs. Identical input
 * gives identical output, whatever the input order.
 */
export function runTransform(
  items: Iterable<unknown>,
  config: PipelineConfig,
  logger?: Logger,
): TransformResult {
  const context = createTransformContext(logger);
  const timer = logger?.startTimer('transform');

  const normalized = normalizeAll(items, config, context);

  const { duplicateCount, records } = dedupeRecords(normalized);
  context.stats.duplicateRecords = duplicateCount;
  debugDedup(logger, 'Normalized records', {
    duplicateCount,
    inputCount: normalized.length,
    uniqueCount: records.length,
  });

  const since = config.since;
  const inRange = (localDate: string) => since === undefined || localDate >= since;

  const dailyMetrics = aggregate(records).filter((metric) => inRange(metric.localDate));
  debugStage(logger, 'AGGREGATE', records.length, dailyMetrics);

  const sessions = segment(records, config).filter((session) => inRange(session.localDate));
  debugStage(logger, 'SEGMENT', records.length, sessions);

  const workoutSummaries = summarizeWorkouts(sessions);

  let rows: DailyRow[] = [];
  try {
    rows = build(dailyMetrics, workoutSummaries, {
      canonicalUnits: config.canonicalUnits,
      recordDates: records.map((record) => record.localDate).filter(inRange),
    });
  } catch (error) {
    if (!(error instanceof EmptyInputError)) throw error;
    logger?.warn('No daily rows to build', { errors: context.errors, stats: context.stats });
  }
  debugStage(logger, 'BUILD', dailyMetrics.length + workoutSummaries.size, rows);

  logRecordErrors(context);
  timer?.end('info', 'Transform completed', {
    dailyMetrics: dailyMetrics.length,
    rows: rows.length,
    sessions: sessions.length,
    ...context.stats,
  });

  return {
    dailyMetrics,
    errors: { ...context.errors },
    rows,
    sessions,
    stats: { ...context.stats },
    workoutSummaries: [...workoutSummaries.values()],
  };
}

/**
 * Log a warning summarizing skipped records, one count per error kind.
 */
export function logRecordErrors(context: TransformContext): void {
  const { errors, logger, stats } = context;
  if (!logger || stats.skippedRecords === 0) return;

  const details = Object.entries(errors)
    .filter(([, count]) => count > 0)
    .map(([kind, count]) => `${String(count)} ${kind}`)
    .join(', ');

  logger.warn(
    `Skipped ${String(stats.skippedRecords)}/${String(stats.inputRecords)} records`,
    { details, errors },
  );
}

/**
 * Serialize a transform result. Same result, same bytes.
 */
export function serializeResult(result: TransformResult): string {
  return JSON.stringify(result, null, 2);
}
