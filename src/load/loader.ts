/**
 * Upload a transform result to the warehouse, one table at a time.
 */

import { RetryConfig, WarehouseConfig } from '../config';
import { PipelineError, WarehouseError } from '../errors';
import { withRetry } from '../utils/retry';
import { rowKeys, toSessionRow, toVo2MaxRows, toWorkoutDailyRows } from './rows';

import type { TableName } from '../config';
import type { TransformResult } from '../types';
import type { Logger } from '../utils/logger';
import type { UpsertResult, WarehouseClient } from './warehouse';

export interface LoadOptions {
  baseDelayMs?: number;
  log?: Logger;
  maxRetries?: number;
}

/**
 * Upsert daily rows, sessions, per-type daily workouts and VO2 max.
 * Each table is retried on its own; a table that still fails raises WarehouseError.
 */
export async function loadTransformResult(
  warehouse: WarehouseClient,
  result: TransformResult,
  options: LoadOptions = {},
): Promise<UpsertResult[]> {
  const { tables } = WarehouseConfig;
  const { log } = options;

  const upload = async <Row extends object>(
    table: TableName,
    rows: readonly Row[],
    keyOf: (row: Row) => string,
  ): Promise<UpsertResult> => {
    try {
      return await withRetry(() => warehouse.upsert(table, rows, keyOf), {
        baseDelayMs: options.baseDelayMs ?? RetryConfig.baseDelayMs,
        log,
        maxRetries: options.maxRetries ?? RetryConfig.maxRetries,
        operationName: `upsert ${table}`,
        shouldRetry: (error) => !(error instanceof PipelineError),
      });
    } catch (error) {
      if (error instanceof WarehouseError) throw error;
      throw new WarehouseError(table, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }
  };

  const timer = log?.startTimer('load');
  const results: UpsertResult[] = [];

  // Sequential: a failed table stops the load before later tables change
  results.push(await upload(tables.dailyMetrics, result.rows, rowKeys.dailyMetrics));
  results.push(
    await upload(tables.workoutSessions, result.sessions.map(toSessionRow), rowKeys.workoutSessions),
  );
  results.push(
    await upload(tables.workoutDaily, toWorkoutDailyRows(result.workoutSummaries), rowKeys.workoutDaily),
  );
  results.push(await upload(tables.vo2Max, toVo2MaxRows(result.dailyMetrics), rowKeys.vo2Max));

  timer?.end('info', 'Load completed', { tables: results });
  return results;
}
