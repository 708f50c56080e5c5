/**
 * Debug logging utilities for troubleshooting data flow.
 * Enabled via DEBUG_LOGGING=true environment variable.
 *
 * Categories:
 * - REQUEST: Incoming transform request bodies
 * - NORMALIZE: Records skipped or converted during normalization
 * - DEDUP: Deduplication operations
 * - AGGREGATE: Daily metric reduction
 * - SEGMENT: Workout session detection
 * - BUILD: Daily table assembly
 * - LOAD: Warehouse uploads and retries
 */

import type { Logger, LogContext } from './logger';

export type DebugCategory =
  | 'AGGREGATE'
  | 'BUILD'
  | 'DEDUP'
  | 'LOAD'
  | 'NORMALIZE'
  | 'REQUEST'
  | 'SEGMENT';

/**
 * Check if debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_LOGGING === 'true';
}

/**
 * Core debug logging function.
 * Only logs if DEBUG_LOGGING is enabled and a logger is available.
 */
export function debugLog(
  logger: Logger | undefined,
  category: DebugCategory,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled() || !logger) return;

  const context: LogContext = {
    debugCategory: category,
  };

  if (data !== undefined) {
    context.data = data;
  }

  logger.debug(`[DEBUG:${category}] ${message}`, context);
}

/**
 * Log a record dropped before aggregation.
 */
export function debugSkippedRecord(
  logger: Logger | undefined,
  reason: string,
  record: unknown,
  detail?: string,
): void {
  debugLog(logger, 'NORMALIZE', 'Record skipped', {
    action: 'skipped',
    detail,
    reason,
    record,
  });
}

/**
 * Log deduplication operation.
 */
export function debugDedup(
  logger: Logger | undefined,
  operation: string,
  details: {
    duplicateCount: number;
    inputCount: number;
    uniqueCount: number;
  },
): void {
  debugLog(logger, 'DEDUP', operation, details);
}

/**
 * Log a stage's input and output sizes with a sample of its output.
 */
export function debugStage(
  logger: Logger | undefined,
  category: Exclude<DebugCategory, 'DEDUP' | 'LOAD' | 'NORMALIZE' | 'REQUEST'>,
  inputCount: number,
  output: readonly unknown[],
): void {
  debugLog(logger, category, `${category.toLowerCase()} stage`, {
    inputCount,
    outputCount: output.length,
    outputSample: output[0],
  });
}

/**
 * Log a warehouse operation.
 */
export function debugLoad(logger: Logger | undefined, operation: string, details: LogContext): void {
  debugLog(logger, 'LOAD', operation, details);
}
