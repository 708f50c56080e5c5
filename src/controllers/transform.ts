import { HttpStatus, withOptions } from '../config';
import { ConfigError } from '../errors';
import { loadTransformResult } from '../load/loader';
import { runTransform } from '../transform/pipeline';
import { debugLog } from '../utils/debugLogger';
import { TransformRequestSchema } from '../validation/schemas';

import type { UpsertResult, WarehouseClient } from '../load/warehouse';
import type { PipelineConfig, TransformResult } from '../types';
import type { Request, Response } from 'express';

export interface TransformControllerOptions {
  baseConfig: PipelineConfig;
  warehouse?: WarehouseClient;
}

export interface TransformResponse extends TransformResult {
  load?: UpsertResult[];
}

/**
 * POST /api/transform
 *
 * Runs the transform on `{ records, options? }`. With `?load=true` the result
 * is also upserted into the warehouse. 207 means some records were skipped.
 */
export function createTransformController(options: TransformControllerOptions) {
  const { baseConfig, warehouse } = options;

  return async (req: Request, res: Response): Promise<void> => {
    const { log } = req;
    const timer = log.startTimer('transform request');

    try {
      const parseResult = TransformRequestSchema.safeParse(req.body);
      if (!parseResult.success) {
        log.warn('Invalid request body', { errors: parseResult.error.issues });
        res.status(HttpStatus.BAD_REQUEST).json({
          details: parseResult.error.issues,
          error: 'Invalid request format',
        });
        return;
      }

      const { options: runOptions, records } = parseResult.data;
      debugLog(log, 'REQUEST', 'Transform request', {
        options: runOptions,
        recordCount: records.length,
        sample: records[0],
      });

      const pipelineConfig = withOptions(baseConfig, runOptions);
      const result = runTransform(records, pipelineConfig, log);
      const response: TransformResponse = { ...result };

      if (req.query.load === 'true') {
        if (!warehouse) {
          res.status(HttpStatus.BAD_REQUEST).json({ error: 'No warehouse configured for load' });
          return;
        }
        response.load = await loadTransformResult(warehouse, result, { log });
      }

      const hasSkipped = result.stats.skippedRecords > 0;
      timer.end(hasSkipped ? 'warn' : 'info', 'Transform request completed', {
        loaded: response.load !== undefined,
        rows: result.rows.length,
        skippedRecords: result.stats.skippedRecords,
      });

      res.status(hasSkipped ? HttpStatus.MULTI_STATUS : HttpStatus.OK).json(response);
    } catch (error) {
      if (error instanceof ConfigError) {
        timer.end('warn', 'Invalid transform options', { error: error.message });
        res.status(HttpStatus.BAD_REQUEST).json({ error: 'Invalid options', message: error.message });
        return;
      }

      log.error('Failed to process transform request', error);
      timer.end('error', 'Transform request failed');
      res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
        error: 'Failed to process request',
        message: error instanceof Error ? error.message : 'An error occurred',
      });
    }
  };
}
