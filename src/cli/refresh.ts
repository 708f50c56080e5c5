/**
 * One refresh run: extract records, transform them, load the tables.
 */

import { writeFile } from 'node:fs/promises';

import { z } from 'zod';

import { WarehouseConfig, loadPipelineConfig } from '../config';
import { JsonFileRecordSource } from '../extract/recordSource';
import { FileWarehouse } from '../load/FileWarehouse';
import { loadTransformResult } from '../load/loader';
import { runTransform, serializeResult } from '../transform/pipeline';
import { generateCorrelationId, logger } from '../utils/logger';

import type { RecordSource } from '../extract/recordSource';
import type { UpsertResult, WarehouseClient } from '../load/warehouse';
import type { TransformResult } from '../types';
import type { Logger } from '../utils/logger';

export const RefreshOptionsSchema = z.object({
  config: z.string().optional(),
  dataDir: z.string().default(WarehouseConfig.dataDir),
  dryRun: z.boolean().default(false),
  input: z.string(),
  output: z.string().optional(),
});

export type RefreshOptions = z.infer<typeof RefreshOptionsSchema>;

export interface RefreshDependencies {
  log?: Logger;
  source?: RecordSource;
  warehouse?: WarehouseClient;
}

export interface RefreshSummary {
  load: UpsertResult[];
  result: TransformResult;
  runId: string;
}

export async function runRefresh(
  options: RefreshOptions,
  dependencies: RefreshDependencies = {},
): Promise<RefreshSummary> {
  const runId = generateCorrelationId('run');
  const log = (dependencies.log ?? logger).child(runId);
  const timer = log.startTimer('refresh');

  const pipelineConfig = await loadPipelineConfig({ path: options.config });
  const source = dependencies.source ?? new JsonFileRecordSource(options.input);

  log.info('Refresh started', {
    dryRun: options.dryRun,
    input: options.input,
    localTimezone: pipelineConfig.localTimezone,
    midnightPolicy: pipelineConfig.midnightPolicy,
  });

  const records = await source.read();
  const result = runTransform(records, pipelineConfig, log);

  if (options.output) {
    await writeFile(options.output, `${serializeResult(result)}\n`, 'utf8');
    log.info('Transform result written', { output: options.output });
  }

  let load: UpsertResult[] = [];
  if (options.dryRun) {
    log.info('Dry run: skipping load');
  } else {
    const warehouse = dependencies.warehouse ?? new FileWarehouse(options.dataDir, log);
    load = await loadTransformResult(warehouse, result, { log });
  }

  timer.end('info', 'Refresh completed', {
    errors: result.errors,
    rows: result.rows.length,
    sessions: result.sessions.length,
  });

  return { load, result, runId };
}
