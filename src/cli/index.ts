#!/usr/bin/env node
/**
 * Health warehouse CLI
 */

import { program } from 'commander';

import { logger } from '../utils/logger';
import { RefreshOptionsSchema, runRefresh } from './refresh';

program
  .name('health-warehouse')
  .description('Turn a health-data export into daily metric tables')
  .version('0.1.0');

program
  .command('refresh')
  .description('Read an export, build the daily tables and load them into the warehouse')
  .requiredOption('-i, --input <path>', 'JSON file of raw records')
  .option('-c, --config <path>', 'YAML pipeline configuration')
  .option('-d, --data-dir <path>', 'Warehouse directory')
  .option('-o, --output <path>', 'Write the transform result as JSON')
  .option('--dry-run', 'Transform without loading', false)
  .action(async (rawOptions: unknown) => {
    const parsed = RefreshOptionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      logger.error('Invalid options', parsed.error);
      process.exit(2);
    }

    try {
      const { result } = await runRefresh(parsed.data);
      if (result.rows.length === 0) {
        logger.warn('No rows were produced', { errors: result.errors });
      }
    } catch (error) {
      logger.error('Refresh failed', error);
      process.exit(1);
    }
  });

await program.parseAsync();
