import * as path from 'node:path';

import { z } from 'zod';

import { WarehouseConfig } from '../config';
import { compareStrings } from '../utils/deduplication';
import { logger as defaultLogger } from '../utils/logger';
import { atomicWrite, ensureDir, readJsonFile, withLock } from './fileHelpers';

import type { TableName } from '../config';
import type { Logger } from '../utils/logger';
import type { UpsertResult, WarehouseClient } from './warehouse';

const TABLE_FILE_VERSION = 1;

const TableFileSchema = z.object({
  version: z.literal(TABLE_FILE_VERSION),
  table: z.string(),
  rows: z.record(z.string(), z.record(z.string(), z.unknown())),
});

type TableFile = z.infer<typeof TableFileSchema>;

/**
 * Warehouse kept as one JSON file per table, rows keyed by their primary key.
 * Writes happen under a lock file and replace the table file atomically.
 */
export class FileWarehouse implements WarehouseClient {
  private readonly dataDir: string;
  private readonly log: Logger;

  constructor(dataDir: string = WarehouseConfig.dataDir, log: Logger = defaultLogger) {
    this.dataDir = dataDir;
    this.log = log;
  }

  /**
   * Initialize the warehouse directory.
   */
  async init(): Promise<void> {
    const resolvedPath = path.resolve(this.dataDir);
    await ensureDir(this.dataDir);
    this.log.info('File warehouse initialized', { dataDir: resolvedPath });
  }

  getTablePath(table: TableName): string {
    return path.join(this.dataDir, `${table}.json`);
  }

  /**
   * Read every row of a table in key order. A missing table is empty.
   */
  async read(table: TableName): Promise<Record<string, unknown>[]> {
    const file = await readJsonFile(this.getTablePath(table), TableFileSchema, emptyTable(table));
    return Object.keys(file.rows)
      .sort(compareStrings)
      .flatMap((key) => {
        const row = file.rows[key];
        return row ? [row] : [];
      });
  }

  async upsert<Row extends object>(
    table: TableName,
    rows: readonly Row[],
    keyOf: (row: Row) => string,
  ): Promise<UpsertResult> {
    const filePath = this.getTablePath(table);

    return withLock(filePath, async () => {
      const existing: TableFile = await readJsonFile(filePath, TableFileSchema, emptyTable(table));
      const merged: Record<string, object> = { ...existing.rows };
      const result: UpsertResult = { inserted: 0, table, unchanged: 0, updated: 0 };

      for (const row of rows) {
        const key = keyOf(row);
        const previous = merged[key];
        if (previous === undefined) {
          result.inserted++;
        } else if (JSON.stringify(previous) === JSON.stringify(row)) {
          result.unchanged++;
          continue;
        } else {
          result.updated++;
        }
        merged[key] = row;
      }

      // Key order keeps the file byte-identical across equal upserts
      const sortedRows: Record<string, object> = {};
      for (const key of Object.keys(merged).sort(compareStrings)) {
        const row = merged[key];
        if (row !== undefined) sortedRows[key] = row;
      }

      await atomicWrite(filePath, { version: TABLE_FILE_VERSION, table, rows: sortedRows });

      this.log.debug('Table upserted', { ...result, rowCount: Object.keys(sortedRows).length });
      return result;
    });
  }
}

function emptyTable(table: string): TableFile {
  return { rows: {}, table, version: TABLE_FILE_VERSION };
}
