/**
 * Load-stage contract. The transform never depends on what implements it.
 */

import type { TableName } from '../config';

export interface UpsertResult {
  inserted: number;
  table: TableName;
  unchanged: number;
  updated: number;
}

export interface WarehouseClient {
  /**
   * Insert or replace rows by key. Upserting the same rows twice leaves the
   * table as after the first upsert.
   */
  upsert<Row extends object>(
    table: TableName,
    rows: readonly Row[],
    keyOf: (row: Row) => string,
  ): Promise<UpsertResult>;
}
