import { constants, promises as fs } from 'node:fs';
import * as path from 'node:path';

import { WarehouseConfig } from '../config';

import type { z } from 'zod';

interface LockOptions {
  maxRetries: number;
  retryDelayMs: number;
  staleMs: number;
}

const DEFAULT_LOCK_OPTIONS: LockOptions = {
  maxRetries: WarehouseConfig.lockMaxRetries,
  retryDelayMs: WarehouseConfig.lockRetryDelayMs,
  staleMs: WarehouseConfig.lockStaleMs,
};

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Acquire an exclusive lock on a file.
 * Uses a .lock file with O_EXCL for atomic creation.
 */
export async function acquireLock(
  filePath: string,
  options: LockOptions = DEFAULT_LOCK_OPTIONS,
): Promise<void> {
  const lockPath = `${filePath}.lock`;
  await ensureDir(path.dirname(filePath));

  for (let attempt = 0; attempt < options.maxRetries; attempt++) {
    try {
      // Fails if the lock file exists
      const fd = await fs.open(lockPath, constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY);
      await fd.write(JSON.stringify({ pid: process.pid, timestamp: Date.now() }));
      await fd.close();
      return;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') throw error;

      if (await removeIfStale(lockPath, options.staleMs)) continue;
      await sleep(options.retryDelayMs);
    }
  }

  throw new Error(`Failed to acquire lock for ${filePath} after ${String(options.maxRetries)} attempts`);
}

/**
 * Remove a lock older than `staleMs`. Returns true when the lock is gone.
 */
async function removeIfStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.stat(lockPath);
    if (Date.now() - stat.mtimeMs <= staleMs) return false;
    await fs.unlink(lockPath);
    return true;
  } catch (error) {
    // Released by its holder in the meantime
    if (isErrnoException(error) && error.code === 'ENOENT') return true;
    throw error;
  }
}

/**
 * Release a lock on a file.
 */
export async function releaseLock(filePath: string): Promise<void> {
  try {
    await fs.unlink(`${filePath}.lock`);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
  }
}

/**
 * Execute a function while holding a lock on a file.
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  await acquireLock(filePath);
  try {
    return await fn();
  } finally {
    await releaseLock(filePath);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Write data atomically using temp file + rename pattern.
 * Readers never see partial writes.
 */
export async function atomicWrite(filePath: string, data: object): Promise<void> {
  const tempPath = `${filePath}.tmp.${String(Date.now())}.${Math.random().toString(36).slice(2)}`;

  await ensureDir(path.dirname(filePath));
  await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
  await fs.rename(tempPath, filePath);
}

/**
 * Read and validate a JSON file, falling back to `defaultValue` if it doesn't exist.
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T>,
  defaultValue: T,
): Promise<T> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return defaultValue;
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  return schema.parse(parsed);
}
