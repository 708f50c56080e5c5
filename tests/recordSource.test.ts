import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { JsonFileRecordSource } from '../src/extract/recordSource';

describe('JsonFileRecordSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'records-'));
  });

  afterEach(async () => {
    await rm(dir, { force: true, recursive: true });
  });

  async function sourceFor(content: string): Promise<JsonFileRecordSource> {
    const file = path.join(dir, 'export.json');
    await writeFile(file, content, 'utf8');
    return new JsonFileRecordSource(file);
  }

  it('reads a bare array', async () => {
    const source = await sourceFor('[{"metricType":"step_count"}, 42]');

    expect(await source.read()).toEqual([{ metricType: 'step_count' }, 42]);
  });

  it('reads an object with a records array', async () => {
    const source = await sourceFor('{"records":[{"metricType":"step_count"}]}');

    expect(await source.read()).toEqual([{ metricType: 'step_count' }]);
  });

  it('rejects any other shape', async () => {
    const source = await sourceFor('{"data":[]}');

    await expect(source.read()).rejects.toThrow(
      'expected an array of records or an object with a "records" array',
    );
  });
});
