import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createPipelineConfig, loadPipelineConfig, withOptions } from '../src/config';
import { ConfigError } from '../src/errors';

describe('createPipelineConfig', () => {
  it('fills defaults and freezes the result', () => {
    const config = createPipelineConfig();

    expect(config).toEqual({
      canonicalUnits: {},
      localTimezone: 'UTC',
      mergeGapSeconds: 300,
      midnightPolicy: 'start-day',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects an unknown timezone', () => {
    expect(() => createPipelineConfig({ localTimezone: 'Mars/Olympus_Mons' })).toThrow(ConfigError);
  });

  it('rejects a unit override from another dimension', () => {
    expect(() => createPipelineConfig({ canonicalUnits: { active_energy: 'km' } })).toThrow(
      'canonicalUnits.active_energy: "km" is not a energy unit',
    );
  });

  it('rejects a negative merge gap and a malformed since date', () => {
    expect(() => createPipelineConfig({ mergeGapSeconds: -1 })).toThrow(ConfigError);
    expect(() => createPipelineConfig({ since: '01/01/2024' })).toThrow(ConfigError);
  });
});

describe('withOptions', () => {
  it('overrides only the options that are set', () => {
    const base = createPipelineConfig({ localTimezone: 'Europe/Berlin' });

    expect(withOptions(base, undefined)).toBe(base);
    expect(withOptions(base, { midnightPolicy: 'split', mergeGapSeconds: 0 })).toEqual({
      canonicalUnits: {},
      localTimezone: 'Europe/Berlin',
      mergeGapSeconds: 0,
      midnightPolicy: 'split',
    });
  });
});

describe('loadPipelineConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pipeline-config-'));
  });

  afterEach(async () => {
    await rm(dir, { force: true, recursive: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const file = path.join(dir, 'pipeline.yaml');
    await writeFile(file, content, 'utf8');
    return file;
  }

  it('uses defaults without a file', async () => {
    const config = await loadPipelineConfig({ env: {} });

    expect(config.localTimezone).toBe('UTC');
    expect(config.since).toBeUndefined();
  });

  it('reads values from YAML', async () => {
    const file = await writeConfig(
      [
        'localTimezone: America/Chicago',
        'mergeGapSeconds: 120',
        'since: "2024-01-01"',
        'canonicalUnits:',
        '  workout_distance: km',
      ].join('\n'),
    );

    const config = await loadPipelineConfig({ env: {}, path: file });

    expect(config).toEqual({
      canonicalUnits: { workout_distance: 'km' },
      localTimezone: 'America/Chicago',
      mergeGapSeconds: 120,
      midnightPolicy: 'start-day',
      since: '2024-01-01',
    });
  });

  it('lets the environment override the file', async () => {
    const file = await writeConfig('localTimezone: America/Chicago\nmergeGapSeconds: 120\n');

    const config = await loadPipelineConfig({
      env: {
        LOCAL_TIMEZONE: 'Europe/Berlin',
        MERGE_GAP_SECONDS: '600',
        MIDNIGHT_POLICY: 'split',
        SINCE_DATE: '2024-03-01',
      },
      path: file,
    });

    expect(config).toMatchObject({
      localTimezone: 'Europe/Berlin',
      mergeGapSeconds: 600,
      midnightPolicy: 'split',
      since: '2024-03-01',
    });
  });

  it('rejects invalid environment values', async () => {
    await expect(loadPipelineConfig({ env: { MERGE_GAP_SECONDS: 'ten' } })).rejects.toThrow(
      'Invalid MERGE_GAP_SECONDS: "ten" is not a valid integer',
    );
    await expect(loadPipelineConfig({ env: { MIDNIGHT_POLICY: 'noon' } })).rejects.toThrow(
      ConfigError,
    );
  });

  it('rejects unknown keys and unknown metric overrides', async () => {
    const unknownKey = await writeConfig('timezone: UTC\n');
    await expect(loadPipelineConfig({ env: {}, path: unknownKey })).rejects.toThrow(ConfigError);

    const unknownMetric = await writeConfig('canonicalUnits:\n  blood_glucose: mg/dL\n');
    await expect(loadPipelineConfig({ env: {}, path: unknownMetric })).rejects.toThrow(
      'canonicalUnits: unknown metric type "blood_glucose"',
    );
  });

  it('accepts the example configuration', async () => {
    const example = fileURLToPath(new URL('../config/pipeline.example.yaml', import.meta.url));

    const config = await loadPipelineConfig({ env: {}, path: example });

    expect(config).toEqual({
      canonicalUnits: { body_mass: 'kg', workout_distance: 'km' },
      localTimezone: 'America/Chicago',
      mergeGapSeconds: 300,
      midnightPolicy: 'start-day',
      since: '2024-01-01',
    });
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(
      loadPipelineConfig({ env: {}, path: path.join(dir, 'missing.yaml') }),
    ).rejects.toThrow(ConfigError);
  });
});
