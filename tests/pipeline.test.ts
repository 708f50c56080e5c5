import { describe, expect, it } from 'vitest';

import { createPipelineConfig } from '../src/config';
import { runTransform, serializeResult } from '../src/transform/pipeline';
import { quietLogger } from './helpers';

const config = createPipelineConfig();

const energy = (value: number, start: string, end: string, unit = 'kcal') => ({
  end,
  metricType: 'active_energy',
  source: 'watch',
  start,
  unit,
  value,
});

const run = (value: number, start: string, end: string) => ({
  end,
  metricType: 'workout_duration',
  source: 'watch',
  start,
  unit: 's',
  value,
  workoutType: 'running',
});

describe('runTransform', () => {
  it('skips bad records and counts them per kind', () => {
    const result = runTransform(
      [
        energy(100, '2024-01-01T08:00:00Z', '2024-01-01T08:30:00Z'),
        energy(50, '2024-01-01T12:00:00Z', '2024-01-01T12:10:00Z'),
        { foo: 1 },
        { ...energy(10, '2024-01-01T08:00:00Z', '2024-01-01T08:01:00Z'), metricType: 'blood_glucose' },
        energy(10, '2024-01-01T09:00:00Z', '2024-01-01T08:00:00Z'),
        energy(10, '2024-01-01T10:00:00Z', '2024-01-01T10:01:00Z', 'kg'),
        {
          end: '2024-01-01T11:00:00Z',
          metricType: 'workout_distance',
          source: 'watch',
          start: '2024-01-01T10:30:00Z',
          unit: 'm',
          value: 5000,
        },
      ],
      config,
      quietLogger,
    );

    expect(result.errors).toEqual({
      invalid_record: 1,
      invalid_time_range: 1,
      missing_workout_type: 1,
      unsupported_metric: 1,
      unsupported_unit: 1,
    });
    expect(result.stats).toEqual({
      duplicateRecords: 0,
      inputRecords: 7,
      normalizedRecords: 2,
      skippedRecords: 5,
    });
    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]?.active_calories_kcal).toBe(150);
  });

  it('counts and ignores duplicated records', () => {
    const record = energy(100, '2024-01-01T08:00:00Z', '2024-01-01T08:30:00Z');

    const result = runTransform([record, record, record], config);

    expect(result.stats.duplicateRecords).toBe(2);
    expect(result.rows[0]?.active_calories_kcal).toBe(100);
  });

  it('produces byte-identical output regardless of input order', () => {
    const items = [
      energy(100, '2024-01-01T08:00:00Z', '2024-01-01T08:30:00Z'),
      energy(33.3, '2024-01-02T08:00:00Z', '2024-01-02T08:30:00Z'),
      run(1200, '2024-01-01T08:00:00Z', '2024-01-01T08:20:00Z'),
      run(1020, '2024-01-01T08:23:00Z', '2024-01-01T08:40:00Z'),
      run(600, '2024-01-01T08:50:00Z', '2024-01-01T09:00:00Z'),
      {
        end: '2024-01-02T01:00:00Z',
        metricType: 'sleep_core',
        source: 'watch',
        start: '2024-01-01T23:00:00Z',
        unit: 's',
        value: 7200,
      },
    ];

    const forward = serializeResult(runTransform(items, config));
    const backward = serializeResult(runTransform([...items].reverse(), config));

    expect(backward).toBe(forward);
  });

  it('segments workouts and attributes sleep to its start day', () => {
    const result = runTransform(
      [
        run(1200, '2024-01-01T08:00:00Z', '2024-01-01T08:20:00Z'),
        run(1020, '2024-01-01T08:23:00Z', '2024-01-01T08:40:00Z'),
        run(600, '2024-01-01T08:50:00Z', '2024-01-01T09:00:00Z'),
        {
          end: '2024-01-02T01:00:00Z',
          metricType: 'HKCategoryValueSleepAnalysisAsleepCore',
          source: 'watch',
          start: '2024-01-01T23:00:00Z',
          value: 1,
        },
        {
          end: '2024-01-02T01:00:00Z',
          metricType: 'sleep_core',
          source: 'watch',
          start: '2024-01-01T23:00:00Z',
          value: 1,
        },
      ],
      config,
    );

    expect(result.sessions.map((s) => s.durationSeconds)).toEqual([2220, 600]);
    // The HealthKit sleep category and the canonical name are the same record
    expect(result.errors.unsupported_metric).toBe(0);
    expect(result.stats.duplicateRecords).toBe(1);
    expect(result.rows.map((row) => row.local_date)).toEqual(['2024-01-01']);
    expect(result.rows[0]).toMatchObject({
      core_sleep_seconds: 7200,
      ran: true,
      running_seconds: 2820,
      workout_count: 2,
    });
    expect(result.workoutSummaries).toHaveLength(1);
  });

  it('drops everything before the since date', () => {
    const result = runTransform(
      [
        energy(100, '2023-12-31T08:00:00Z', '2023-12-31T08:30:00Z'),
        energy(200, '2024-01-01T08:00:00Z', '2024-01-01T08:30:00Z'),
        run(600, '2023-12-31T08:50:00Z', '2023-12-31T09:00:00Z'),
      ],
      createPipelineConfig({ since: '2024-01-01' }),
    );

    expect(result.rows.map((row) => row.local_date)).toEqual(['2024-01-01']);
    expect(result.dailyMetrics).toEqual([
      { aggregateValue: 200, localDate: '2024-01-01', metricType: 'active_energy' },
    ]);
    expect(result.sessions).toEqual([]);
    expect(result.workoutSummaries).toEqual([]);
  });

  it('completes with empty outputs when nothing is usable', () => {
    const result = runTransform([{ bad: true }], config, quietLogger);

    expect(result.rows).toEqual([]);
    expect(result.sessions).toEqual([]);
    expect(result.errors.invalid_record).toBe(1);
  });

  it('splits across midnight when configured', () => {
    const result = runTransform(
      [energy(90, '2024-01-01T23:00:00Z', '2024-01-02T00:30:00Z')],
      createPipelineConfig({ midnightPolicy: 'split' }),
    );

    expect(result.dailyMetrics.map((m) => [m.localDate, m.aggregateValue])).toEqual([
      ['2024-01-01', 60],
      ['2024-01-02', 30],
    ]);
  });

  it('gives a row to every date a session crosses into', () => {
    const result = runTransform(
      [
        run(120, '2024-01-01T23:56:00Z', '2024-01-01T23:58:00Z'),
        run(120, '2024-01-02T00:01:00Z', '2024-01-02T00:03:00Z'),
      ],
      config,
    );

    expect(result.sessions).toHaveLength(1);
    expect(result.rows.map((row) => [row.local_date, row.running_seconds])).toEqual([
      ['2024-01-01', 240],
      ['2024-01-02', null],
    ]);
  });

  it('keeps meters in distance columns when distances are held in km', () => {
    const result = runTransform(
      [
        {
          end: '2024-01-01T08:30:00Z',
          metricType: 'workout_distance',
          source: 'watch',
          start: '2024-01-01T08:00:00Z',
          unit: 'm',
          value: 5000,
          workoutType: 'running',
        },
      ],
      createPipelineConfig({ canonicalUnits: { workout_distance: 'km' } }),
    );

    expect(result.sessions[0]?.distanceMeters).toBe(5000);
    expect(result.rows[0]).toMatchObject({
      running_distance_meters: 5000,
      running_seconds: 1800,
    });
  });
});
