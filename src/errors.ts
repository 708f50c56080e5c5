/**
 * Error taxonomy for the transform pipeline.
 *
 * Per-record errors (unsupported metric or unit, invalid time range, workout
 * record without a workout type) are counted and skipped by the pipeline.
 * EmptyInputError marks a run that had nothing to build. ConfigError and WarehouseError are fatal to the caller.
 */

import type { RecordErrorKind } from './types';

export type PipelineErrorKind = 'config' | 'empty_input' | 'warehouse' | RecordErrorKind;

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class UnsupportedMetricError extends PipelineError {
  readonly metricType: string;

  constructor(metricType: string) {
    super('unsupported_metric', `No canonical unit for metric type "${metricType}"`);
    this.metricType = metricType;
  }
}

export class UnsupportedUnitError extends PipelineError {
  readonly metricType: string;
  readonly unit: string;

  constructor(metricType: string, unit: string) {
    super('unsupported_unit', `Unit "${unit}" cannot be converted for metric type "${metricType}"`);
    this.metricType = metricType;
    this.unit = unit;
  }
}

export class MissingWorkoutTypeError extends PipelineError {
  readonly metricType: string;

  constructor(metricType: string) {
    super('missing_workout_type', `Workout record "${metricType}" has no workout type`);
    this.metricType = metricType;
  }
}

export class InvalidTimeRangeError extends PipelineError {
  readonly end: string;
  readonly start: string;

  constructor(start: string, end: string, reason = 'end is before start') {
    super('invalid_time_range', `Invalid time range ${start} - ${end}: ${reason}`);
    this.start = start;
    this.end = end;
  }
}

export class EmptyInputError extends PipelineError {
  constructor() {
    super('empty_input', 'Nothing to build: no daily metrics and no workout summaries');
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super('config', message, options);
  }
}

export class WarehouseError extends PipelineError {
  readonly table: string;

  constructor(table: string, message: string, options?: ErrorOptions) {
    super('warehouse', `Upload to ${table} failed: ${message}`, options);
    this.table = table;
  }
}

/**
 * Narrow a caught value to one of the per-record error kinds.
 */
export function isRecordError(
  error: unknown,
): error is PipelineError & { kind: RecordErrorKind } {
  return (
    error instanceof PipelineError &&
    (error.kind === 'invalid_record' ||
      error.kind === 'invalid_time_range' ||
      error.kind === 'missing_workout_type' ||
      error.kind === 'unsupported_metric' ||
      error.kind === 'unsupported_unit')
  );
}
