import { vi } from 'vitest';

import { Logger } from '../src/utils/logger';

import type { MetricType, NormalizedRecord, WorkoutType } from '../src/types';
import type { Request, Response } from 'express';

export const quietLogger = new Logger({ json: true, minLevel: 'error' });

interface RecordOverrides {
  localDate?: string;
  source?: string;
  workoutType?: WorkoutType;
}

/**
 * Normalized record on UTC dates. `end` defaults to `start`.
 */
export function normalizedRecord(
  metricType: MetricType,
  value: number,
  start: string,
  end: string = start,
  overrides: RecordOverrides = {},
): NormalizedRecord {
  return {
    endUtc: new Date(end),
    localDate: overrides.localDate ?? start.slice(0, 10),
    metricType,
    source: overrides.source ?? 'watch',
    startUtc: new Date(start),
    value,
    ...(overrides.workoutType ? { workoutType: overrides.workoutType } : {}),
  };
}

export function workoutRecord(
  workoutType: WorkoutType,
  metricType: 'workout_distance' | 'workout_duration' | 'workout_elevation',
  value: number,
  start: string,
  end: string,
): NormalizedRecord {
  return normalizedRecord(metricType, value, start, end, { workoutType });
}

export interface ResponseState {
  body: unknown;
  statusCode: number;
}

/**
 * Response double recording the status code and JSON body.
 */
export function createMockResponse() {
  const state: ResponseState = { body: undefined, statusCode: 200 };
  const res = {
    json: vi.fn((body: unknown): unknown => {
      state.body = body;
      return res;
    }),
    status: vi.fn((code: number): unknown => {
      state.statusCode = code;
      return res;
    }),
  };
  return { json: res.json, res: res as unknown as Response, state, status: res.status };
}

interface MockRequestInit {
  body?: unknown;
  headers?: Record<string, string>;
  path?: string;
  query?: Record<string, string>;
}

export function createMockRequest(init: MockRequestInit = {}): Request {
  const headers = init.headers ?? {};
  const req = {
    body: init.body,
    get: (name: string) => headers[name.toLowerCase()],
    headers,
    log: quietLogger,
    path: init.path ?? '/api/transform',
    query: init.query ?? {},
  };
  return req as unknown as Request;
}
