import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { requireWriteAuth, validateWriteToken } from '../src/middleware/auth';
import { maskSensitiveValue } from '../src/middleware/requestLogger';
import { createMockRequest, createMockResponse } from './helpers';

describe('requireWriteAuth', () => {
  beforeEach(() => {
    vi.stubEnv('WRITE_TOKEN', 'sk-test-token');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('passes a request with the write token', () => {
    const next = vi.fn();
    const { res, status } = createMockResponse();

    requireWriteAuth(createMockRequest({ headers: { 'api-key': 'sk-test-token' } }), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(status).not.toHaveBeenCalled();
  });

  it.each([
    ['a missing token', {}],
    ['a token without the prefix', { 'api-key': 'test-token' }],
    ['a wrong token', { 'api-key': 'sk-test-tokem' }],
    ['a token of another length', { 'api-key': 'sk-test' }],
  ])('rejects %s with 401', (_label, headers: Record<string, string>) => {
    const next = vi.fn();
    const { res, state } = createMockResponse();

    requireWriteAuth(createMockRequest({ headers }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(state.statusCode).toBe(401);
    expect(state.body).toEqual({ error: 'Unauthorized: Invalid write token' });
  });

  it('rejects every request when no token is configured', () => {
    vi.stubEnv('WRITE_TOKEN', '');
    const next = vi.fn();
    const { res, state } = createMockResponse();

    requireWriteAuth(createMockRequest({ headers: { 'api-key': 'sk-' } }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(state.statusCode).toBe(401);
  });
});

describe('validateWriteToken', () => {
  it('requires a token with the expected prefix', () => {
    expect(() => validateWriteToken({})).toThrow('WRITE_TOKEN environment variable is required');
    expect(() => validateWriteToken({ WRITE_TOKEN: 'test-token' })).toThrow(
      'WRITE_TOKEN must start with "sk-"',
    );
    expect(() => validateWriteToken({ WRITE_TOKEN: 'sk-test-token' })).not.toThrow();
  });
});

describe('maskSensitiveValue', () => {
  it('keeps only the prefix and the last four characters', () => {
    expect(maskSensitiveValue('sk-test-token')).toBe('sk-****oken');
    expect(maskSensitiveValue('test-token')).toBe('****');
    expect(maskSensitiveValue('')).toBe('');
  });
});
