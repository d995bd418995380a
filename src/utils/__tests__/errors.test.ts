import { describe, test, expect } from 'vitest';
import { createError, describeError, isAppError, toAppError } from '../errors.js';

describe('errors', () => {
  test('createError attaches stage, code and details', () => {
    const error = createError('Registry returned HTTP 500 (page 1)', 'fetch', 'HTTP_ERROR', { status: 500 });

    expect(error).toBeInstanceOf(Error);
    expect(isAppError(error)).toBe(true);
    expect(error.stage).toBe('fetch');
    expect(error.code).toBe('HTTP_ERROR');
    expect(error.details).toEqual({ status: 500 });
  });

  test('isAppError rejects plain errors and non-errors', () => {
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(isAppError({ stage: 'fetch', code: 'X' })).toBe(false);
  });

  test('toAppError keeps an existing AppError', () => {
    const original = createError('missing', 'config', 'MISSING_ENV');
    expect(toAppError(original, 'write', 'SHEET_WRITE_FAILED')).toBe(original);
  });

  test('toAppError wraps other throwables', () => {
    const wrapped = toAppError('socket closed', 'write', 'SHEET_WRITE_FAILED', { sheet: 'Data' });

    expect(wrapped.message).toBe('socket closed');
    expect(wrapped.stage).toBe('write');
    expect(wrapped.details).toEqual({ sheet: 'Data' });
  });

  test('describeError reads messages from errors and strings', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(404)).toBe('404');
  });
});
