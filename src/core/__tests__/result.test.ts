import { describe, expect, it } from 'vitest';
import { ValidationError, isRetryableError, CacheUnavailableError } from '../errors.js';
import { Err, Ok, captureSync, isErr, isOk, unwrap } from '../result.js';

function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

describe('Result', () => {
  it('unwraps values and throws errors', () => {
    expect(unwrap(Ok(3))).toBe(3);
    expect(() => unwrap(Err(new Error('nope')))).toThrow('nope');
    expect(isOk(Ok(1))).toBe(true);
    expect(isErr(Err('x'))).toBe(true);
  });

  it('captures only the errors the caller recognizes', () => {
    const rejected = captureSync(() => {
      throw new ValidationError('field', 'something', 'nothing');
    }, isValidationError);
    expect(rejected.ok).toBe(false);
    expect(() =>
      captureSync(() => {
        throw new Error('bug');
      }, isValidationError),
    ).toThrow('bug');
    expect(captureSync(() => 'fine', isValidationError)).toEqual({ ok: true, value: 'fine' });
  });
});

describe('error classification', () => {
  it('treats cache failures and timeouts as retryable', () => {
    expect(isRetryableError(new CacheUnavailableError('getPolicy', 'down'))).toBe(true);
    expect(isRetryableError(new ValidationError('f', 'e', 'r'))).toBe(false);
    const timeout = new Error('slow');
    timeout.name = 'TimeoutError';
    expect(isRetryableError(timeout)).toBe(true);
    expect(isRetryableError('text')).toBe(false);
  });

  it('serializes details', () => {
    expect(new ValidationError('request.limit', 'positive', '0').toJSON()).toMatchObject({
      code: 'VALIDATION_ERROR',
      retryable: false,
      details: { field: 'request.limit', expected: 'positive', received: '0' },
    });
  });
});
