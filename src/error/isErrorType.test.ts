import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';
import { RetrySuppressedError } from './retrySuppressedError.js';
import { ServiceError } from './serviceError.js';
import { ValidationError } from './validationError.js';

describe('isErrorType', () => {
  it('returns false for non-errors', () => {
    expect(isErrorType(ServiceError, { statusCode: 500 })).toBe(false);
    expect(isErrorType(ServiceError, null)).toBe(false);
  });

  it('returns true for a direct instance', () => {
    expect(isErrorType(ValidationError, new ValidationError('error validating data', []))).toBe(true);
  });

  it('returns true when the class is in the cause chain', () => {
    const suppressed = new RetrySuppressedError('error further retries suppressed', 1);
    const err = new Error('error executing request in create', { cause: suppressed });

    expect(isErrorType(RetrySuppressedError, err)).toBe(true);
  });

  it('returns false when only other classes are in the chain', () => {
    const err = new Error('error executing request in create', {
      cause: new RetrySuppressedError('error further retries suppressed', 1),
    });

    expect(isErrorType(ServiceError, err)).toBe(false);
    expect(isErrorType(ValidationError, err)).toBe(false);
  });

  it('narrows the value for the caller', () => {
    const err: unknown = new ServiceError(409, 'Concurrency conflict');

    if (!isErrorType(ServiceError, err)) {
      throw new Error('expected a service error');
    }
    expect(err.statusCode).toBe(409);
  });
});
