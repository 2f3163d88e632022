import { describe, expect, it } from 'vitest';
import {
  ANY_SERVICE_ERROR,
  getServiceError,
  isServiceError,
  matchesServiceError,
  parseServiceError,
  ServiceError,
} from './serviceError.js';

describe('ServiceError', () => {
  it('renders the error list when present', () => {
    const err = new ServiceError(400, 'ignored', { errors: ['Invalid field', 'Missing required field'] });

    expect(err.message).toBe('Artifact API error (status 400): Invalid field; Missing required field');
  });

  it('renders the detail when there is no error list', () => {
    expect(new ServiceError(502, 'Bad Gateway').message).toBe('Artifact API error (status 502): Bad Gateway');
  });

  it('renders only the status when there is nothing else', () => {
    const err = new ServiceError(500);

    expect(err.message).toBe('Artifact API error (status 500)');
    expect(err.detail).toBe('');
    expect(err.errors).toEqual([]);
    expect(err.warnings).toEqual([]);
  });

  it('copies the given lists', () => {
    const errors = ['Invalid field'];
    const err = new ServiceError(400, 'Invalid field', { errors });
    errors.push('later');

    expect(err.errors).toEqual(['Invalid field']);
  });

  describe('is', () => {
    const err = new ServiceError(400, 'Invalid field');

    it('matches the wildcard reference', () => {
      expect(err.is(ANY_SERVICE_ERROR)).toBe(true);
      expect(err.is(new ServiceError(0))).toBe(true);
    });

    it('matches a reference with the same status regardless of detail', () => {
      expect(err.is(new ServiceError(400, 'something else entirely'))).toBe(true);
    });

    it('does not match another status', () => {
      expect(err.is(new ServiceError(500))).toBe(false);
    });

    it('does not match other error kinds', () => {
      expect(err.is(new Error('Artifact API error (status 400): Invalid field'))).toBe(false);
      expect(err.is(null)).toBe(false);
    });
  });
});

describe('parseServiceError', () => {
  it('lifts errors and warnings from an OperationResult envelope', () => {
    const body = JSON.stringify({
      OperationResult: {
        Errors: ['Invalid field', 'Missing required field'],
        Warnings: ['API status is Deprecated'],
      },
    });

    const err = parseServiceError(400, body);

    expect(err.statusCode).toBe(400);
    expect(err.errors).toHaveLength(2);
    expect(err.warnings).toEqual(['API status is Deprecated']);
    expect(err.detail).toBe('Invalid field; Missing required field');
    expect(err.message).toBe('Artifact API error (status 400): Invalid field; Missing required field');
  });

  it('reads CreateResult and QueryResult envelopes', () => {
    const create = parseServiceError(422, JSON.stringify({ CreateResult: { Errors: ['Name is required'] } }));
    const query = parseServiceError(400, JSON.stringify({ QueryResult: { Errors: ['Could not parse'] } }));

    expect(create.errors).toEqual(['Name is required']);
    expect(query.errors).toEqual(['Could not parse']);
  });

  it('prefers OperationResult over the other envelopes', () => {
    const body = JSON.stringify({
      QueryResult: { Errors: ['from query'] },
      OperationResult: { Errors: ['from operation'] },
    });

    expect(parseServiceError(400, body).errors).toEqual(['from operation']);
  });

  it('skips envelopes that are null', () => {
    const body = JSON.stringify({ OperationResult: null, CreateResult: { Errors: ['from create'] } });

    expect(parseServiceError(400, body).errors).toEqual(['from create']);
  });

  it('keeps the raw body as detail for non-json bodies', () => {
    const err = parseServiceError(404, 'Not Found');

    expect(err.statusCode).toBe(404);
    expect(err.detail).toBe('Not Found');
    expect(err.errors).toEqual([]);
    expect(err.message).toBe('Artifact API error (status 404): Not Found');
  });

  it('keeps the raw body when no envelope is present', () => {
    const body = JSON.stringify({ message: 'unauthorized' });
    const err = parseServiceError(401, body);

    expect(err.detail).toBe(body);
    expect(err.errors).toEqual([]);
  });

  it('keeps the raw body when the envelope has an empty error list', () => {
    const body = JSON.stringify({ OperationResult: { Errors: [], Warnings: ['careful'] } });
    const err = parseServiceError(500, body);

    expect(err.detail).toBe(body);
    expect(err.warnings).toEqual(['careful']);
  });

  it('degrades to the raw body when the lists are malformed', () => {
    const body = JSON.stringify({ OperationResult: { Errors: 'Invalid field' } });
    const err = parseServiceError(400, body);

    expect(err.detail).toBe(body);
    expect(err.errors).toEqual([]);
  });

  it('treats json arrays and scalars as raw bodies', () => {
    expect(parseServiceError(400, '["Invalid field"]').detail).toBe('["Invalid field"]');
    expect(parseServiceError(400, '42').detail).toBe('42');
  });

  it('handles an empty body', () => {
    const err = parseServiceError(503, '');

    expect(err.detail).toBe('');
    expect(err.message).toBe('Artifact API error (status 503)');
  });

  it('yields equal errors for the same input', () => {
    const body = JSON.stringify({ OperationResult: { Errors: ['Invalid field'] } });
    const first = parseServiceError(400, body);
    const second = parseServiceError(400, body);

    expect(second.statusCode).toBe(first.statusCode);
    expect(second.detail).toBe(first.detail);
    expect(second.message).toBe(first.message);
    expect(second.errors).toEqual(first.errors);
    expect(second.warnings).toEqual(first.warnings);
  });
});

describe('matchesServiceError', () => {
  it('follows the cause chain', () => {
    const err = new Error('error in caller', { cause: new ServiceError(404, 'Not Found') });

    expect(matchesServiceError(err)).toBe(true);
    expect(matchesServiceError(err, new ServiceError(404))).toBe(true);
    expect(matchesServiceError(err, new ServiceError(500))).toBe(false);
  });

  it('returns false without a service error', () => {
    expect(matchesServiceError(new Error('boom'))).toBe(false);
    expect(matchesServiceError('Artifact API error (status 404)')).toBe(false);
  });
});

describe('isServiceError', () => {
  it('detects and extracts service errors', () => {
    const inner = new ServiceError(409);
    const err = new Error('wrapped', { cause: inner });

    expect(isServiceError(err)).toBe(true);
    expect(getServiceError(err)).toBe(inner);
    expect(isServiceError(new Error('boom'))).toBe(false);
  });
});
