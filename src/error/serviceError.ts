import { z } from 'zod';
import { tryParse } from '../utils/tryParse.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Itemized detail reported by the service alongside a failed exchange. */
export interface ServiceErrorDetails {
  /** Error strings from the result envelope, in service order. */
  errors?: readonly string[];
  /** Warning strings from the result envelope, in service order. */
  warnings?: readonly string[];
}

/**
 * Structured error for a final non-2xx response from the artifact service.
 *
 * `detail` holds the raw response body, or the service's error list joined with `"; "`
 * when the body carried a result envelope. `message` is the rendered form,
 * e.g. `Artifact API error (status 400): Invalid field; Missing required field`.
 */
export class ServiceError extends Error {
  /** ServiceError error-name */
  static name = 'ServiceError';

  /** HTTP status code of the final response; 0 only on wildcard references. */
  readonly statusCode: number;
  /** Raw body, or the joined service error list. */
  readonly detail: string;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];

  constructor(
    statusCode: number,
    detail = '',
    { errors = [], warnings = [] }: ServiceErrorDetails = {},
    opts?: ErrorOptions,
  ) {
    super(renderMessage(statusCode, detail, errors), opts);
    this.name = ServiceError.name;
    this.statusCode = statusCode;
    this.detail = detail;
    this.errors = [...errors];
    this.warnings = [...warnings];
  }

  /**
   * Reports whether this error is the same kind as `reference`.
   *
   * A reference with status 0 matches every service error; otherwise the status codes
   * must be equal. Detail and message never take part in the match.
   */
  is(reference: unknown): boolean {
    if (!(reference instanceof ServiceError)) {
      return false;
    }

    return reference.statusCode === 0 || reference.statusCode === this.statusCode;
  }
}

/** Wildcard reference that {@link ServiceError.is} matches for any status code. */
export const ANY_SERVICE_ERROR: ServiceError = new ServiceError(0);

function renderMessage(statusCode: number, detail: string, errors: readonly string[]): string {
  if (errors.length > 0) {
    return `Artifact API error (status ${statusCode}): ${errors.join('; ')}`;
  }

  if (detail) {
    return `Artifact API error (status ${statusCode}): ${detail}`;
  }

  return `Artifact API error (status ${statusCode})`;
}

/** Envelope keys the service wraps results in, consulted in this order. */
const ENVELOPE_KEYS = ['OperationResult', 'CreateResult', 'QueryResult'] as const;

const resultEnvelopeSchema = z.object({
  Errors: z.array(z.string()).nullish(),
  Warnings: z.array(z.string()).nullish(),
});

/**
 * Normalizes a non-success response into a {@link ServiceError}.
 *
 * Looks for the first non-null result envelope in the body and lifts its `Errors` and
 * `Warnings` lists. Bodies that are not JSON, or carry no usable envelope, produce an
 * error with only the status code and the raw body as detail.
 */
export function parseServiceError(statusCode: number, body: string): ServiceError {
  const parsed = tryParse(body);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return new ServiceError(statusCode, body);
  }

  const envelopes: Record<string, unknown> = { ...parsed };
  const key = ENVELOPE_KEYS.find((name) => envelopes[name] !== undefined && envelopes[name] !== null);
  if (!key) {
    return new ServiceError(statusCode, body);
  }

  const result = resultEnvelopeSchema.safeParse(envelopes[key]);
  if (!result.success) {
    return new ServiceError(statusCode, body);
  }

  const errors = result.data.Errors ?? [];
  const warnings = result.data.Warnings ?? [];
  const detail = errors.length > 0 ? errors.join('; ') : body;

  return new ServiceError(statusCode, detail, { errors, warnings });
}

/**
 * Type guard for {@link ServiceError}, following nested causes.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return Boolean(getServiceError(error));
}

/**
 * Extract a {@link ServiceError} from an unknown error value, following nested causes.
 */
export function getServiceError(error: unknown): null | ServiceError {
  return unwrapErrorType(ServiceError, error);
}

/**
 * Reports whether `error`, or a service error in its cause chain, matches `reference`
 * under {@link ServiceError.is}.
 */
export function matchesServiceError(error: unknown, reference: ServiceError = ANY_SERVICE_ERROR): boolean {
  let current: unknown = error;

  while (current instanceof Error) {
    if (current instanceof ServiceError) {
      return current.is(reference);
    }

    current = current.cause;
  }

  return false;
}
