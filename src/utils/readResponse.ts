import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a response body to the end as text.
 *
 * Reading consumes the stream, which releases the underlying connection.
 */
export async function readResponseBody(response: Response): SafeWrapAsync<Error, string> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body', { cause: errText }), null];
  }

  return [null, text];
}

/**
 * Releases a response body that will not be read, so the connection can be reused.
 */
export async function releaseResponseBody(response: Response): SafeWrapAsync<Error, void> {
  if (!response.body || response.bodyUsed) {
    return [null, undefined];
  }

  const [errCancel] = await safeWrapAsync(() => response.body?.cancel() ?? Promise.resolve());
  if (errCancel) {
    return [new Error('error releasing response body', { cause: errCancel }), null];
  }

  return [null, undefined];
}

/**
 * Decodes a JSON body into the caller's shape.
 *
 * An empty body decodes as `null` and is then held to the schema like any other value.
 * Text that is not JSON, or JSON the schema rejects, yields a {@link ValidationError}.
 */
export async function decodeBody<T extends StandardSchemaV1>(
  text: string,
  schema: T,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  let json: unknown = null;

  if (text.trim()) {
    const [errJson, parsed] = safeWrap<Error, unknown>(() => JSON.parse(text));
    if (errJson) {
      return [new ValidationError('error parsing json response body', [], { cause: errJson }), null];
    }

    json = parsed;
  }

  return validator(json, schema);
}
