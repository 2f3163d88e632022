/**
 * Error-first result tuple returned by every fallible call in the client, `[error, data]`.
 * Exactly one side is non-null.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a promise factory and captures a rejection as the error side of the tuple.
 * @example
 * const [err, response] = await safeWrapAsync(() => fetch(request));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Synchronous variant of {@link safeWrapAsync}.
 * @example
 * const [err, url] = safeWrap(() => new URL(input));
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
