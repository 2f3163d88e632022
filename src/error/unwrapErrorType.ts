/**
 * Walks an error and its `cause` chain and returns the first link that is an instance of
 * `errorClass`. Links are matched by prototype only, so a match always carries the
 * class's fields.
 */
export function unwrapErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): T | null {
  let current: unknown = err;

  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
