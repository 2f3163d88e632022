import { safeWrap } from './wrap.js';

/**
 * Parses `input` as JSON, handing back `input` itself when it is not valid JSON.
 * Never throws; callers tell the two apart by the type of the result.
 */
export function tryParse(input: string): unknown {
  const [errParsed, parsed] = safeWrap<Error, unknown>(() => JSON.parse(input));
  return errParsed ? input : parsed;
}
