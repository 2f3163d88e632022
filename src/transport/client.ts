import type { TransportProviderDefinition } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options for {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** `fetch` implementation to submit requests with. Defaults to the global `fetch`. */
  fetch?: (request: Request) => Promise<Response>;
}

/**
 * Default transport: submits each request with the WHATWG `fetch` API.
 *
 * Every status code is handed back as a response. A rejected `fetch` (connection
 * failures, DNS errors, an aborted signal) becomes the error side of the tuple, with the
 * original rejection as `cause` so callers can inspect codes and abort reasons.
 */
export class FetchTransport implements TransportProviderDefinition {
  /** `fetch` used for every request. */
  #fetch: (request: Request) => Promise<Response>;

  constructor(opts: FetchTransportOptions = {}) {
    this.#fetch = opts.fetch ?? ((request) => fetch(request));
  }

  /**
   * Submits a single request.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: Request): SafeWrapAsync<Error, Response> {
    const [err, response] = await safeWrapAsync(() => this.#fetch(request));
    if (err) {
      return [new Error(`error sending ${request.method} request in FetchTransport`, { cause: err }), null];
    }

    return [null, response];
  }
}
