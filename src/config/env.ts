import { ArtifactClient } from '../core/client.js';
import type { TransportProviderDefinition } from '../types/request.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type EnvConfig, envSchema } from './schema.js';

/** Environment shape read by {@link loadConfigFromEnv}; `process.env` fits it. */
export type Env = Record<string, string | undefined>;

/**
 * Loads client configuration from environment variables.
 *
 * | Variable               | Meaning                          | Default                  |
 * | ---------------------- | -------------------------------- | ------------------------ |
 * | `ARTIFACT_API_KEY`     | API key (required)               |                          |
 * | `ARTIFACT_BASE_URL`    | Service root                     | `DEFAULTS.baseUrl`       |
 * | `ARTIFACT_TIMEOUT`     | Per-attempt timeout, seconds > 0 | 30                       |
 * | `ARTIFACT_MAX_RETRIES` | Retries, >= 0                    | 3                        |
 * | `ARTIFACT_RETRY_DELAY` | Base backoff, milliseconds >= 0  | 1000                     |
 *
 * @returns `[error, config]`; the error is a {@link ValidationError} when the API key is missing.
 */
export async function loadConfigFromEnv(env: Env = process.env): SafeWrapAsync<Error, EnvConfig> {
  const [err, config] = await validator(env, envSchema);
  if (err) {
    return [new Error('error loading configuration from environment', { cause: err }), null];
  }

  return [null, config];
}

/**
 * Builds an {@link ArtifactClient} from environment variables, using the default fetch
 * transport unless another one is given.
 */
export async function createClientFromEnv(
  env: Env = process.env,
  transport?: TransportProviderDefinition,
): SafeWrapAsync<Error, ArtifactClient> {
  const [err, config] = await loadConfigFromEnv(env);
  if (err) {
    return [new Error('error creating client from environment', { cause: err }), null];
  }

  return [
    null,
    new ArtifactClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      retry: config.retry,
      ...(transport && { transport }),
    }),
  ];
}
