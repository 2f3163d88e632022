import { z } from 'zod';
import { DEFAULTS, MAX_DELAY_MS } from '../core/defaults.js';

/** Retry configuration: both values are non-negative integers, the delay within timer range. */
export const retryConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative(),
  retryDelayMs: z.number().int().nonnegative().max(MAX_DELAY_MS),
});

/** Per-attempt timeout in milliseconds, or `false` for none. */
export const timeoutSchema = z.union([z.literal(false), z.number().nonnegative().max(MAX_DELAY_MS)]);

/**
 * Reads an integer environment value, falling back to `fallback` when it is unset, empty,
 * not an integer, or outside `[min, max]`.
 */
function envInteger(min: number, max: number, fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value || !/^[+-]?\d+$/.test(value)) {
        return fallback;
      }

      const parsed = Number.parseInt(value, 10);
      return parsed >= min && parsed <= max ? parsed : fallback;
    });
}

/**
 * Environment variables the client can be configured from.
 *
 * `ARTIFACT_TIMEOUT` is in seconds and converted to milliseconds; the other optional values
 * keep their units. Invalid optional values, and delays past {@link MAX_DELAY_MS}, fall back
 * to {@link DEFAULTS}.
 */
export const envSchema = z
  .object({
    ARTIFACT_API_KEY: z.string({ required_error: 'ARTIFACT_API_KEY environment variable is required' }).min(1, {
      message: 'ARTIFACT_API_KEY environment variable is required',
    }),
    ARTIFACT_BASE_URL: z
      .string()
      .optional()
      .transform((value) => value || DEFAULTS.baseUrl),
    ARTIFACT_TIMEOUT: envInteger(1, Math.floor(MAX_DELAY_MS / 1000), DEFAULTS.timeout / 1000),
    ARTIFACT_MAX_RETRIES: envInteger(0, Number.MAX_SAFE_INTEGER, DEFAULTS.maxRetries),
    ARTIFACT_RETRY_DELAY: envInteger(0, MAX_DELAY_MS, DEFAULTS.retryDelayMs),
  })
  .transform((env) => ({
    apiKey: env.ARTIFACT_API_KEY,
    baseUrl: env.ARTIFACT_BASE_URL,
    timeout: env.ARTIFACT_TIMEOUT * 1000,
    retry: {
      maxRetries: env.ARTIFACT_MAX_RETRIES,
      retryDelayMs: env.ARTIFACT_RETRY_DELAY,
    },
  }));

/** Validated client configuration produced from the environment. */
export type EnvConfig = z.output<typeof envSchema>;
