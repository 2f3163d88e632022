/**
 * Configuration entrypoint: environment loading and the schemas behind it.
 * @module
 */
export { createClientFromEnv, type Env, loadConfigFromEnv } from './env.js';
export { type EnvConfig, envSchema, retryConfigSchema } from './schema.js';
