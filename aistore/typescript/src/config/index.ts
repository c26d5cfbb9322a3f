/**
 * Configuration module for the AIStore client
 * @module aistore-client/config
 */

export type { AisConfig, NormalizedAisConfig } from './types.js';

export {
  API_VERSION,
  DEFAULT_TIMEOUT,
  MAX_TIMEOUT,
  DEFAULT_DOWNLOAD_CHUNK_SIZE,
  DEFAULT_UPLOAD_CONCURRENCY,
  DEFAULT_USER_AGENT,
  MAX_UPLOAD_CONCURRENCY,
} from './defaults.js';

export { validateConfig, normalizeConfig } from './validation.js';

export { AisConfigBuilder } from './builder.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
