/**
 * Environment variable configuration loading for the AIStore client
 * @module aistore-client/config/env
 */

import { ConfigError } from '../errors/index.js';
import type { AisConfig, NormalizedAisConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names for client configuration.
 */
export const ENV_VARS = {
  ENDPOINT: 'AIS_ENDPOINT',
  TIMEOUT_MS: 'AIS_TIMEOUT_MS',
  DOWNLOAD_CHUNK_SIZE: 'AIS_DOWNLOAD_CHUNK_SIZE',
  UPLOAD_CONCURRENCY: 'AIS_UPLOAD_CONCURRENCY',
} as const;

/**
 * Parses an integer from an environment variable.
 *
 * @returns Parsed integer or undefined if value is empty
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
      details: { paramName: name },
    });
  }

  return parseInt(value, 10);
}

/**
 * Creates client configuration from environment variables.
 *
 * Environment variables:
 * - AIS_ENDPOINT (required): AIStore proxy URL
 * - AIS_TIMEOUT_MS (optional): Request timeout in milliseconds
 * - AIS_DOWNLOAD_CHUNK_SIZE (optional): Download chunk size in bytes
 * - AIS_UPLOAD_CONCURRENCY (optional): Concurrent uploads for bulk PUT
 *
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): NormalizedAisConfig {
  const config: Partial<AisConfig> = {
    endpoint: env[ENV_VARS.ENDPOINT],
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
    downloadChunkSize: parseIntEnv(
      env[ENV_VARS.DOWNLOAD_CHUNK_SIZE],
      ENV_VARS.DOWNLOAD_CHUNK_SIZE
    ),
    uploadConcurrency: parseIntEnv(
      env[ENV_VARS.UPLOAD_CONCURRENCY],
      ENV_VARS.UPLOAD_CONCURRENCY
    ),
  };

  return normalizeConfig(config);
}
