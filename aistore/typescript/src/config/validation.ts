/**
 * Configuration validation and normalization for the AIStore client
 * @module aistore-client/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { AisConfig, NormalizedAisConfig } from './types.js';
import {
  API_VERSION,
  DEFAULT_TIMEOUT,
  MAX_TIMEOUT,
  DEFAULT_DOWNLOAD_CHUNK_SIZE,
  DEFAULT_UPLOAD_CONCURRENCY,
  DEFAULT_USER_AGENT,
  MAX_UPLOAD_CONCURRENCY,
} from './defaults.js';

/**
 * Zod schema for the endpoint URL.
 */
const endpointSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'endpoint must use http or https protocol',
  });

/**
 * Zod schema for caller-supplied configuration.
 */
const configSchema = z.object({
  endpoint: endpointSchema,
  timeout: z.number().int().positive().max(MAX_TIMEOUT).optional(),
  downloadChunkSize: z.number().int().positive().optional(),
  uploadConcurrency: z.number().int().positive().max(MAX_UPLOAD_CONCURRENCY).optional(),
  userAgent: z.string().min(1).optional(),
});

/**
 * Validates AIStore client configuration.
 *
 * @throws {ConfigError} If the configuration is invalid
 */
export function validateConfig(config: Partial<AisConfig>): AisConfig {
  const result = configSchema.safeParse(config);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const paramName = issue ? issue.path.join('.') : 'config';

  if (paramName === 'endpoint') {
    if (config.endpoint === undefined || config.endpoint === '') {
      throw ConfigError.missingEndpoint();
    }
    throw ConfigError.invalidEndpoint(
      config.endpoint,
      `Invalid endpoint URL: ${config.endpoint} (${issue?.message ?? 'invalid'})`
    );
  }

  throw ConfigError.invalidConfig(paramName, `${paramName}: ${issue?.message ?? 'invalid value'}`);
}

/**
 * Normalizes configuration by validating it and applying defaults.
 *
 * @throws {ConfigError} If the configuration is invalid
 */
export function normalizeConfig(config: Partial<AisConfig>): NormalizedAisConfig {
  const valid = validateConfig(config);
  const endpoint = valid.endpoint.replace(/\/+$/, '');

  return {
    endpoint,
    apiUrl: `${endpoint}/${API_VERSION}/`,
    timeout: valid.timeout ?? DEFAULT_TIMEOUT,
    downloadChunkSize: valid.downloadChunkSize ?? DEFAULT_DOWNLOAD_CHUNK_SIZE,
    uploadConcurrency: valid.uploadConcurrency ?? DEFAULT_UPLOAD_CONCURRENCY,
    userAgent: valid.userAgent ?? DEFAULT_USER_AGENT,
  };
}
