/**
 * Factory functions for creating AIStore clients
 * @module aistore-client/client/factory
 */

import type { AisConfig } from '../config/index.js';
import { normalizeConfig, createConfigFromEnv } from '../config/index.js';
import { createFetchTransport, type HttpTransport } from '../transport/index.js';
import { AisClient } from './client.js';

/**
 * Options for client construction
 */
export interface CreateClientOptions {
  /** Transport to use instead of the fetch transport */
  transport?: HttpTransport;
}

/**
 * Creates a client from a configuration object.
 *
 * @throws {ConfigError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({ endpoint: 'http://localhost:8080' });
 *
 * try {
 *   const stream = await client.bucket('images').object('cat.png').getObject();
 *   const data = await stream.readAll();
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(config: AisConfig, options: CreateClientOptions = {}): AisClient {
  const normalizedConfig = normalizeConfig(config);
  const transport = options.transport ?? createFetchTransport(normalizedConfig.timeout);
  return new AisClient(normalizedConfig, transport);
}

/**
 * Creates a client from environment variables (see `createConfigFromEnv`).
 *
 * @throws {ConfigError} If required environment variables are missing or invalid
 */
export function createClientFromEnv(options: CreateClientOptions = {}): AisClient {
  const normalizedConfig = createConfigFromEnv();
  const transport = options.transport ?? createFetchTransport(normalizedConfig.timeout);
  return new AisClient(normalizedConfig, transport);
}
