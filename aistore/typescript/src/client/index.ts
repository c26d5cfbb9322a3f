/**
 * Client module for the AIStore client
 * @module aistore-client/client
 */

export { AisClient } from './client.js';
export { createClient, createClientFromEnv, type CreateClientOptions } from './factory.js';
export type { HttpMethod, QueryParams, RequestOptions, RequestDispatcher } from './types.js';
export { buildUrl, encodePath, resourceFromPath } from './http.js';
