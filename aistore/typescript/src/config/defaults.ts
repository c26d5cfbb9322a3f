/**
 * Default configuration values for the AIStore client
 * @module aistore-client/config/defaults
 */

/**
 * API version prefix of every request path.
 */
export const API_VERSION = 'v1';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Largest timeout a Node.js timer accepts.
 */
export const MAX_TIMEOUT = 2_147_483_647;

/**
 * Default chunk size for object downloads (64 KiB).
 */
export const DEFAULT_DOWNLOAD_CHUNK_SIZE = 64 * 1024;

/**
 * Default number of concurrent uploads in a bulk PUT.
 */
export const DEFAULT_UPLOAD_CONCURRENCY = 8;

/**
 * Upper bound for bulk PUT concurrency.
 */
export const MAX_UPLOAD_CONCURRENCY = 64;

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'aistore-client-ts/0.1.0';
