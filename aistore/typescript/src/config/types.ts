/**
 * Configuration type definitions for the AIStore client
 * @module aistore-client/config/types
 */

/**
 * Client configuration as supplied by the caller.
 */
export interface AisConfig {
  /**
   * Base URL of an AIStore proxy, e.g. `http://localhost:8080`.
   */
  endpoint: string;

  /**
   * Request timeout in milliseconds. For streamed downloads it bounds the
   * wait for response headers only.
   * @default 30000
   */
  timeout?: number;

  /**
   * Chunk size in bytes used when iterating a downloaded object.
   * @default 65536
   */
  downloadChunkSize?: number;

  /**
   * Maximum number of concurrent uploads for bulk directory PUTs.
   * @default 8
   */
  uploadConcurrency?: number;

  /**
   * User-Agent header sent with every request.
   */
  userAgent?: string;
}

/**
 * Configuration with defaults applied and derived fields resolved.
 */
export interface NormalizedAisConfig extends Required<AisConfig> {
  /**
   * Versioned API base URL (`{endpoint}/v1/`), always ending in a slash.
   */
  apiUrl: string;
}
