/**
 * Fluent configuration builder for the AIStore client
 * @module aistore-client/config/builder
 */

import type { AisConfig, NormalizedAisConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing client configuration.
 *
 * @example
 * ```typescript
 * const config = new AisConfigBuilder()
 *   .endpoint('http://localhost:8080')
 *   .timeout(60000)
 *   .downloadChunkSize(1024 * 1024)
 *   .build();
 * ```
 */
export class AisConfigBuilder {
  private config: Partial<AisConfig> = {};

  /**
   * Sets the AIStore proxy URL.
   */
  endpoint(url: string): this {
    this.config.endpoint = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Sets the chunk size used to iterate downloaded objects.
   */
  downloadChunkSize(bytes: number): this {
    this.config.downloadChunkSize = bytes;
    return this;
  }

  /**
   * Sets the number of concurrent uploads for bulk PUTs.
   */
  uploadConcurrency(n: number): this {
    this.config.uploadConcurrency = n;
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): NormalizedAisConfig {
    return normalizeConfig(this.config);
  }
}
