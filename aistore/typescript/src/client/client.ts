/**
 * AIStore client implementation
 * @module aistore-client/client
 */

import type { NormalizedAisConfig } from '../config/index.js';
import {
  type AisError,
  ConfigError,
  isAisError,
  isRetryableError,
  mapHttpStatusToError,
  parseErrorMessage,
} from '../errors/index.js';
import { getLogger } from '../observability/index.js';
import {
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type StreamingHttpResponse,
  isSuccessResponse,
} from '../transport/index.js';
import { Bucket, type BucketOptions } from '../bucket/index.js';
import type { HttpMethod, RequestDispatcher, RequestOptions } from './types.js';
import { buildUrl, readStreamText, resourceFromPath } from './http.js';

/**
 * AIStore client.
 *
 * Owns the transport and dispatches every request made by buckets and
 * object handles. Nothing is cached: each call issues one request.
 *
 * @example
 * ```typescript
 * const client = createClient({ endpoint: 'http://localhost:8080' });
 * const headers = await client.bucket('images').object('cat.png').headObject();
 * ```
 */
export class AisClient implements RequestDispatcher {
  private readonly config: NormalizedAisConfig;
  private readonly transport: HttpTransport;
  private closed = false;

  constructor(config: NormalizedAisConfig, transport: HttpTransport) {
    this.config = config;
    this.transport = transport;
  }

  /**
   * Returns a handle to a bucket. No request is made.
   */
  bucket(name: string, options: BucketOptions = {}): Bucket {
    return new Bucket(this, name, options);
  }

  /**
   * Sends a request and buffers the response body.
   *
   * @throws {AisError} For transport failures and non-2xx statuses
   */
  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    const httpRequest = this.buildRequest(method, path, options);
    const start = Date.now();

    const response = await this.dispatch(method, path, start, () =>
      this.transport.send(httpRequest)
    );

    if (!isSuccessResponse(response)) {
      const message = parseErrorMessage(new TextDecoder().decode(response.body));
      throw this.fail(method, path, response.status, start, message);
    }

    this.logRequest(method, path, response.status, start);
    return response;
  }

  /**
   * Sends a request and returns once the headers arrive; the caller owns
   * the body stream.
   *
   * @throws {AisError} For transport failures and non-2xx statuses
   */
  async requestStream(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<StreamingHttpResponse> {
    const httpRequest = this.buildRequest(method, path, options);
    const start = Date.now();

    const response = await this.dispatch(method, path, start, () =>
      this.transport.sendStreaming(httpRequest)
    );

    if (!isSuccessResponse(response)) {
      const message = parseErrorMessage(await readStreamText(response.body));
      throw this.fail(method, path, response.status, start, message);
    }

    this.logRequest(method, path, response.status, start);
    return response;
  }

  /**
   * Checks whether the cluster answers its health endpoint.
   *
   * Network and server failures yield false; other errors propagate.
   */
  async isRunning(): Promise<boolean> {
    try {
      await this.request('GET', 'health');
      return true;
    } catch (error) {
      if (isRetryableError(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Closes the client and its transport. Later requests are rejected.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.transport.close();
  }

  isClosed(): boolean {
    return this.closed;
  }

  getConfig(): NormalizedAisConfig {
    return this.config;
  }

  private buildRequest(
    method: HttpMethod,
    path: string,
    options: RequestOptions
  ): HttpRequest {
    if (this.closed) {
      throw ConfigError.clientClosed();
    }

    const headers: Record<string, string> = {
      'user-agent': this.config.userAgent,
      ...options.headers,
    };

    let body = options.body;
    if (options.json !== undefined) {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const request: HttpRequest = {
      method,
      url: buildUrl(this.config.apiUrl, path, options.params),
      headers,
    };
    if (body !== undefined) {
      request.body = body;
    }
    return request;
  }

  private async dispatch<T>(
    method: HttpMethod,
    path: string,
    start: number,
    send: () => Promise<T>
  ): Promise<T> {
    try {
      return await send();
    } catch (error) {
      getLogger().warn('AIS request failed', {
        method,
        path,
        error: isAisError(error) ? error.code : String(error),
        durationMs: Date.now() - start,
      });
      throw error;
    }
  }

  private fail(
    method: HttpMethod,
    path: string,
    status: number,
    start: number,
    message: string | undefined
  ): AisError {
    const error = mapHttpStatusToError(status, message, resourceFromPath(path));
    getLogger().warn('AIS request failed', {
      method,
      path,
      status,
      error: error.code,
      durationMs: Date.now() - start,
    });
    return error;
  }

  private logRequest(method: HttpMethod, path: string, status: number, start: number): void {
    getLogger().debug('AIS request', {
      method,
      path,
      status,
      durationMs: Date.now() - start,
    });
  }
}
