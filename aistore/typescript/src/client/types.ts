/**
 * Dispatcher types shared by buckets and object handles
 * @module aistore-client/client/types
 */

import type { NormalizedAisConfig } from '../config/index.js';
import type {
  HttpResponse,
  RequestBody,
  StreamingHttpResponse,
} from '../transport/index.js';

/**
 * HTTP methods used by the AIStore API
 */
export type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE';

/**
 * Query parameters; undefined values are dropped, empty strings are kept
 */
export type QueryParams = Record<string, string | undefined>;

/**
 * Options for a single dispatcher request
 */
export interface RequestOptions {
  /** Query parameters */
  params?: QueryParams;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Value sent as a JSON body */
  json?: unknown;
  /** Raw body; ignored when `json` is set */
  body?: RequestBody;
}

/**
 * Executes requests against the AIStore REST API.
 *
 * Non-2xx statuses are thrown as the mapped AisError.
 */
export interface RequestDispatcher {
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<HttpResponse>;
  requestStream(
    method: HttpMethod,
    path: string,
    options?: RequestOptions
  ): Promise<StreamingHttpResponse>;
  getConfig(): NormalizedAisConfig;
}
