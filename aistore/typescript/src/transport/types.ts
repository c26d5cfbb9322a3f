/**
 * HTTP transport type definitions for the AIStore client
 * @module aistore-client/transport/types
 */

/**
 * Request body accepted by the transport.
 *
 * Async iterables are streamed to the server without buffering.
 */
export type RequestBody = Uint8Array | string | AsyncIterable<Uint8Array>;

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method (GET, PUT, POST, DELETE, HEAD) */
  method: string;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: RequestBody;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Response headers, case-insensitive */
  headers: Headers;
  /** Response body as buffer */
  body: Uint8Array;
}

/**
 * HTTP response with streaming body
 */
export interface StreamingHttpResponse {
  /** HTTP status code */
  status: number;
  /** Response headers, case-insensitive */
  headers: Headers;
  /** Response body as stream */
  body: ReadableStream<Uint8Array>;
}

/**
 * HTTP transport interface.
 *
 * Transports report every HTTP status they receive; only failures to get a
 * response at all are thrown.
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns the buffered response.
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Sends an HTTP request and returns as soon as the headers arrive.
   *
   * The body stream belongs to the caller, who must consume or cancel it.
   */
  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;

  /**
   * Closes the transport and releases resources
   */
  close(): Promise<void>;
}

/**
 * Checks if a response is successful (2xx status)
 */
export function isSuccessResponse(response: { status: number }): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Checks whether a body is streamed rather than sent in one piece
 */
export function isStreamingBody(body: RequestBody): body is AsyncIterable<Uint8Array> {
  return typeof body !== 'string' && !(body instanceof Uint8Array);
}
