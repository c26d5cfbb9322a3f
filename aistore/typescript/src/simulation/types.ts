/**
 * Type definitions for simulation/testing support
 * @module aistore-client/simulation/types
 */

/**
 * A request as seen by the mock transport
 */
export interface RecordedRequest {
  /** HTTP method (GET, PUT, POST, DELETE, HEAD) */
  method: string;
  /** Full URL including query parameters */
  url: string;
  /** Path relative to the API base, e.g. `objects/images/cat.png` */
  path: string;
  /** Decoded query parameters */
  params: Record<string, string>;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Collected request body (optional) */
  body?: Uint8Array;
  /** Timestamp when the request was received */
  timestamp: number;
}

/**
 * Response served by the mock transport
 */
export interface MockResponse {
  /** @default 200 */
  status?: number;
  headers?: Record<string, string>;
  body?: Uint8Array | string;
}

/**
 * Computes the response for a request
 */
export type MockHandler = (request: RecordedRequest) => MockResponse | Promise<MockResponse>;

/**
 * Options for MockTransport
 */
export interface MockTransportOptions {
  /** Serves requests with no scripted response queued */
  handler?: MockHandler;
  /**
   * Size of the pieces streamed response bodies are split into; the whole
   * body is sent in one piece when unset
   */
  streamPieceSize?: number;
}

/**
 * An object held by the in-memory cluster
 */
export interface StoredObject {
  data: Uint8Array;
  checksumType: string;
  checksumValue: string;
}
