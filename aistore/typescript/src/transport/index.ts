/**
 * HTTP transport layer for the AIStore client
 * @module aistore-client/transport
 */

export type {
  RequestBody,
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
} from './types.js';

export { isSuccessResponse, isStreamingBody } from './types.js';

export {
  FetchTransport,
  createFetchTransport,
  type FetchTransportOptions,
} from './fetch-transport.js';
