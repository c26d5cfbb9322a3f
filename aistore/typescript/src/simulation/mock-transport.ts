/**
 * In-process transport for tests
 * @module aistore-client/simulation/mock-transport
 */

import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  RequestBody,
  StreamingHttpResponse,
} from '../transport/index.js';
import type { MockHandler, MockResponse, MockTransportOptions, RecordedRequest } from './types.js';

/**
 * Transport that records requests and serves responses without a network.
 *
 * Queued responses are served first, in order; afterwards the handler
 * answers, and without a handler every request gets an empty 200.
 *
 * @example
 * ```typescript
 * const transport = new MockTransport();
 * transport.enqueue({ status: 200, headers: { 'content-length': '12345' } });
 * const client = createClient({ endpoint: 'http://localhost:8080' }, { transport });
 * ```
 */
export class MockTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly queue: Array<MockResponse | Error> = [];
  private readonly handler?: MockHandler;
  private readonly streamPieceSize?: number;
  private closed = false;
  private cancelled = 0;

  constructor(options: MockTransportOptions = {}) {
    this.handler = options.handler;
    this.streamPieceSize = options.streamPieceSize;
  }

  /**
   * Queues a response, or an error to throw, for the next request
   */
  enqueue(response: MockResponse | Error): this {
    this.queue.push(response);
    return this;
  }

  /**
   * The most recent request, if any
   */
  lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Number of streamed response bodies cancelled by the reader
   */
  get cancelledStreams(): number {
    return this.cancelled;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.respond(request);
    return {
      status: response.status ?? 200,
      headers: new Headers(response.headers),
      body: request.method === 'HEAD' ? new Uint8Array(0) : toBytes(response.body),
    };
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const response = await this.respond(request);
    const body = request.method === 'HEAD' ? new Uint8Array(0) : toBytes(response.body);

    return {
      status: response.status ?? 200,
      headers: new Headers(response.headers),
      body: this.streamOf(body),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async respond(request: HttpRequest): Promise<MockResponse> {
    const url = new URL(request.url);
    const recorded: RecordedRequest = {
      method: request.method,
      url: request.url,
      path: apiPath(url.pathname),
      params: Object.fromEntries(url.searchParams),
      headers: { ...request.headers },
      timestamp: Date.now(),
    };
    if (request.body !== undefined) {
      recorded.body = await collectBody(request.body);
    }
    this.requests.push(recorded);

    const scripted = this.queue.shift();
    if (scripted instanceof Error) {
      throw scripted;
    }
    if (scripted) {
      return scripted;
    }
    if (this.handler) {
      return this.handler(recorded);
    }
    return { status: 200 };
  }

  private streamOf(body: Uint8Array): ReadableStream<Uint8Array> {
    const pieceSize = this.streamPieceSize ?? Math.max(body.length, 1);
    let offset = 0;

    return new ReadableStream<Uint8Array>({
      pull: (controller) => {
        if (offset >= body.length) {
          controller.close();
          return;
        }
        controller.enqueue(body.slice(offset, offset + pieceSize));
        offset += pieceSize;
      },
      cancel: () => {
        this.cancelled++;
      },
    });
  }
}

/**
 * Strips everything up to and including the API version segment
 */
function apiPath(pathname: string): string {
  const match = /\/v1\/(.*)$/.exec(pathname);
  return decodeURIComponent(match?.[1] ?? pathname.replace(/^\/+/, ''));
}

function toBytes(body: Uint8Array | string | undefined): Uint8Array {
  if (body === undefined) {
    return new Uint8Array(0);
  }
  return typeof body === 'string' ? new TextEncoder().encode(body) : body;
}

/**
 * Reads a request body to completion
 */
export async function collectBody(body: RequestBody): Promise<Uint8Array> {
  if (typeof body === 'string') {
    return new TextEncoder().encode(body);
  }
  if (body instanceof Uint8Array) {
    return body;
  }

  const chunks: Uint8Array[] = [];
  for await (const chunk of body) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}
