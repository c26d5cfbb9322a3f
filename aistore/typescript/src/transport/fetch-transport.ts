/**
 * Fetch-based HTTP transport implementation for the AIStore client
 * @module aistore-client/transport/fetch-transport
 */

import type {
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
} from './types.js';
import { isStreamingBody } from './types.js';
import { AisError, NetworkError } from '../errors/index.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Timeout in milliseconds; see FetchTransport */
  timeout: number;
}

/**
 * Fetch-based HTTP transport.
 *
 * The timeout covers the wait for response headers, plus the body for
 * buffered responses. While a streamed request body is being sent it acts
 * as an idle timeout, restarted by every chunk.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timer = new RequestTimer(this.options.timeout);

    try {
      const response = await this.makeFetchRequest(request, timer);
      const arrayBuffer = await response.arrayBuffer();

      return {
        status: response.status,
        headers: response.headers,
        body: new Uint8Array(arrayBuffer),
      };
    } catch (error) {
      throw this.handleError(error, request);
    } finally {
      timer.clear();
    }
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const timer = new RequestTimer(this.options.timeout);

    try {
      const response = await this.makeFetchRequest(request, timer);

      // HEAD and 204 responses carry no body stream
      const body = response.body ?? new ReadableStream<Uint8Array>({
        start(streamController) {
          streamController.close();
        },
      });

      return {
        status: response.status,
        headers: response.headers,
        body,
      };
    } catch (error) {
      throw this.handleError(error, request);
    } finally {
      timer.clear();
    }
  }

  /**
   * Closes the transport (no-op for fetch-based transport)
   */
  async close(): Promise<void> {
    // Fetch API doesn't require explicit cleanup
  }

  private async makeFetchRequest(request: HttpRequest, timer: RequestTimer): Promise<Response> {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      signal: timer.signal,
    };

    if (request.body !== undefined) {
      if (isStreamingBody(request.body)) {
        init.body = withProgress(request.body, timer);
        init.duplex = 'half';
      } else {
        init.body = request.body;
      }
    }

    return fetch(request.url, init);
  }

  /**
   * Maps a fetch failure to a NetworkError
   */
  private handleError(error: unknown, request: HttpRequest): Error {
    if (error instanceof AisError) {
      return error;
    }

    if (!(error instanceof Error)) {
      return NetworkError.connectionFailed(String(error));
    }

    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return NetworkError.timeout(this.options.timeout);
    }

    const code = errorCode(error.cause) ?? errorCode(error);
    const message = error.message.toLowerCase();

    if (code === 'ENOTFOUND' || code === 'EAI_AGAIN' || message.includes('enotfound')) {
      return NetworkError.dnsError(request.url, error);
    }

    if (
      code === 'ECONNREFUSED' ||
      code === 'ECONNRESET' ||
      message.includes('econnrefused') ||
      message.includes('econnreset')
    ) {
      return NetworkError.connectionReset(error);
    }

    return NetworkError.connectionFailed(error.message, error);
  }
}

/**
 * Aborts a request once `timeout` ms pass without progress
 */
class RequestTimer {
  private readonly controller = new AbortController();
  private readonly timeout: number;
  private timeoutId: ReturnType<typeof setTimeout>;

  constructor(timeout: number) {
    this.timeout = timeout;
    this.timeoutId = this.arm();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Restarts the countdown
   */
  rearm(): void {
    clearTimeout(this.timeoutId);
    this.timeoutId = this.arm();
  }

  clear(): void {
    clearTimeout(this.timeoutId);
  }

  private arm(): ReturnType<typeof setTimeout> {
    return setTimeout(() => this.controller.abort(), this.timeout);
  }
}

/**
 * Passes a streamed body through, restarting the timer for every chunk
 * and once more when the body ends, so the timeout bounds upload stalls
 * and then the wait for response headers.
 */
async function* withProgress(
  body: AsyncIterable<Uint8Array>,
  timer: RequestTimer
): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const chunk of body) {
    timer.rearm();
    yield chunk;
  }
  timer.rearm();
}

/**
 * Reads a system error code such as ECONNREFUSED, if present
 */
function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    return typeof value.code === 'string' ? value.code : undefined;
  }
  return undefined;
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number = 30000): HttpTransport {
  return new FetchTransport({ timeout });
}
