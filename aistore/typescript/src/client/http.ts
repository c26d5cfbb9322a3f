/**
 * URL and body helpers for the dispatcher
 * @module aistore-client/client/http
 */

import type { ErrorResource } from '../errors/index.js';
import type { QueryParams } from './types.js';

/**
 * Builds the full request URL from the API base, a relative path and
 * query parameters.
 *
 * @example
 * ```typescript
 * buildUrl('http://localhost:8080/v1/', 'objects/images/cat.png', { provider: 'ais' });
 * // 'http://localhost:8080/v1/objects/images/cat.png?provider=ais'
 * ```
 */
export function buildUrl(apiUrl: string, path: string, params: QueryParams = {}): string {
  const url = `${apiUrl}${path.replace(/^\/+/, '')}`;

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, value);
    }
  }

  const queryString = search.toString();
  return queryString ? `${url}?${queryString}` : url;
}

/**
 * Encodes each segment of a path, preserving `/` separators
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/**
 * Derives the addressed bucket and object from a request path, used to
 * pick the error category for 404 and 409 responses.
 */
export function resourceFromPath(path: string): ErrorResource {
  const segments = path.replace(/^\/+/, '').split('/');
  const [kind, bucket, ...rest] = segments;

  if (bucket === undefined || bucket === '') {
    return {};
  }

  if (kind === 'buckets') {
    return { bucket: decodeURIComponent(bucket) };
  }

  if (kind === 'objects') {
    const object = rest.join('/');
    return object === ''
      ? { bucket: decodeURIComponent(bucket) }
      : { bucket: decodeURIComponent(bucket), object: decodeURIComponent(object) };
  }

  return {};
}

/**
 * Reads a response stream to completion and decodes it as UTF-8
 */
export async function readStreamText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  const reader = stream.getReader();
  let text = '';

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      text += decoder.decode(value, { stream: true });
    }
  } finally {
    reader.releaseLock();
  }

  return text + decoder.decode();
}
