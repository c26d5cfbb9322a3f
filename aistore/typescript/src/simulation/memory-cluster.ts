/**
 * In-memory emulation of an AIStore cluster
 * @module aistore-client/simulation/memory-cluster
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';
import type { MockResponse, RecordedRequest, StoredObject } from './types.js';

const CHECKSUM_TYPE = 'sha256';

/**
 * Computes the checksum the cluster stores with an object
 */
export function computeChecksum(data: Uint8Array): string {
  return bytesToHex(sha256(data));
}

function errorResponse(status: number, message: string): MockResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify({ message, status }),
  };
}

function readAction(body: Uint8Array | undefined): string | undefined {
  if (!body || body.length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(new TextDecoder().decode(body));
    if (typeof parsed === 'object' && parsed !== null && 'action' in parsed) {
      return typeof parsed.action === 'string' ? parsed.action : undefined;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Buckets and objects held in memory, answering requests the way a proxy
 * would. Pass `cluster.handler` to a MockTransport.
 *
 * @example
 * ```typescript
 * const cluster = createInMemoryCluster();
 * cluster.createBucket('images');
 * const transport = new MockTransport({ handler: cluster.handler });
 * ```
 */
export class InMemoryCluster {
  private readonly buckets = new Map<string, Map<string, StoredObject>>();

  /**
   * Request handler bound to this cluster
   */
  readonly handler = (request: RecordedRequest): MockResponse => this.handle(request);

  createBucket(name: string): void {
    if (!this.buckets.has(name)) {
      this.buckets.set(name, new Map());
    }
  }

  hasBucket(name: string): boolean {
    return this.buckets.has(name);
  }

  /**
   * Stores an object directly, creating the bucket if needed
   */
  putObject(bucket: string, name: string, data: Uint8Array | string): StoredObject {
    this.createBucket(bucket);
    const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
    const stored: StoredObject = {
      data: bytes,
      checksumType: CHECKSUM_TYPE,
      checksumValue: computeChecksum(bytes),
    };
    this.buckets.get(bucket)?.set(name, stored);
    return stored;
  }

  getObject(bucket: string, name: string): StoredObject | undefined {
    return this.buckets.get(bucket)?.get(name);
  }

  listObjects(bucket: string): string[] {
    return [...(this.buckets.get(bucket)?.keys() ?? [])].sort();
  }

  handle(request: RecordedRequest): MockResponse {
    const [kind, bucket, ...rest] = request.path.split('/');

    if (kind === 'health' && request.method === 'GET') {
      return { status: 200 };
    }

    if (bucket === undefined || bucket === '') {
      return errorResponse(400, `invalid request path: ${request.path}`);
    }

    if (kind === 'buckets') {
      return this.handleBucket(request, bucket);
    }

    if (kind === 'objects' && rest.length > 0) {
      return this.handleObject(request, bucket, rest.join('/'));
    }

    return errorResponse(400, `invalid request path: ${request.path}`);
  }

  private handleBucket(request: RecordedRequest, bucket: string): MockResponse {
    const exists = this.buckets.has(bucket);

    switch (request.method) {
      case 'HEAD':
        return exists
          ? { status: 200, headers: { 'ais-bucket-provider': request.params.provider ?? 'ais' } }
          : errorResponse(404, `bucket "${bucket}" does not exist`);

      case 'POST':
        if (readAction(request.body) !== 'create-bck') {
          return errorResponse(400, 'invalid action');
        }
        if (exists) {
          return errorResponse(409, `bucket "${bucket}" already exists`);
        }
        this.buckets.set(bucket, new Map());
        return { status: 200 };

      case 'DELETE':
        if (readAction(request.body) !== 'destroy-bck') {
          return errorResponse(400, 'invalid action');
        }
        if (!exists) {
          return errorResponse(404, `bucket "${bucket}" does not exist`);
        }
        this.buckets.delete(bucket);
        return { status: 200 };

      default:
        return errorResponse(405, `method ${request.method} not allowed`);
    }
  }

  private handleObject(request: RecordedRequest, bucket: string, name: string): MockResponse {
    const objects = this.buckets.get(bucket);
    if (!objects) {
      return errorResponse(404, `bucket "${bucket}" does not exist`);
    }

    if (request.method === 'PUT') {
      const stored = this.putObject(bucket, name, request.body ?? new Uint8Array(0));
      return { status: 200, headers: checksumHeaders(stored) };
    }

    const stored = objects.get(name);
    if (!stored) {
      return errorResponse(404, `object "${bucket}/${name}" does not exist`);
    }

    switch (request.method) {
      case 'HEAD':
        return {
          status: 200,
          headers: { 'content-length': String(stored.data.length), ...checksumHeaders(stored) },
        };

      case 'GET':
        if (request.params.archpath) {
          return errorResponse(400, `"${bucket}/${name}" is not an archive`);
        }
        return {
          status: 200,
          headers: { 'content-length': String(stored.data.length), ...checksumHeaders(stored) },
          body: stored.data,
        };

      case 'DELETE':
        objects.delete(name);
        return { status: 200 };

      default:
        return errorResponse(405, `method ${request.method} not allowed`);
    }
  }
}

function checksumHeaders(stored: StoredObject): Record<string, string> {
  return {
    'ais-checksum-type': stored.checksumType,
    'ais-checksum-value': stored.checksumValue,
  };
}

/**
 * Creates an empty in-memory cluster
 */
export function createInMemoryCluster(): InMemoryCluster {
  return new InMemoryCluster();
}
