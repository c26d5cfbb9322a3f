/**
 * Streamed object content
 * @module aistore-client/objects/stream
 */

import type { ReadableStreamDefaultReader } from 'stream/web';
import { TransferError } from '../errors/index.js';

/**
 * Values an ObjectStream is built from
 */
export interface ObjectStreamInit {
  contentLength: number;
  eTag: string;
  eTagType: string;
  chunkSize: number;
  body: ReadableStream<Uint8Array>;
}

/**
 * Content of an object as returned by a GET.
 *
 * Iterating yields chunks of exactly `chunkSize` bytes, the last one
 * possibly shorter. The body can be consumed once, by iteration, by
 * `readAll()` or by `close()`.
 *
 * @example
 * ```typescript
 * const stream = await object.getObject({ chunkSize: 1024 * 1024 });
 * for await (const chunk of stream) {
 *   hash.update(chunk);
 * }
 * ```
 */
export class ObjectStream implements AsyncIterable<Uint8Array> {
  /** Value of Content-Length, 0 when unknown */
  readonly contentLength: number;
  /** Checksum value, empty when the cluster sent none */
  readonly eTag: string;
  /** Checksum algorithm, empty when the cluster sent none */
  readonly eTagType: string;
  readonly chunkSize: number;

  private readonly body: ReadableStream<Uint8Array>;
  private consumed = false;

  constructor(init: ObjectStreamInit) {
    this.contentLength = init.contentLength;
    this.eTag = init.eTag;
    this.eTagType = init.eTagType;
    this.chunkSize = init.chunkSize;
    this.body = init.body;
  }

  /**
   * Whether the body has been read or closed
   */
  get isConsumed(): boolean {
    return this.consumed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    const reader = this.acquireReader();
    let pending: Uint8Array = new Uint8Array(0);
    let transferred = 0;
    let settled = false;

    try {
      for (;;) {
        const result = await this.read(reader, transferred);
        if (result.done) {
          break;
        }

        pending = pending.length === 0 ? result.value : Buffer.concat([pending, result.value]);
        while (pending.length >= this.chunkSize) {
          const chunk = pending.subarray(0, this.chunkSize);
          pending = pending.subarray(this.chunkSize);
          transferred += chunk.length;
          yield chunk;
        }
      }

      settled = true;
      if (pending.length > 0) {
        yield pending;
      }
    } catch (error) {
      settled = true;
      throw error;
    } finally {
      // Stopped early: drop the rest of the body
      if (!settled) {
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }

  /**
   * Reads the remaining body into a single buffer.
   *
   * @throws {TransferError} If the stream was already consumed or the
   *   connection breaks mid-body
   */
  async readAll(): Promise<Buffer> {
    const reader = this.acquireReader();
    const chunks: Uint8Array[] = [];
    let transferred = 0;

    try {
      for (;;) {
        const result = await this.read(reader, transferred);
        if (result.done) {
          break;
        }
        chunks.push(result.value);
        transferred += result.value.length;
      }
    } finally {
      reader.releaseLock();
    }

    return Buffer.concat(chunks);
  }

  /**
   * Discards the body and releases the connection. No-op once consumed.
   */
  async close(): Promise<void> {
    if (this.consumed) {
      return;
    }
    this.consumed = true;
    await this.body.cancel();
  }

  private acquireReader(): ReadableStreamDefaultReader<Uint8Array> {
    if (this.consumed) {
      throw TransferError.streamConsumed();
    }
    this.consumed = true;
    return this.body.getReader();
  }

  private async read(
    reader: ReadableStreamDefaultReader<Uint8Array>,
    transferred: number
  ) {
    try {
      return await reader.read();
    } catch (error) {
      throw TransferError.streamInterrupted(
        transferred,
        error instanceof Error ? error : undefined
      );
    }
  }
}
