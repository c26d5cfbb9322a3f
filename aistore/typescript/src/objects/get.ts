/**
 * GetObject implementation for the AIStore client
 * @module aistore-client/objects/get
 */

import type { Bucket } from '../bucket/bucket.js';
import { ValidationError } from '../errors/index.js';
import { ObjectStream } from './stream.js';
import {
  HEADER_CHECKSUM_TYPE,
  HEADER_CHECKSUM_VALUE,
  QPARAM_ARCHPATH,
  objectPath,
  parseContentLength,
} from './utils.js';

/**
 * Options for reading an object
 */
export interface GetObjectOptions {
  /** File inside an archive object to extract; empty reads the whole object */
  archpath?: string;
  /** Size of iterated chunks; defaults to the configured download chunk size */
  chunkSize?: number;
}

/**
 * Reads an object as a stream.
 *
 * The returned stream holds the open response; the caller must consume or
 * close it.
 *
 * @throws {ValidationError} If chunkSize is not a positive integer
 * @throws {ObjectError} With code `NotFound` if the object does not exist
 */
export async function getObject(
  bucket: Bucket,
  objectName: string,
  options: GetObjectOptions = {}
): Promise<ObjectStream> {
  const chunkSize = options.chunkSize ?? bucket.client.getConfig().downloadChunkSize;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw ValidationError.invalidParameter(
      'chunkSize',
      `chunkSize must be a positive integer, got: ${chunkSize}`
    );
  }

  const params = { ...bucket.qparam, [QPARAM_ARCHPATH]: options.archpath ?? '' };
  const response = await bucket.client.requestStream('GET', objectPath(bucket.name, objectName), {
    params,
  });

  return new ObjectStream({
    contentLength: parseContentLength(response.headers.get('content-length')),
    eTag: response.headers.get(HEADER_CHECKSUM_VALUE) ?? '',
    eTagType: response.headers.get(HEADER_CHECKSUM_TYPE) ?? '',
    chunkSize,
    body: response.body,
  });
}
