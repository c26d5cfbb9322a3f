/**
 * Utility functions for object operations
 * @module aistore-client/objects/utils
 */

import { encodePath } from '../client/http.js';

/** Checksum value of the object as stored by the cluster */
export const HEADER_CHECKSUM_VALUE = 'ais-checksum-value';

/** Checksum algorithm of the object, e.g. `xxhash` */
export const HEADER_CHECKSUM_TYPE = 'ais-checksum-type';

/** Query parameter naming a file inside an archive object */
export const QPARAM_ARCHPATH = 'archpath';

/**
 * Builds the API path for an object.
 *
 * @example
 * ```typescript
 * objectPath('images', 'cat.png'); // 'objects/images/cat.png'
 * objectPath('data', 'my file.txt'); // 'objects/data/my%20file.txt'
 * ```
 */
export function objectPath(bucketName: string, objectName: string): string {
  return `objects/${encodePath(bucketName)}/${encodePath(objectName)}`;
}

/**
 * Parses a Content-Length header; absent or non-decimal values yield 0
 */
export function parseContentLength(value: string | null): number {
  if (value === null) {
    return 0;
  }
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : 0;
}
