/**
 * PutObject implementation for the AIStore client
 * @module aistore-client/objects/put
 */

import { open } from 'fs/promises';
import type { Bucket } from '../bucket/bucket.js';
import { objectPath } from './utils.js';

/**
 * Uploads a local file as the object's content.
 *
 * The file is opened before anything is sent, so filesystem errors surface
 * as the native Node.js error. The handle is closed on every exit path.
 *
 * @returns Response headers carrying the stored object's properties
 */
export async function putObject(
  bucket: Bucket,
  objectName: string,
  localPath: string
): Promise<Headers> {
  const handle = await open(localPath, 'r');

  try {
    const stats = await handle.stat();
    if (stats.isDirectory()) {
      const error: NodeJS.ErrnoException = new Error(
        `EISDIR: illegal operation on a directory, read '${localPath}'`
      );
      error.code = 'EISDIR';
      error.syscall = 'read';
      error.path = localPath;
      throw error;
    }

    const response = await bucket.client.request('PUT', objectPath(bucket.name, objectName), {
      params: bucket.qparam,
      headers: { 'content-length': String(stats.size) },
      body: handle.createReadStream({ autoClose: false }),
    });
    return response.headers;
  } finally {
    await handle.close();
  }
}
