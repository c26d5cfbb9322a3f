/**
 * DeleteObject implementation for the AIStore client
 * @module aistore-client/objects/delete
 */

import type { Bucket } from '../bucket/bucket.js';
import { objectPath } from './utils.js';

/**
 * Deletes an object.
 *
 * @throws {ObjectError} With code `NotFound` if the object does not exist
 */
export async function deleteObject(bucket: Bucket, objectName: string): Promise<void> {
  await bucket.client.request('DELETE', objectPath(bucket.name, objectName), {
    params: bucket.qparam,
  });
}
