/**
 * HeadObject implementation for the AIStore client
 * @module aistore-client/objects/head
 */

import type { Bucket } from '../bucket/bucket.js';
import { objectPath } from './utils.js';

/**
 * Requests object properties.
 *
 * @returns Response headers carrying the object properties
 * @throws {ObjectError} With code `NotFound` if the object does not exist
 */
export async function headObject(bucket: Bucket, objectName: string): Promise<Headers> {
  const response = await bucket.client.request('HEAD', objectPath(bucket.name, objectName), {
    params: bucket.qparam,
  });
  return response.headers;
}
