/**
 * Object handle for the AIStore client
 * @module aistore-client/objects/object
 */

import type { Bucket } from '../bucket/bucket.js';
import { ValidationError } from '../errors/index.js';
import { headObject } from './head.js';
import { getObject, type GetObjectOptions } from './get.js';
import { putObject } from './put.js';
import { deleteObject } from './delete.js';
import type { ObjectStream } from './stream.js';

/**
 * An object of a bucket bound to a client.
 *
 * The handle holds no state beyond its bucket and name; each method issues
 * one request. Names may not contain `.` or `..` segments, which URL
 * resolution would collapse into another resource.
 *
 * @example
 * ```typescript
 * const object = client.bucket('images').object('cat.png');
 * await object.putObject('./cat.png');
 * const props = await object.headObject();
 * console.log(props.get('ais-checksum-value'));
 * ```
 */
export class AisObject {
  private readonly _bucket: Bucket;
  private readonly _name: string;

  constructor(bucket: Bucket, name: string) {
    if (name === '' || name.split('/').some((segment) => segment === '.' || segment === '..')) {
      throw ValidationError.invalidObjectName(name);
    }
    this._bucket = bucket;
    this._name = name;
  }

  /**
   * The bucket this object belongs to
   */
  get bucket(): Bucket {
    return this._bucket;
  }

  get name(): string {
    return this._name;
  }

  /**
   * Requests object properties.
   */
  headObject(): Promise<Headers> {
    return headObject(this._bucket, this._name);
  }

  /**
   * Reads the object, or a single file of an archive object with `archpath`.
   */
  getObject(options?: GetObjectOptions): Promise<ObjectStream> {
    return getObject(this._bucket, this._name, options);
  }

  /**
   * Uploads a local file as this object.
   */
  putObject(localPath: string): Promise<Headers> {
    return putObject(this._bucket, this._name, localPath);
  }

  deleteObject(): Promise<void> {
    return deleteObject(this._bucket, this._name);
  }
}
