/**
 * Object operations for the AIStore client
 * @module aistore-client/objects
 */

export { AisObject } from './object.js';
export { ObjectStream, type ObjectStreamInit } from './stream.js';
export { headObject } from './head.js';
export { getObject, type GetObjectOptions } from './get.js';
export { putObject } from './put.js';
export { deleteObject } from './delete.js';
export {
  HEADER_CHECKSUM_TYPE,
  HEADER_CHECKSUM_VALUE,
  QPARAM_ARCHPATH,
  objectPath,
  parseContentLength,
} from './utils.js';
