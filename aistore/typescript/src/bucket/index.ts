/**
 * Bucket module for the AIStore client
 * @module aistore-client/bucket
 */

export { Bucket, formatNamespace } from './bucket.js';
export { parallelMap } from './concurrency.js';
export { listFiles, type LocalFile } from './files.js';
export {
  PROVIDERS,
  type Provider,
  type Namespace,
  type BucketOptions,
  type PutFilesOptions,
  type PutFilesResult,
  type UploadedFile,
  type FailedUpload,
} from './types.js';
