/**
 * Bucket type definitions for the AIStore client
 * @module aistore-client/bucket/types
 */

/**
 * Backend providers a bucket can live on
 */
export const PROVIDERS = ['ais', 'aws', 'gcp', 'az', 'hdfs', 'ht'] as const;

export type Provider = (typeof PROVIDERS)[number];

/**
 * Bucket namespace, addressing a remote cluster or a named scope
 */
export interface Namespace {
  uuid?: string;
  name?: string;
}

/**
 * Options for a bucket handle
 */
export interface BucketOptions {
  /** Defaults to `ais` */
  provider?: Provider;
  namespace?: Namespace;
}

/**
 * Options for uploading a local directory
 */
export interface PutFilesOptions {
  /** Prepended to every object name */
  prefix?: string;
  /** Descend into subdirectories */
  recursive?: boolean;
  /** Maximum uploads in flight; defaults to the configured upload concurrency */
  concurrency?: number;
}

export interface UploadedFile {
  /** Local file path */
  path: string;
  objectName: string;
  size: number;
}

export interface FailedUpload {
  /** Local file path */
  path: string;
  objectName: string;
  error: Error;
}

/**
 * Outcome of a directory upload
 */
export interface PutFilesResult {
  uploaded: UploadedFile[];
  failed: FailedUpload[];
  /** Sum of the sizes of uploaded files */
  totalBytes: number;
}
