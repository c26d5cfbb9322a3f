/**
 * Bucket handle for the AIStore client
 * @module aistore-client/bucket
 */

import type { QueryParams, RequestDispatcher } from '../client/types.js';
import { encodePath } from '../client/http.js';
import { ValidationError, isNotFoundError } from '../errors/index.js';
import { getLogger } from '../observability/index.js';
import { AisObject } from '../objects/index.js';
import type {
  BucketOptions,
  FailedUpload,
  Namespace,
  Provider,
  PutFilesOptions,
  PutFilesResult,
  UploadedFile,
} from './types.js';
import { parallelMap } from './concurrency.js';
import { listFiles, type LocalFile } from './files.js';

/**
 * Serializes a namespace into its query parameter form, `@uuid#name`.
 * Returns undefined for the global namespace.
 */
export function formatNamespace(namespace: Namespace | undefined): string | undefined {
  if (!namespace) {
    return undefined;
  }
  const uuid = namespace.uuid ?? '';
  const name = namespace.name ?? '';
  if (uuid === '' && name === '') {
    return undefined;
  }
  return `@${uuid}#${name}`;
}

/**
 * A bucket bound to a client.
 *
 * Immutable; every operation issues a fresh request through the client.
 */
export class Bucket {
  readonly client: RequestDispatcher;
  readonly name: string;
  readonly provider: Provider;
  readonly namespace?: Namespace;

  constructor(client: RequestDispatcher, name: string, options: BucketOptions = {}) {
    if (name === '' || name === '.' || name === '..' || name.includes('/')) {
      throw ValidationError.invalidBucketName(name);
    }

    this.client = client;
    this.name = name;
    this.provider = options.provider ?? 'ais';
    if (options.namespace) {
      this.namespace = { ...options.namespace };
    }
  }

  /**
   * Default query parameters for requests on this bucket.
   *
   * A new record is returned on every access, so callers may extend it.
   */
  get qparam(): QueryParams {
    const params: QueryParams = { provider: this.provider };
    const namespace = formatNamespace(this.namespace);
    if (namespace !== undefined) {
      params.namespace = namespace;
    }
    return params;
  }

  /**
   * Returns a handle to an object in this bucket. No request is made.
   */
  object(name: string): AisObject {
    return new AisObject(this, name);
  }

  /**
   * Requests bucket properties.
   */
  async head(): Promise<Headers> {
    const response = await this.client.request('HEAD', this.path(), { params: this.qparam });
    return response.headers;
  }

  /**
   * Checks whether the bucket exists. Errors other than 404 propagate.
   */
  async exists(): Promise<boolean> {
    try {
      await this.head();
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Creates the bucket. Only `ais` buckets can be created.
   *
   * @throws {ValidationError} For any other provider; no request is sent
   * @throws {BucketError} With code `AlreadyExists` if the bucket exists
   */
  async create(): Promise<void> {
    if (this.provider !== 'ais') {
      throw ValidationError.invalidParameter(
        'provider',
        `Only ais buckets can be created, got provider: ${this.provider}`
      );
    }

    await this.client.request('POST', this.path(), {
      params: this.qparam,
      json: { action: 'create-bck' },
    });
  }

  /**
   * Destroys the bucket and all its objects.
   */
  async delete(): Promise<void> {
    await this.client.request('DELETE', this.path(), {
      params: this.qparam,
      json: { action: 'destroy-bck' },
    });
  }

  /**
   * Uploads every file of a local directory as an object.
   *
   * Object names are `prefix` followed by the file's path relative to
   * `localDir`. Failed uploads are collected instead of aborting the rest.
   *
   * @throws {ValidationError} If the directory holds no files or the
   *   concurrency is not a positive integer
   *
   * @example
   * ```typescript
   * const result = await bucket.putFiles('./dataset', { prefix: 'train/', recursive: true });
   * console.log(result.uploaded.length, 'files,', result.totalBytes, 'bytes');
   * ```
   */
  async putFiles(localDir: string, options: PutFilesOptions = {}): Promise<PutFilesResult> {
    const concurrency = options.concurrency ?? this.client.getConfig().uploadConcurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw ValidationError.invalidParameter(
        'concurrency',
        `concurrency must be a positive integer, got: ${concurrency}`
      );
    }

    const files = await listFiles(localDir, options.recursive ?? false);
    if (files.length === 0) {
      throw new ValidationError({
        message: `No files to PUT in ${localDir}`,
        code: 'NoFilesToPut',
        details: { localDir },
      });
    }

    const prefix = options.prefix ?? '';
    const logger = getLogger();

    const outcomes = await parallelMap(files, concurrency, (file) =>
      this.uploadFile(file, `${prefix}${file.relativePath}`)
    );

    const uploaded: UploadedFile[] = [];
    const failed: FailedUpload[] = [];
    for (const outcome of outcomes) {
      if ('error' in outcome) {
        logger.warn('PUT failed', {
          bucket: this.name,
          object: outcome.objectName,
          path: outcome.path,
          error: outcome.error.message,
        });
        failed.push(outcome);
      } else {
        uploaded.push(outcome);
      }
    }

    const totalBytes = uploaded.reduce((sum, file) => sum + file.size, 0);
    logger.info('PUT files complete', {
      bucket: this.name,
      uploaded: uploaded.length,
      failed: failed.length,
      totalBytes,
    });

    return { uploaded, failed, totalBytes };
  }

  private async uploadFile(
    file: LocalFile,
    objectName: string
  ): Promise<UploadedFile | FailedUpload> {
    try {
      await this.object(objectName).putObject(file.path);
      return { path: file.path, objectName, size: file.size };
    } catch (error) {
      return {
        path: file.path,
        objectName,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  private path(): string {
    return `buckets/${encodePath(this.name)}`;
  }
}
