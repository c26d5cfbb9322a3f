/**
 * Error categories for the AIStore client
 * @module aistore-client/errors/categories
 */

import { AisError, type AisErrorParams } from './error.js';

type CategoryParams = Omit<AisErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Configuration and client lifecycle errors
 */
export class ConfigError extends AisError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'config_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Missing endpoint in configuration
   */
  static missingEndpoint(message?: string): ConfigError {
    return new ConfigError({
      message: message ?? 'AIStore endpoint is required but not provided',
      code: 'MISSING_ENDPOINT',
    });
  }

  /**
   * Invalid endpoint URL
   */
  static invalidEndpoint(endpoint: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid endpoint URL: ${endpoint}`,
      code: 'INVALID_ENDPOINT',
      details: { endpoint },
    });
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }

  /**
   * Operation attempted on a closed client
   */
  static clientClosed(): ConfigError {
    return new ConfigError({
      message: 'Client is closed',
      code: 'CLIENT_CLOSED',
    });
  }
}

/**
 * Request validation errors raised before anything is sent
 */
export class ValidationError extends AisError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'validation_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static invalidParameter(paramName: string, message?: string): ValidationError {
    return new ValidationError({
      message: message ?? `Invalid parameter: ${paramName}`,
      code: 'InvalidParameter',
      details: { paramName },
    });
  }

  static invalidBucketName(bucketName: string): ValidationError {
    return new ValidationError({
      message: `Invalid bucket name: '${bucketName}'`,
      code: 'InvalidBucketName',
      details: { bucketName },
    });
  }

  static invalidObjectName(objectName: string): ValidationError {
    return new ValidationError({
      message: `Invalid object name: '${objectName}'`,
      code: 'InvalidObjectName',
      details: { objectName },
    });
  }
}

/**
 * Network and connectivity errors
 */
export class NetworkError extends AisError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static connectionFailed(message?: string, cause?: Error): NetworkError {
    return new NetworkError({
      message: message ?? 'Failed to establish connection to AIStore',
      code: 'CONNECTION_FAILED',
      cause,
    });
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'REQUEST_TIMEOUT',
      details: { timeoutMs },
    });
  }

  static dnsError(url: string, cause?: Error): NetworkError {
    return new NetworkError({
      message: `Failed to resolve host for ${url}`,
      code: 'DNS_ERROR',
      details: { url },
      cause,
    });
  }

  static connectionReset(cause?: Error): NetworkError {
    return new NetworkError({
      message: 'Connection was refused or reset by the peer',
      code: 'CONNECTION_RESET',
      cause,
    });
  }
}

/**
 * Server-side errors (5xx, throttling)
 */
export class ServerError extends AisError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'server_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }

  static internalError(message?: string): ServerError {
    return new ServerError({
      message: message ?? 'AIStore encountered an internal error',
      code: 'InternalError',
      status: 500,
    });
  }

  static serviceUnavailable(message?: string): ServerError {
    return new ServerError({
      message: message ?? 'AIStore is temporarily unavailable',
      code: 'ServiceUnavailable',
      status: 503,
    });
  }

  static tooManyRequests(message?: string): ServerError {
    return new ServerError({
      message: message ?? 'Too many requests',
      code: 'TooManyRequests',
      status: 429,
    });
  }
}

/**
 * Object-level errors
 */
export class ObjectError extends AisError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'object_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ObjectError';
    Object.setPrototypeOf(this, ObjectError.prototype);
  }

  /**
   * Object does not exist (404)
   */
  static notFound(bucket: string, object: string, message?: string): ObjectError {
    return new ObjectError({
      message: message ?? `Object not found: ${bucket}/${object}`,
      code: 'NotFound',
      status: 404,
      details: { bucket, object },
    });
  }

  static preconditionFailed(message?: string): ObjectError {
    return new ObjectError({
      message: message ?? 'Precondition failed',
      code: 'PreconditionFailed',
      status: 412,
    });
  }

  static entityTooLarge(message?: string): ObjectError {
    return new ObjectError({
      message: message ?? 'Object is too large',
      code: 'EntityTooLarge',
      status: 413,
    });
  }

  static invalidRange(message?: string): ObjectError {
    return new ObjectError({
      message: message ?? 'Requested range is not satisfiable',
      code: 'InvalidRange',
      status: 416,
    });
  }
}

/**
 * Bucket-level errors
 */
export class BucketError extends AisError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'bucket_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'BucketError';
    Object.setPrototypeOf(this, BucketError.prototype);
  }

  static notFound(bucket: string, message?: string): BucketError {
    return new BucketError({
      message: message ?? `Bucket not found: ${bucket}`,
      code: 'NotFound',
      status: 404,
      details: { bucket },
    });
  }

  static alreadyExists(bucket: string, message?: string): BucketError {
    return new BucketError({
      message: message ?? `Bucket already exists: ${bucket}`,
      code: 'AlreadyExists',
      status: 409,
      details: { bucket },
    });
  }
}

/**
 * Errors while moving object bytes
 */
export class TransferError extends AisError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'transfer_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'TransferError';
    Object.setPrototypeOf(this, TransferError.prototype);
  }

  /**
   * The response body was already read or closed
   */
  static streamConsumed(): TransferError {
    return new TransferError({
      message: 'Object stream has already been consumed or closed',
      code: 'STREAM_CONSUMED',
    });
  }

  static streamInterrupted(bytesTransferred: number, cause?: Error): TransferError {
    return new TransferError({
      message: `Stream was interrupted after transferring ${bytesTransferred} bytes`,
      code: 'STREAM_INTERRUPTED',
      isRetryable: true,
      details: { bytesTransferred },
      cause,
    });
  }
}
