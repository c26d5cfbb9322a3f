/**
 * Error mapping utilities for the AIStore client
 * @module aistore-client/errors/mapping
 */

import { z } from 'zod';
import { AisError } from './error.js';
import {
  BucketError,
  NetworkError,
  ObjectError,
  ServerError,
  ValidationError,
} from './categories.js';

/**
 * Resource addressed by a failed request, derived from its path
 */
export interface ErrorResource {
  bucket?: string;
  object?: string;
}

/**
 * JSON error body returned by AIStore proxies and targets
 */
const errorBodySchema = z
  .object({
    message: z.string(),
    status: z.number().int().optional(),
  })
  .passthrough();

/**
 * Extracts a human-readable message from an error response body.
 *
 * AIStore answers with a JSON document carrying `message`; anything else is
 * used as plain text. Returns undefined for an empty body.
 */
export function parseErrorMessage(body: string): string | undefined {
  const text = body.trim();
  if (text === '') {
    return undefined;
  }

  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return parsed.data.message;
    }
  } catch {
    // Not JSON; fall through to the raw text
  }

  return text;
}

/**
 * Maps an HTTP status code to the matching AisError.
 *
 * 404 is resolved against the addressed resource: an object path yields an
 * `ObjectError`, a bucket path a `BucketError`.
 */
export function mapHttpStatusToError(
  status: number,
  message?: string,
  resource: ErrorResource = {}
): AisError {
  const errorMessage = message ?? getDefaultMessageForStatus(status);

  switch (status) {
    case 400:
      return new ValidationError({
        message: errorMessage,
        code: 'BadRequest',
        status,
      });

    case 401:
    case 403:
      return new AisError({
        type: 'auth_error',
        message: errorMessage,
        code: status === 401 ? 'Unauthorized' : 'Forbidden',
        status,
        isRetryable: false,
      });

    case 404:
      if (resource.bucket !== undefined && resource.object !== undefined) {
        return ObjectError.notFound(resource.bucket, resource.object, message);
      }
      if (resource.bucket !== undefined) {
        return BucketError.notFound(resource.bucket, message);
      }
      return new AisError({
        type: 'not_found',
        message: errorMessage,
        code: 'NotFound',
        status,
        isRetryable: false,
      });

    case 408:
      return new NetworkError({
        message: errorMessage,
        code: 'REQUEST_TIMEOUT',
        status,
      });

    case 409:
      if (resource.bucket !== undefined && resource.object === undefined) {
        return BucketError.alreadyExists(resource.bucket, message);
      }
      return new AisError({
        type: 'conflict',
        message: errorMessage,
        code: 'Conflict',
        status,
        isRetryable: false,
      });

    case 412:
      return ObjectError.preconditionFailed(message);

    case 413:
      return ObjectError.entityTooLarge(message);

    case 416:
      return ObjectError.invalidRange(message);

    case 429:
      return ServerError.tooManyRequests(message);

    case 500:
      return ServerError.internalError(message);

    case 503:
      return ServerError.serviceUnavailable(message);

    default: {
      const isServerError = status >= 500 && status < 600;
      if (isServerError) {
        return new ServerError({
          message: errorMessage,
          code: `HTTP_${status}`,
          status,
        });
      }
      return new AisError({
        type: 'unknown_error',
        message: errorMessage,
        code: `HTTP_${status}`,
        status,
        isRetryable: false,
      });
    }
  }
}

/**
 * Default message for a status code when the body carries none
 */
function getDefaultMessageForStatus(status: number): string {
  switch (status) {
    case 400:
      return 'Bad request';
    case 401:
      return 'Unauthorized';
    case 403:
      return 'Forbidden';
    case 404:
      return 'Not found';
    case 408:
      return 'Request timeout';
    case 409:
      return 'Conflict';
    default:
      return `HTTP ${status}`;
  }
}

/**
 * Type guard for AisError
 */
export function isAisError(error: unknown): error is AisError {
  return error instanceof AisError;
}

/**
 * Checks whether an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return isAisError(error) && error.isRetryable;
}

/**
 * Checks whether an error reports a missing bucket or object
 */
export function isNotFoundError(error: unknown): boolean {
  return isAisError(error) && error.status === 404;
}
