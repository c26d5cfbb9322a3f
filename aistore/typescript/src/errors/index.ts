/**
 * Error system for the AIStore client
 * @module aistore-client/errors
 */

export { AisError, type AisErrorParams } from './error.js';

export {
  BucketError,
  ConfigError,
  NetworkError,
  ObjectError,
  ServerError,
  TransferError,
  ValidationError,
} from './categories.js';

export {
  type ErrorResource,
  mapHttpStatusToError,
  parseErrorMessage,
  isAisError,
  isRetryableError,
  isNotFoundError,
} from './mapping.js';
