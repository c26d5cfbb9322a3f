/**
 * Error Mapping Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AisError,
  BucketError,
  NetworkError,
  ObjectError,
  ServerError,
  ValidationError,
  isNotFoundError,
  isRetryableError,
  mapHttpStatusToError,
  parseErrorMessage,
} from '../index.js';

describe('parseErrorMessage', () => {
  it('should extract the message of a JSON body', () => {
    expect(parseErrorMessage('{"message":"bucket \\"x\\" does not exist","status":404}')).toBe(
      'bucket "x" does not exist'
    );
  });

  it('should fall back to the raw text', () => {
    expect(parseErrorMessage('  proxy is starting up\n')).toBe('proxy is starting up');
    expect(parseErrorMessage('{"error":"no message field"}')).toBe('{"error":"no message field"}');
  });

  it('should return undefined for an empty body', () => {
    expect(parseErrorMessage('')).toBeUndefined();
    expect(parseErrorMessage('   ')).toBeUndefined();
  });
});

describe('mapHttpStatusToError', () => {
  it('should map an object 404 to ObjectError NotFound', () => {
    const error = mapHttpStatusToError(404, undefined, { bucket: 'images', object: 'cat.png' });

    expect(error).toBeInstanceOf(ObjectError);
    expect(error.code).toBe('NotFound');
    expect(error.status).toBe(404);
    expect(error.details).toEqual({ bucket: 'images', object: 'cat.png' });
    expect(error.message).toBe('Object not found: images/cat.png');
  });

  it('should map a bucket 404 to BucketError NotFound', () => {
    const error = mapHttpStatusToError(404, 'no such bucket', { bucket: 'images' });

    expect(error).toBeInstanceOf(BucketError);
    expect(error.code).toBe('NotFound');
    expect(error.message).toBe('no such bucket');
  });

  it('should map a 404 without resource to a generic not found error', () => {
    const error = mapHttpStatusToError(404);

    expect(error.type).toBe('not_found');
    expect(error.message).toBe('Not found');
  });

  it('should map 409 on a bucket to AlreadyExists', () => {
    const error = mapHttpStatusToError(409, undefined, { bucket: 'images' });

    expect(error).toBeInstanceOf(BucketError);
    expect(error.code).toBe('AlreadyExists');
  });

  it('should map client and server statuses', () => {
    expect(mapHttpStatusToError(400)).toBeInstanceOf(ValidationError);
    expect(mapHttpStatusToError(401).type).toBe('auth_error');
    expect(mapHttpStatusToError(403).code).toBe('Forbidden');
    expect(mapHttpStatusToError(408)).toBeInstanceOf(NetworkError);
    expect(mapHttpStatusToError(412).code).toBe('PreconditionFailed');
    expect(mapHttpStatusToError(413).code).toBe('EntityTooLarge');
    expect(mapHttpStatusToError(416).code).toBe('InvalidRange');
    expect(mapHttpStatusToError(429).code).toBe('TooManyRequests');
    expect(mapHttpStatusToError(500)).toBeInstanceOf(ServerError);
    expect(mapHttpStatusToError(503).code).toBe('ServiceUnavailable');
  });

  it('should map other statuses by class', () => {
    const gateway = mapHttpStatusToError(502);
    expect(gateway).toBeInstanceOf(ServerError);
    expect(gateway.code).toBe('HTTP_502');

    const teapot = mapHttpStatusToError(418);
    expect(teapot.type).toBe('unknown_error');
    expect(teapot.message).toBe('HTTP 418');
  });
});

describe('error helpers', () => {
  it('should classify retryable errors', () => {
    expect(isRetryableError(ServerError.serviceUnavailable())).toBe(true);
    expect(isRetryableError(NetworkError.timeout(100))).toBe(true);
    expect(isRetryableError(ObjectError.notFound('b', 'o'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should detect not found errors', () => {
    expect(isNotFoundError(BucketError.notFound('b'))).toBe(true);
    expect(isNotFoundError(ServerError.internalError())).toBe(false);
  });

  it('should keep instanceof and serialize', () => {
    const error = ObjectError.notFound('images', 'cat.png');

    expect(error).toBeInstanceOf(AisError);
    expect(error).toBeInstanceOf(Error);
    expect(error.toString()).toBe(
      'ObjectError object_error [NotFound] (404) - Object not found: images/cat.png'
    );
    expect(error.toJSON()).toEqual({
      name: 'ObjectError',
      type: 'object_error',
      message: 'Object not found: images/cat.png',
      status: 404,
      code: 'NotFound',
      isRetryable: false,
      details: { bucket: 'images', object: 'cat.png' },
    });
  });
});
