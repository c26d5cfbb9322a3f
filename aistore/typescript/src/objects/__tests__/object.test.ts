/**
 * Object Handle Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { createClient, type AisClient } from '../../client/index.js';
import { AisObject, objectPath, parseContentLength } from '../index.js';
import { MockTransport, createInMemoryCluster, computeChecksum } from '../../simulation/index.js';
import { AisError, ObjectError, ValidationError } from '../../errors/index.js';

describe('objectPath', () => {
  it('should build the object path', () => {
    expect(objectPath('images', 'cat.png')).toBe('objects/images/cat.png');
    expect(objectPath('data', 'train/my file.txt')).toBe('objects/data/train/my%20file.txt');
  });
});

describe('parseContentLength', () => {
  it('should parse decimal values', () => {
    expect(parseContentLength('12345')).toBe(12345);
    expect(parseContentLength(' 7 ')).toBe(7);
  });

  it('should yield 0 for absent or malformed values', () => {
    expect(parseContentLength(null)).toBe(0);
    expect(parseContentLength('')).toBe(0);
    expect(parseContentLength('12abc')).toBe(0);
    expect(parseContentLength('-5')).toBe(0);
  });
});

describe('AisObject', () => {
  let transport: MockTransport;
  let client: AisClient;

  beforeEach(() => {
    transport = new MockTransport();
    client = createClient({ endpoint: 'http://localhost:8080' }, { transport });
  });

  describe('construction', () => {
    it('should expose its bucket and name', () => {
      const bucket = client.bucket('images');
      const object = bucket.object('cat.png');

      expect(object.bucket).toBe(bucket);
      expect(object.name).toBe('cat.png');
      expect(transport.requests).toHaveLength(0);
    });

    it('should reject an empty name', () => {
      expect(() => new AisObject(client.bucket('images'), '')).toThrow(ValidationError);
    });

    it('should reject dot segments that would address another resource', () => {
      const bucket = client.bucket('images');

      for (const name of ['a/../../x', '..', '.', 'a/./b', 'train/..']) {
        expect(() => bucket.object(name)).toThrow(
          expect.objectContaining({ code: 'InvalidObjectName', details: { objectName: name } })
        );
      }
      expect(transport.requests).toHaveLength(0);
    });

    it('should accept dots inside segments', () => {
      expect(client.bucket('images').object('a/..b/c..').name).toBe('a/..b/c..');
      expect(client.bucket('images').object('.hidden').name).toBe('.hidden');
    });
  });

  describe('headObject', () => {
    it('should return the response headers', async () => {
      transport.enqueue({
        status: 200,
        headers: { 'content-length': '42', 'ais-checksum-type': 'xxhash' },
      });

      const headers = await client.bucket('images').object('cat.png').headObject();

      expect(headers.get('Content-Length')).toBe('42');
      expect(headers.get('ais-checksum-type')).toBe('xxhash');

      const request = transport.lastRequest();
      expect(request?.method).toBe('HEAD');
      expect(request?.path).toBe('objects/images/cat.png');
      expect(request?.params).toEqual({ provider: 'ais' });
    });

    it('should raise ObjectError NotFound for a missing object', async () => {
      transport.enqueue({ status: 404 });

      const error = await client
        .bucket('images')
        .object('cat.png')
        .headObject()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ObjectError);
      expect(error).toMatchObject({ code: 'NotFound', status: 404 });
      expect(transport.requests).toHaveLength(1);
    });
  });

  describe('getObject', () => {
    it('should read stream properties from the headers', async () => {
      transport.enqueue({ status: 200, headers: { 'content-length': '12345' } });

      const stream = await client.bucket('images').object('cat.png').getObject();

      expect(stream.contentLength).toBe(12345);
      expect(stream.eTag).toBe('');
      expect(stream.eTagType).toBe('');
      expect(stream.chunkSize).toBe(65536);
      await stream.close();
    });

    it('should expose the checksum headers', async () => {
      transport.enqueue({
        status: 200,
        headers: {
          'content-length': '3',
          'ais-checksum-type': 'xxhash',
          'ais-checksum-value': 'a1b2c3d4',
        },
        body: 'abc',
      });

      const stream = await client.bucket('images').object('cat.png').getObject({ chunkSize: 2 });

      expect(stream.eTag).toBe('a1b2c3d4');
      expect(stream.eTagType).toBe('xxhash');
      expect(stream.chunkSize).toBe(2);
      expect((await stream.readAll()).toString()).toBe('abc');
    });

    it('should yield 0 for a malformed content-length', async () => {
      transport.enqueue({ status: 200, headers: { 'content-length': 'many' } });

      const stream = await client.bucket('images').object('cat.png').getObject();

      expect(stream.contentLength).toBe(0);
      await stream.close();
    });

    it('should always send archpath, empty by default', async () => {
      const stream = await client.bucket('images').object('cat.png').getObject();
      await stream.close();

      const request = transport.lastRequest();
      expect(request?.method).toBe('GET');
      expect(request?.path).toBe('objects/images/cat.png');
      expect(request?.params).toEqual({ provider: 'ais', archpath: '' });
    });

    it('should merge archpath without mutating the bucket parameters', async () => {
      const bucket = client.bucket('shards', { namespace: { name: 'ml' } });
      const before = bucket.qparam;

      const stream = await bucket.object('shard-0001.tar').getObject({ archpath: 'labels/0.json' });
      await stream.close();

      expect(transport.lastRequest()?.params).toEqual({
        provider: 'ais',
        namespace: '@#ml',
        archpath: 'labels/0.json',
      });
      expect(bucket.qparam).toEqual(before);
      expect(bucket.qparam).toEqual({ provider: 'ais', namespace: '@#ml' });
    });

    it('should reject invalid chunk sizes before sending', async () => {
      const object = client.bucket('images').object('cat.png');

      await expect(object.getObject({ chunkSize: 0 })).rejects.toBeInstanceOf(ValidationError);
      await expect(object.getObject({ chunkSize: 2.5 })).rejects.toMatchObject({
        code: 'InvalidParameter',
        details: { paramName: 'chunkSize' },
      });
      expect(transport.requests).toHaveLength(0);
    });

    it('should use the configured chunk size by default', async () => {
      const small = createClient(
        { endpoint: 'http://localhost:8080', downloadChunkSize: 1024 },
        { transport }
      );

      const stream = await small.bucket('images').object('cat.png').getObject();

      expect(stream.chunkSize).toBe(1024);
      await stream.close();
    });
  });

  describe('deleteObject', () => {
    it('should send a DELETE with the bucket parameters', async () => {
      await expect(
        client.bucket('images', { provider: 'aws' }).object('cat.png').deleteObject()
      ).resolves.toBeUndefined();

      const request = transport.lastRequest();
      expect(request?.method).toBe('DELETE');
      expect(request?.path).toBe('objects/images/cat.png');
      expect(request?.params).toEqual({ provider: 'aws' });
    });

    it('should raise NotFound for a missing object', async () => {
      transport.enqueue({ status: 404, body: '{"message":"object does not exist"}' });

      await expect(
        client.bucket('images').object('cat.png').deleteObject()
      ).rejects.toMatchObject({ code: 'NotFound', message: 'object does not exist' });
    });
  });

  describe('putObject', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'ais-object-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should stream the file as the request body', async () => {
      const file = path.join(dir, 'cat.png');
      await writeFile(file, 'not really a png');
      transport.enqueue({ status: 200, headers: { 'ais-checksum-type': 'xxhash' } });

      const headers = await client.bucket('images').object('cat.png').putObject(file);

      expect(headers.get('ais-checksum-type')).toBe('xxhash');
      const request = transport.lastRequest();
      expect(request?.method).toBe('PUT');
      expect(request?.path).toBe('objects/images/cat.png');
      expect(request?.params).toEqual({ provider: 'ais' });
      expect(request?.headers['content-length']).toBe('16');
      expect(new TextDecoder().decode(request?.body)).toBe('not really a png');
    });

    it('should upload an empty file', async () => {
      const file = path.join(dir, 'empty');
      await writeFile(file, '');

      await client.bucket('images').object('empty').putObject(file);

      expect(transport.lastRequest()?.headers['content-length']).toBe('0');
      expect(transport.lastRequest()?.body?.length).toBe(0);
    });

    it('should raise the native error for a missing file without sending', async () => {
      const error = await client
        .bucket('images')
        .object('cat.png')
        .putObject(path.join(dir, 'missing.png'))
        .catch((e: unknown) => e);

      expect(error).not.toBeInstanceOf(AisError);
      expect(error).toMatchObject({ code: 'ENOENT' });
      expect(transport.requests).toHaveLength(0);
    });

    it('should raise EISDIR for a directory without sending', async () => {
      await expect(
        client.bucket('images').object('cat.png').putObject(dir)
      ).rejects.toMatchObject({ code: 'EISDIR' });
      expect(transport.requests).toHaveLength(0);
    });
  });

  describe('against the in-memory cluster', () => {
    it('should round-trip an object', async () => {
      const cluster = createInMemoryCluster();
      cluster.createBucket('images');
      const clusterClient = createClient(
        { endpoint: 'http://localhost:8080' },
        { transport: new MockTransport({ handler: cluster.handler, streamPieceSize: 3 }) }
      );
      const dir = await mkdtemp(path.join(tmpdir(), 'ais-object-'));

      try {
        const file = path.join(dir, 'cat.png');
        await writeFile(file, 'meow meow');
        const object = clusterClient.bucket('images').object('cat.png');

        const putHeaders = await object.putObject(file);
        expect(putHeaders.get('ais-checksum-value')).toBe(
          computeChecksum(new TextEncoder().encode('meow meow'))
        );

        const props = await object.headObject();
        expect(props.get('content-length')).toBe('9');

        const stream = await object.getObject({ chunkSize: 4 });
        expect(stream.contentLength).toBe(9);
        expect(stream.eTagType).toBe('sha256');

        const chunks: string[] = [];
        for await (const chunk of stream) {
          chunks.push(new TextDecoder().decode(chunk));
        }
        expect(chunks).toEqual(['meow', ' meo', 'w']);

        await object.deleteObject();
        await expect(object.headObject()).rejects.toMatchObject({ code: 'NotFound' });
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });
});
