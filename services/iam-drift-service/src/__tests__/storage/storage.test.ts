import { describe, test, expect } from 'vitest';
import { Readable } from 'node:stream';
import { StateFileError } from '@driftwatch/shared-utils';
import { objectUri, readLimited, splitObjectUri } from '../../storage';

describe('splitObjectUri', () => {
  test('splits bucket and object name', () => {
    expect(splitObjectUri('gs://tf-state/env/prod/default.tfstate')).toEqual({
      bucket: 'tf-state',
      name: 'env/prod/default.tfstate',
    });
  });

  test('round trips with objectUri', () => {
    const { bucket, name } = splitObjectUri('gs://b/o');
    expect(objectUri(bucket, name)).toBe('gs://b/o');
  });

  test('rejects URIs without an object name or scheme', () => {
    expect(() => splitObjectUri('gs://bucket-only')).toThrow(StateFileError);
    expect(() => splitObjectUri('s3://bucket/key')).toThrow('failed to parse GCS object URI s3://bucket/key');
  });
});

describe('readLimited', () => {
  test('reads a whole stream under the limit', async () => {
    const stream = Readable.from([Buffer.from('hello '), Buffer.from('world')]);

    const buffer = await readLimited(stream, 1024);

    expect(buffer.toString('utf8')).toBe('hello world');
  });

  test('truncates at the limit', async () => {
    const stream = Readable.from([Buffer.from('abcdef'), Buffer.from('ghijkl')]);

    const buffer = await readLimited(stream, 8);

    expect(buffer.toString('utf8')).toBe('abcdefgh');
    expect(stream.destroyed).toBe(true);
  });

  test('accepts string chunks', async () => {
    const stream = Readable.from(['{"resources":', ' []}']);

    const buffer = await readLimited(stream, 100);

    expect(buffer.toString('utf8')).toBe('{"resources": []}');
  });
});
