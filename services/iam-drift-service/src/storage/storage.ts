/**
 * Object Storage
 *
 * Interface the Terraform state reader depends on, plus helpers for GCS
 * object URIs and size-capped reads.
 */

import type { Readable } from 'node:stream';
import { StateFileError } from '@driftwatch/shared-utils';

export interface ObjectStorage {
  /** `gs://` URIs of the objects in `bucket` whose names end in `suffix`. */
  objectsWithName(bucket: string, suffix: string): Promise<string[]>;
  downloadObject(bucket: string, name: string): Promise<Readable>;
}

export interface ObjectLocation {
  bucket: string;
  name: string;
}

const OBJECT_URI_PATTERN = /^gs:\/\/([^/]+)\/(.+)$/;

export function objectUri(bucket: string, name: string): string {
  return `gs://${bucket}/${name}`;
}

export function splitObjectUri(uri: string): ObjectLocation {
  const match = OBJECT_URI_PATTERN.exec(uri);
  if (!match) {
    throw new StateFileError(`failed to parse GCS object URI ${uri}`, { uri });
  }
  return { bucket: match[1], name: match[2] };
}

/**
 * Read at most `limit` bytes from the stream. Anything past the limit is
 * dropped and the stream is destroyed.
 */
export async function readLimited(stream: Readable, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of stream) {
    const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    const remaining = limit - size;
    if (buffer.length >= remaining) {
      chunks.push(buffer.subarray(0, remaining));
      size = limit;
      break;
    }
    chunks.push(buffer);
    size += buffer.length;
  }
  return Buffer.concat(chunks, size);
}
