/**
 * GCP Cloud Storage Operations
 *
 * ObjectStorage backed by the Cloud Storage SDK
 */

import type { Readable } from 'node:stream';
import { Storage } from '@google-cloud/storage';
import { logger } from '@driftwatch/shared-utils';
import { objectUri, type ObjectStorage } from './storage';

export interface StorageConfig {
  projectId?: string;
}

export class GoogleCloudStorage implements ObjectStorage {
  private storage: Storage;

  constructor(config: StorageConfig = {}) {
    this.storage = new Storage({
      projectId: config.projectId || process.env.GOOGLE_CLOUD_PROJECT || undefined,
    });
  }

  async objectsWithName(bucket: string, suffix: string): Promise<string[]> {
    const [files] = await this.storage.bucket(bucket).getFiles({ autoPaginate: true });
    const uris = files.filter(file => file.name.endsWith(suffix)).map(file => objectUri(bucket, file.name));
    logger.debug(`Found ${uris.length} objects ending in ${suffix}`, { bucket });
    return uris;
  }

  async downloadObject(bucket: string, name: string): Promise<Readable> {
    return this.storage.bucket(bucket).file(name).createReadStream();
  }
}
