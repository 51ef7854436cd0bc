import { Readable } from 'node:stream';
import type { AssetIAM, HierarchyNode } from '@driftwatch/shared-types';
import type { AssetInventory, IAMSearchOptions } from '../../assets/inventory';
import { FOLDER_ASSET_TYPE, PROJECT_ASSET_TYPE } from '../../assets/inventory';
import { objectUri, type ObjectStorage } from '../../storage';

export interface FakeAssetInventoryData {
  folders?: HierarchyNode[];
  projects?: HierarchyNode[];
  buckets?: string[];
  iam?: AssetIAM[];
  bucketsError?: string;
  assetsError?: string;
  iamError?: string;
}

/**
 * In-memory AssetInventory recording the requests it receives.
 */
export class FakeAssetInventory implements AssetInventory {
  readonly iamRequests: IAMSearchOptions[] = [];
  readonly bucketQueries: string[] = [];
  private data: FakeAssetInventoryData;

  constructor(data: FakeAssetInventoryData = {}) {
    this.data = data;
  }

  async buckets(_organizationId: string, query: string): Promise<string[]> {
    this.bucketQueries.push(query);
    if (this.data.bucketsError) {
      throw new Error(this.data.bucketsError);
    }
    return this.data.buckets ?? [];
  }

  async hierarchyAssets(_organizationId: string, assetType: string): Promise<HierarchyNode[]> {
    if (this.data.assetsError) {
      throw new Error(this.data.assetsError);
    }
    if (assetType === FOLDER_ASSET_TYPE) {
      return this.data.folders ?? [];
    }
    if (assetType === PROJECT_ASSET_TYPE) {
      return this.data.projects ?? [];
    }
    return [];
  }

  async iam(options: IAMSearchOptions): Promise<AssetIAM[]> {
    this.iamRequests.push(options);
    if (this.data.iamError) {
      throw new Error(this.data.iamError);
    }
    return this.data.iam ?? [];
  }
}

/**
 * In-memory ObjectStorage keyed by bucket, then object name.
 */
export class FakeObjectStorage implements ObjectStorage {
  readonly downloads: string[] = [];
  private objects: Map<string, Map<string, string>>;

  constructor(objects: Record<string, Record<string, string>> = {}) {
    this.objects = new Map(
      Object.entries(objects).map(([bucket, files]) => [bucket, new Map(Object.entries(files))])
    );
  }

  async objectsWithName(bucket: string, suffix: string): Promise<string[]> {
    const files = this.objects.get(bucket);
    if (!files) {
      throw new Error(`bucket ${bucket} not found`);
    }
    return [...files.keys()].filter(name => name.endsWith(suffix)).map(name => objectUri(bucket, name));
  }

  async downloadObject(bucket: string, name: string): Promise<Readable> {
    const content = this.objects.get(bucket)?.get(name);
    if (content === undefined) {
      throw new Error(`object gs://${bucket}/${name} not found`);
    }
    this.downloads.push(objectUri(bucket, name));
    return Readable.from([Buffer.from(content)]);
  }
}

export function folder(id: string, parentId: string, parentType: 'Organization' | 'Folder' = 'Folder', name = id): HierarchyNode {
  return { id, name, parentId, parentType, nodeType: 'Folder' };
}

export function project(id: string, name: string, parentId: string, parentType: 'Organization' | 'Folder' = 'Folder'): HierarchyNode {
  return { id, name, parentId, parentType, nodeType: 'Project' };
}

export function byId(nodes: HierarchyNode[]): Map<string, HierarchyNode> {
  return new Map(nodes.map(node => [node.id, node]));
}

/**
 * Minimal Terraform state document with the given resources.
 */
export function terraformState(resources: Array<{ type: string; instances: unknown[] }>): string {
  return JSON.stringify({ version: 4, terraform_version: '1.5.7', resources }, null, 2);
}
