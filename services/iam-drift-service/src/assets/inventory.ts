/**
 * Cloud Asset Inventory Client
 *
 * Lists buckets, folders, projects and IAM policies of an organization
 * through the Cloud Asset API search endpoints.
 */

import { AssetServiceClient, protos } from '@google-cloud/asset';
import type { AssetIAM, HierarchyNode, NodeType } from '@driftwatch/shared-types';
import { ValidationError, logger } from '@driftwatch/shared-utils';

type ResourceSearchResult = protos.google.cloud.asset.v1.IResourceSearchResult;
type IamPolicySearchResult = protos.google.cloud.asset.v1.IIamPolicySearchResult;

export const ORGANIZATION_ASSET_TYPE = 'cloudresourcemanager.googleapis.com/Organization';
export const FOLDER_ASSET_TYPE = 'cloudresourcemanager.googleapis.com/Folder';
export const PROJECT_ASSET_TYPE = 'cloudresourcemanager.googleapis.com/Project';
export const BUCKET_ASSET_TYPE = 'storage.googleapis.com/Bucket';

const RESOURCE_MANAGER_PREFIX = 'cloudresourcemanager.googleapis.com/';
const STORAGE_NAME_PREFIX = '//storage.googleapis.com/';
const ACTIVE_QUERY = 'state:ACTIVE';

const RESOURCE_NAME_PATTERN =
  /\/\/cloudresourcemanager\.googleapis\.com\/(?:folders|organizations|projects)\/(.*)/;
const PARENT_ID_PATTERN = /\/\/cloudresourcemanager\.googleapis\.com\/(?:folders|organizations)\/(\d*)/;

export interface IAMSearchOptions {
  /** e.g. organizations/1234 */
  scope: string;
  query?: string;
  assetTypes?: string[];
}

export interface AssetInventory {
  /** Names of the GCS buckets in the organization matching `query`. */
  buckets(organizationId: string, query: string): Promise<string[]>;
  /** Active folders or projects of the organization. */
  hierarchyAssets(organizationId: string, assetType: string): Promise<HierarchyNode[]>;
  /** Every binding x member grant matching the search. */
  iam(options: IAMSearchOptions): Promise<AssetIAM[]>;
}

export function toNodeType(assetType: string | null | undefined): NodeType {
  switch ((assetType ?? '').replace(RESOURCE_MANAGER_PREFIX, '')) {
    case 'Organization':
      return 'Organization';
    case 'Folder':
      return 'Folder';
    case 'Project':
      return 'Project';
    default:
      return 'Unknown';
  }
}

/**
 * `//cloudresourcemanager.googleapis.com/projects/my-project` -> `my-project`
 */
export function extractNameFromResourceName(resourceName: string): string {
  const match = RESOURCE_NAME_PATTERN.exec(resourceName);
  if (!match) {
    throw new ValidationError(`failed to parse name from resource name ${resourceName}`, 'iam-drift', {
      resourceName,
    });
  }
  return match[1];
}

/**
 * `//cloudresourcemanager.googleapis.com/folders/123` -> `123`
 */
export function extractIdFromResourceName(resourceName: string): string {
  const match = PARENT_ID_PATTERN.exec(resourceName);
  if (!match) {
    throw new ValidationError(`failed to parse ID from resource name ${resourceName}`, 'iam-drift', {
      resourceName,
    });
  }
  return match[1];
}

export function toHierarchyNode(result: ResourceSearchResult): HierarchyNode {
  const nodeType = toNodeType(result.assetType);
  let id: string;
  switch (nodeType) {
    case 'Folder':
      id = (result.folders?.[0] ?? '').replace(/^folders\//, '');
      break;
    case 'Project':
      id = (result.project ?? '').replace(/^projects\//, '');
      break;
    default:
      id = (result.organization ?? '').replace(/^organizations\//, '');
  }

  const parentType = toNodeType(result.parentAssetType);
  return {
    id,
    name: extractNameFromResourceName(result.name ?? ''),
    parentId: extractIdFromResourceName(result.parentFullResourceName ?? ''),
    parentType: parentType === 'Unknown' ? '' : parentType,
    nodeType,
  };
}

export function toAssetIAM(result: IamPolicySearchResult): AssetIAM[] {
  let resourceId: string;
  let resourceType: NodeType;
  const firstFolder = result.folders?.[0];
  if (result.project) {
    resourceId = result.project.replace(/^projects\//, '');
    resourceType = 'Project';
  } else if (firstFolder) {
    resourceId = firstFolder.replace(/^folders\//, '');
    resourceType = 'Folder';
  } else {
    resourceId = (result.organization ?? '').replace(/^organizations\//, '');
    resourceType = 'Organization';
  }

  const grants: AssetIAM[] = [];
  for (const binding of result.policy?.bindings ?? []) {
    const condition = binding.condition
      ? {
          title: binding.condition.title ?? '',
          expression: binding.condition.expression ?? '',
          description: binding.condition.description ?? '',
        }
      : undefined;
    for (const member of binding.members ?? []) {
      grants.push({
        resourceId,
        resourceType,
        member,
        role: binding.role ?? '',
        ...(condition ? { condition } : {}),
      });
    }
  }
  return grants;
}

/**
 * AssetInventory backed by the Cloud Asset API
 */
export class AssetInventoryClient implements AssetInventory {
  private client: AssetServiceClient;

  constructor(client?: AssetServiceClient) {
    this.client = client ?? new AssetServiceClient();
  }

  async buckets(organizationId: string, query: string): Promise<string[]> {
    const iterable = this.client.searchAllResourcesAsync({
      scope: `organizations/${organizationId}`,
      assetTypes: [BUCKET_ASSET_TYPE],
      query,
      readMask: { paths: ['name'] },
    });

    const names: string[] = [];
    for await (const resource of iterable) {
      names.push((resource.name ?? '').replace(STORAGE_NAME_PREFIX, ''));
    }
    logger.debug(`Found ${names.length} buckets`, { organizationId, query });
    return names;
  }

  async hierarchyAssets(organizationId: string, assetType: string): Promise<HierarchyNode[]> {
    const iterable = this.client.searchAllResourcesAsync({
      scope: `organizations/${organizationId}`,
      assetTypes: [assetType],
      query: ACTIVE_QUERY,
    });

    const nodes: HierarchyNode[] = [];
    for await (const resource of iterable) {
      nodes.push(toHierarchyNode(resource));
    }
    logger.debug(`Found ${nodes.length} assets of type ${assetType}`, { organizationId });
    return nodes;
  }

  async iam(options: IAMSearchOptions): Promise<AssetIAM[]> {
    const iterable = this.client.searchAllIamPoliciesAsync({
      scope: options.scope,
      query: options.query ?? '',
      assetTypes: options.assetTypes ?? [],
    });

    const grants: AssetIAM[] = [];
    for await (const policy of iterable) {
      grants.push(...toAssetIAM(policy));
    }
    return grants;
  }
}
