/**
 * Terraform State IAM Parser
 *
 * Reads JSON state files from GCS and extracts the IAM grants declared by
 * organization, folder and project iam_binding / iam_member resources.
 */

import { z } from 'zod';
import type { AssetIAM, HierarchyNode, IAMCondition, NodeType } from '@driftwatch/shared-types';
import { StateFileError, WorkerPool, logger } from '@driftwatch/shared-utils';
import { assetsByName, mergeAssets } from '../assets/hierarchy';
import { readLimited, splitObjectUri, type ObjectStorage } from '../storage';

export const STATE_FILE_NAME = 'default.tfstate';
export const STATE_FILE_SIZE_LIMIT = 512 * 1024 * 1024;

const NO_RESOURCES_MARKER = '"resources": [],';

const log = logger.child('terraform');

type IAMScope = 'organization' | 'folder' | 'project';
type IAMResourceKind = 'binding' | 'member';

const IAM_RESOURCE_TYPES: ReadonlyMap<string, { scope: IAMScope; kind: IAMResourceKind }> = new Map([
  ['google_organization_iam_binding', { scope: 'organization', kind: 'binding' }],
  ['google_folder_iam_binding', { scope: 'folder', kind: 'binding' }],
  ['google_project_iam_binding', { scope: 'project', kind: 'binding' }],
  ['google_organization_iam_member', { scope: 'organization', kind: 'member' }],
  ['google_folder_iam_member', { scope: 'folder', kind: 'member' }],
  ['google_project_iam_member', { scope: 'project', kind: 'member' }],
]);

export const TerraformStateSchema = z.object({
  resources: z
    .array(
      z.object({
        type: z.string(),
        instances: z.unknown(),
      })
    )
    .nullish(),
});

const ConditionStateSchema = z.object({
  title: z.string().nullish(),
  expression: z.string().nullish(),
  description: z.string().nullish(),
});

export const IAMInstancesSchema = z.array(
  z.object({
    attributes: z.object({
      id: z.string().nullish(),
      members: z.array(z.string()).nullish(),
      member: z.string().nullish(),
      folder: z.string().nullish(),
      project: z.string().nullish(),
      role: z.string().nullish(),
      condition: z.array(ConditionStateSchema).nullish(),
    }),
  })
);

type IAMAttributes = z.infer<typeof IAMInstancesSchema>[number]['attributes'];

export interface TerraformStateParser {
  setAssets(folders: ReadonlyMap<string, HierarchyNode>, projects: ReadonlyMap<string, HierarchyNode>): void;
  stateFileUris(buckets: readonly string[]): Promise<string[]>;
  processStates(uris: readonly string[]): Promise<Map<string, AssetIAM[]>>;
  stateWithoutResources(uri: string): Promise<boolean>;
}

/**
 * Zod issues as `path: message` strings
 */
function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class TerraformParser implements TerraformStateParser {
  private storage: ObjectStorage;
  private organizationId: string;
  private sizeLimit: number;
  private assetsById = new Map<string, HierarchyNode>();
  private foldersByName = new Map<string, HierarchyNode>();
  private projectsByName = new Map<string, HierarchyNode>();

  constructor(storage: ObjectStorage, organizationId: string, sizeLimit: number = STATE_FILE_SIZE_LIMIT) {
    this.storage = storage;
    this.organizationId = organizationId;
    this.sizeLimit = sizeLimit;
  }

  setAssets(folders: ReadonlyMap<string, HierarchyNode>, projects: ReadonlyMap<string, HierarchyNode>): void {
    this.assetsById = mergeAssets(folders, projects);
    this.foldersByName = assetsByName(folders);
    this.projectsByName = assetsByName(projects);
  }

  async stateFileUris(buckets: readonly string[]): Promise<string[]> {
    const uris: string[] = [];
    for (const bucket of buckets) {
      try {
        uris.push(...(await this.storage.objectsWithName(bucket, STATE_FILE_NAME)));
      } catch (error) {
        throw new StateFileError(`failed to determine state files in GCS bucket ${bucket}`, { bucket }, { cause: error });
      }
    }
    return uris;
  }

  async stateWithoutResources(uri: string): Promise<boolean> {
    const content = await this.download(uri);
    return content.includes(NO_RESOURCES_MARKER);
  }

  async processStates(uris: readonly string[]): Promise<Map<string, AssetIAM[]>> {
    const byStateFile = new Map<string, AssetIAM[]>();
    for (const uri of uris) {
      const content = await this.download(uri);
      byStateFile.set(uri, this.parseState(uri, content));
    }
    return byStateFile;
  }

  /**
   * IAM grants declared in one state document.
   */
  parseState(uri: string, content: string): AssetIAM[] {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new StateFileError(`failed to decode terraform state ${uri}`, { uri }, { cause: error });
    }

    const state = TerraformStateSchema.safeParse(document);
    if (!state.success) {
      throw new StateFileError(`failed to decode terraform state ${uri}: ${describeIssues(state.error)}`, { uri });
    }

    const grants: AssetIAM[] = [];
    for (const resource of state.data.resources ?? []) {
      const target = IAM_RESOURCE_TYPES.get(resource.type);
      if (!target) {
        continue;
      }

      const instances = IAMInstancesSchema.safeParse(resource.instances);
      if (!instances.success) {
        throw new StateFileError(
          `failed to decode ${resource.type} instances in terraform state ${uri}: ${describeIssues(instances.error)}`,
          { uri, type: resource.type }
        );
      }

      for (const { attributes } of instances.data) {
        const { resourceId, resourceType } = this.resolveResource(target.scope, attributes);
        const members = target.kind === 'binding' ? (attributes.members ?? []) : [attributes.member ?? ''];
        const condition = toCondition(attributes);
        for (const member of members) {
          grants.push({
            resourceId,
            resourceType,
            member,
            role: attributes.role ?? '',
            ...(condition ? { condition } : {}),
          });
        }
      }
    }
    return grants;
  }

  private resolveResource(scope: IAMScope, attributes: IAMAttributes): { resourceId: string; resourceType: NodeType } {
    if (scope === 'organization') {
      return { resourceId: this.organizationId, resourceType: 'Organization' };
    }

    const identifier =
      scope === 'folder' ? (attributes.folder ?? '').replace(/^folders\//, '') : (attributes.project ?? '');
    const asset = this.findAsset(identifier);
    if (!asset) {
      log.warn(`Could not find GCP ${scope} ${identifier}, it may have been deleted`, { [scope]: identifier });
      return { resourceId: identifier, resourceType: 'Unknown' };
    }
    return { resourceId: asset.id, resourceType: asset.nodeType };
  }

  private findAsset(identifier: string): HierarchyNode | undefined {
    return this.assetsById.get(identifier) ?? this.foldersByName.get(identifier) ?? this.projectsByName.get(identifier);
  }

  private async download(uri: string): Promise<string> {
    const { bucket, name } = splitObjectUri(uri);
    let buffer: Buffer;
    try {
      const stream = await this.storage.downloadObject(bucket, name);
      buffer = await readLimited(stream, this.sizeLimit);
    } catch (error) {
      throw new StateFileError(`failed to download terraform state ${uri}`, { uri }, { cause: error });
    }
    return buffer.toString('utf8');
  }
}

function toCondition(attributes: IAMAttributes): IAMCondition | undefined {
  const condition = attributes.condition?.[0];
  if (!condition) {
    return undefined;
  }
  return {
    title: condition.title ?? '',
    expression: condition.expression ?? '',
    description: condition.description ?? '',
  };
}

/**
 * State files among `uris` that declare no resources.
 */
export async function findEmptyStateFiles(
  parser: TerraformStateParser,
  uris: readonly string[],
  concurrency?: number
): Promise<string[]> {
  const pool = new WorkerPool<boolean>({ concurrency });
  for (const uri of uris) {
    pool.do(() => parser.stateWithoutResources(uri));
  }
  const empty = await pool.done();
  return uris.filter((_, index) => empty[index]);
}
