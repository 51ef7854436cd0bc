/**
 * IAM Drift Detector
 *
 * Compares the IAM grants declared in Terraform state files with the grants
 * actually applied in a GCP organization.
 */

import type {
  AssetIAM,
  HierarchyNode,
  IAMDrift,
  TerraformStateIAMSource,
} from '@driftwatch/shared-types';
import { DEFAULT_CONCURRENCY, DriftDetectionError, WorkerPool, logger } from '@driftwatch/shared-utils';
import { assetsById, newHierarchyGraph } from '../assets/hierarchy';
import {
  AssetInventoryClient,
  FOLDER_ASSET_TYPE,
  ORGANIZATION_ASSET_TYPE,
  PROJECT_ASSET_TYPE,
  type AssetInventory,
} from '../assets/inventory';
import { GoogleCloudStorage } from '../storage';
import { TerraformParser, type TerraformStateParser } from '../terraform/parser';
import { DEFAULT_URI_FILTERS, filterDefaultUris, type UriFilters } from './default-filters';
import { expandIgnoredAssets, filterIgnored, parseDriftignore } from './driftignore';
import { iamUri } from './uri';

const log = logger.child('drift');

export interface IAMDriftDetectorOptions {
  organizationId: string;
  assetInventory: AssetInventory;
  terraformParser: TerraformStateParser;
  maxConcurrentRequests?: number;
  uriFilters?: UriFilters;
}

interface HierarchyAssets {
  folders: HierarchyNode[];
  projects: HierarchyNode[];
  buckets: string[];
}

/**
 * Run a stage, wrapping any failure with the stage description.
 */
async function stage<T>(description: string, run: () => Promise<T> | T): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new DriftDetectionError(`failed to ${description}`, error);
  }
}

type IAMTaskResult =
  | { kind: 'gcp'; grants: AssetIAM[] }
  | { kind: 'terraform'; byStateFile: Map<string, AssetIAM[]> };

function sortedDifference(from: Iterable<string>, remove: ReadonlySet<string> | ReadonlyMap<string, unknown>): string[] {
  return [...from].filter(uri => !remove.has(uri)).sort();
}

function selectFrom<V>(uris: readonly string[], from: ReadonlyMap<string, V>): Map<string, V> {
  const selected = new Map<string, V>();
  for (const uri of uris) {
    const value = from.get(uri);
    if (value !== undefined) {
      selected.set(uri, value);
    }
  }
  return selected;
}

export class IAMDriftDetector {
  private organizationId: string;
  private assetInventory: AssetInventory;
  private terraformParser: TerraformStateParser;
  private maxConcurrentRequests: number;
  private uriFilters: UriFilters;

  constructor(options: IAMDriftDetectorOptions) {
    this.organizationId = options.organizationId;
    this.assetInventory = options.assetInventory;
    this.terraformParser = options.terraformParser;
    this.maxConcurrentRequests = options.maxConcurrentRequests ?? DEFAULT_CONCURRENCY;
    this.uriFilters = options.uriFilters ?? DEFAULT_URI_FILTERS;
  }

  async detectDrift(bucketQuery: string, driftignoreFile: string): Promise<IAMDrift> {
    const { folders, projects, buckets } = await stage('execute asset tasks in parallel', () =>
      this.hierarchyAssets(bucketQuery)
    );
    log.debug('Fetched hierarchy assets', {
      folders: folders.length,
      projects: projects.length,
      buckets: buckets.length,
    });

    const foldersById = assetsById(folders);
    const projectsById = assetsById(projects);
    this.terraformParser.setAssets(foldersById, projectsById);

    const graph = await stage('construct graph from GCP assets', () =>
      newHierarchyGraph(this.organizationId, foldersById, projectsById)
    );

    const ignored = await stage('parse ignore file', () =>
      parseDriftignore(driftignoreFile, foldersById, projectsById)
    );
    const expanded = await stage('expand graph for ignored assets', () => expandIgnoredAssets(ignored, graph));

    const { gcpIam, tfIam } = await this.fetchIam(buckets, foldersById, projectsById);
    log.debug('Fetched IAM', { gcp: gcpIam.size, terraform: tfIam.size });

    const filteredGcpIam = filterIgnored(gcpIam, expanded);
    const filteredTfIam = filterIgnored(tfIam, expanded);

    const clickOpsUris = sortedDifference(
      sortedDifference(filteredGcpIam.keys(), filteredTfIam),
      ignored.iamAssets
    );
    const missingUris = sortedDifference(
      sortedDifference(filteredTfIam.keys(), filteredGcpIam),
      ignored.iamAssets
    );

    const clickOpsChanges = selectFrom(filterDefaultUris(clickOpsUris, this.uriFilters), gcpIam);
    const missingTerraformChanges = selectFrom(filterDefaultUris(missingUris, this.uriFilters), tfIam);
    log.debug('Computed IAM drift', {
      clickOps: clickOpsChanges.size,
      missingTerraform: missingTerraformChanges.size,
    });

    return { clickOpsChanges, missingTerraformChanges };
  }

  private async hierarchyAssets(bucketQuery: string): Promise<HierarchyAssets> {
    const pool = new WorkerPool<HierarchyAssets>({ concurrency: this.maxConcurrentRequests });
    pool.do(async () => ({
      folders: await stage('get folders', () =>
        this.assetInventory.hierarchyAssets(this.organizationId, FOLDER_ASSET_TYPE)
      ),
      projects: [],
      buckets: [],
    }));
    pool.do(async () => ({
      folders: [],
      projects: await stage('get projects', () =>
        this.assetInventory.hierarchyAssets(this.organizationId, PROJECT_ASSET_TYPE)
      ),
      buckets: [],
    }));
    pool.do(async () => ({
      folders: [],
      projects: [],
      buckets: await stage('determine terraform state GCS buckets', () =>
        this.assetInventory.buckets(this.organizationId, bucketQuery)
      ),
    }));

    const results = await pool.done();
    return {
      folders: results.flatMap(result => result.folders),
      projects: results.flatMap(result => result.projects),
      buckets: results.flatMap(result => result.buckets),
    };
  }

  /**
   * Live IAM and the IAM of every bucket's state files, fetched on one pool
   * so at most `maxConcurrentRequests` calls are in flight.
   */
  private async fetchIam(
    buckets: readonly string[],
    foldersById: ReadonlyMap<string, HierarchyNode>,
    projectsById: ReadonlyMap<string, HierarchyNode>
  ): Promise<{ gcpIam: Map<string, AssetIAM>; tfIam: Map<string, TerraformStateIAMSource> }> {
    const pool = new WorkerPool<IAMTaskResult>({ concurrency: this.maxConcurrentRequests });
    pool.do(async () => ({
      kind: 'gcp',
      grants: await stage('determine actual GCP IAM', () =>
        this.assetInventory.iam({
          scope: `organizations/${this.organizationId}`,
          assetTypes: [ORGANIZATION_ASSET_TYPE, FOLDER_ASSET_TYPE, PROJECT_ASSET_TYPE],
        })
      ),
    }));
    for (const bucket of buckets) {
      pool.do(async () => ({
        kind: 'terraform',
        byStateFile: await stage(`parse terraform states in GCS bucket ${bucket}`, async () => {
          const uris = await this.terraformParser.stateFileUris([bucket]);
          log.debug(`Found ${uris.length} state files`, { bucket });
          return this.terraformParser.processStates(uris);
        }),
      }));
    }

    const gcpIam = new Map<string, AssetIAM>();
    const tfIam = new Map<string, TerraformStateIAMSource>();
    for (const result of await pool.done()) {
      if (result.kind === 'gcp') {
        for (const grant of result.grants) {
          gcpIam.set(iamUri(grant, this.organizationId, foldersById, projectsById), grant);
        }
        continue;
      }
      for (const [stateFileUri, grants] of result.byStateFile) {
        for (const grant of grants) {
          tfIam.set(iamUri(grant, this.organizationId, foldersById, projectsById), { ...grant, stateFileUri });
        }
      }
    }
    return { gcpIam, tfIam };
  }
}

export interface CreateIAMDriftDetectorOptions {
  organizationId: string;
  maxConcurrentRequests?: number;
}

/**
 * Detector wired to the Cloud Asset API and Cloud Storage.
 */
export function createIAMDriftDetector(options: CreateIAMDriftDetectorOptions): IAMDriftDetector {
  return new IAMDriftDetector({
    organizationId: options.organizationId,
    maxConcurrentRequests: options.maxConcurrentRequests,
    assetInventory: new AssetInventoryClient(),
    terraformParser: new TerraformParser(new GoogleCloudStorage(), options.organizationId),
  });
}
