/**
 * empty-statefiles command
 *
 * Lists Terraform state files in the matched buckets that no longer declare
 * any resources.
 */

import type { EmptyStatefilesConfig } from '@driftwatch/shared-types';
import { DriftDetectionError } from '@driftwatch/shared-utils';
import { AssetInventoryClient, type AssetInventory } from '../assets/inventory';
import { emptyStatefilesMessage } from '../drift/report';
import { GoogleCloudStorage } from '../storage';
import { TerraformParser, findEmptyStateFiles, type TerraformStateParser } from '../terraform/parser';

export interface EmptyStatefilesDependencies {
  assetInventory: AssetInventory;
  terraformParser: TerraformStateParser;
  write: (text: string) => void;
}

export function createEmptyStatefilesDependencies(config: EmptyStatefilesConfig): EmptyStatefilesDependencies {
  return {
    assetInventory: new AssetInventoryClient(),
    terraformParser: new TerraformParser(new GoogleCloudStorage(), config.organizationId),
    write: text => process.stdout.write(text),
  };
}

/**
 * Returns the `gs://` URIs of the empty state files.
 */
export async function runEmptyStatefiles(
  config: EmptyStatefilesConfig,
  deps: EmptyStatefilesDependencies
): Promise<string[]> {
  let uris: string[];
  try {
    const buckets = await deps.assetInventory.buckets(config.organizationId, config.gcsBucketQuery);
    uris = await deps.terraformParser.stateFileUris(buckets);
  } catch (error) {
    throw new DriftDetectionError('failed to list state files', error);
  }

  let empty: string[];
  try {
    empty = await findEmptyStateFiles(deps.terraformParser, uris, config.maxConcurrentRequests);
  } catch (error) {
    throw new DriftDetectionError('failed to inspect state files', error);
  }

  const message = emptyStatefilesMessage(empty);
  if (message) {
    deps.write(`${message}\n`);
  }
  return empty;
}
