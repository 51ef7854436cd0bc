import type { IAMDrift } from '@driftwatch/shared-types';

function section(heading: string, uris: Iterable<string>): string {
  return `${heading} \n> ${[...uris].sort().join('\n> ')}`;
}

/**
 * Human-readable drift summary, empty when nothing drifted.
 */
export function driftMessage(drift: IAMDrift): string {
  const sections: string[] = [];
  if (drift.clickOpsChanges.size > 0) {
    sections.push(section('Found Click Ops Changes', drift.clickOpsChanges.keys()));
  }
  if (drift.missingTerraformChanges.size > 0) {
    sections.push(section('Found Missing Terraform Changes', drift.missingTerraformChanges.keys()));
  }
  return sections.join('\n\n');
}

export function hasDrift(drift: IAMDrift): boolean {
  return drift.clickOpsChanges.size > 0 || drift.missingTerraformChanges.size > 0;
}

export function emptyStatefilesMessage(uris: readonly string[]): string {
  return uris.length > 0 ? section('Found empty statefiles', uris) : '';
}
