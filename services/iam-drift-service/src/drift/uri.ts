/**
 * Canonical IAM URIs
 *
 * Live and declared grants are compared by these strings, and the same
 * strings are what users see in reports and write into ignore files.
 */

import type { AssetIAM, HierarchyNode } from '@driftwatch/shared-types';

/**
 * Role with one `organizations/` and then one `<organizationId>/` removed,
 * so `organizations/123/roles/custom` becomes `roles/custom`.
 */
export function canonicalRole(role: string, organizationId: string): string {
  return role.replace('organizations/', '').replace(`${organizationId}/`, '');
}

export function iamUri(
  iam: AssetIAM,
  organizationId: string,
  foldersById: ReadonlyMap<string, HierarchyNode>,
  projectsById: ReadonlyMap<string, HierarchyNode>
): string {
  const role = canonicalRole(iam.role, organizationId);
  switch (iam.resourceType) {
    case 'Folder': {
      const name = foldersById.get(iam.resourceId)?.name ?? iam.resourceId;
      return `/organizations/${organizationId}/folders/${name}/${role}/${iam.member}`;
    }
    case 'Project': {
      const name = projectsById.get(iam.resourceId)?.name ?? iam.resourceId;
      return `/organizations/${organizationId}/projects/${name}/${role}/${iam.member}`;
    }
    case 'Organization':
      return `/organizations/${organizationId}/${role}/${iam.member}`;
    default:
      return `unknownParent:/organizations/${organizationId}/${iam.resourceType}/${iam.resourceId}/${role}/${iam.member}`;
  }
}

/**
 * Role and member only, e.g. `/roles/owner/user:dev@example.com`.
 */
export function roleUri(iam: AssetIAM): string {
  return `/${iam.role}/${iam.member}`;
}
