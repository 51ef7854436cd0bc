/**
 * Resource Hierarchy Graph
 *
 * Builds the organization -> folders -> projects tree from asset inventory
 * results and answers subtree queries over it.
 */

import type { HierarchyGraph, HierarchyNode, HierarchyNodeWithChildren } from '@driftwatch/shared-types';
import { MissingReferenceError } from '@driftwatch/shared-utils';

export const ORGANIZATION_NODE_NAME = 'Organization';

/**
 * Build the hierarchy graph for an organization.
 *
 * Folders are inserted after their whole ancestor chain, so input order does
 * not matter. Throws MissingReferenceError when a folder or project points at
 * a parent that is neither in the graph nor in the folder set, or when a
 * folder chain loops back on itself.
 */
export function newHierarchyGraph(
  organizationId: string,
  foldersById: ReadonlyMap<string, HierarchyNode>,
  projectsById: ReadonlyMap<string, HierarchyNode>
): HierarchyGraph {
  const idToNodes = new Map<string, HierarchyNodeWithChildren>();
  idToNodes.set(organizationId, {
    node: {
      id: organizationId,
      name: ORGANIZATION_NODE_NAME,
      parentId: '',
      parentType: '',
      nodeType: 'Organization',
    },
    projectIds: [],
    folderIds: [],
  });

  for (const folder of foldersById.values()) {
    addFolderToGraph(folder, foldersById, idToNodes, new Set());
  }

  for (const project of projectsById.values()) {
    const parent = idToNodes.get(project.parentId);
    if (!parent) {
      throw new MissingReferenceError(
        (project.parentType || 'parent').toLowerCase(),
        project.parentId
      );
    }
    parent.projectIds.push(project.id);
  }

  return { idToNodes };
}

function addFolderToGraph(
  folder: HierarchyNode,
  foldersById: ReadonlyMap<string, HierarchyNode>,
  idToNodes: Map<string, HierarchyNodeWithChildren>,
  visiting: Set<string>
): void {
  if (idToNodes.has(folder.id)) {
    return;
  }
  visiting.add(folder.id);

  if (!idToNodes.has(folder.parentId)) {
    const parent = foldersById.get(folder.parentId);
    if (!parent || visiting.has(parent.id)) {
      throw new MissingReferenceError('folder', folder.parentId);
    }
    addFolderToGraph(parent, foldersById, idToNodes, visiting);
  }

  const parentEntry = idToNodes.get(folder.parentId);
  if (!parentEntry) {
    throw new MissingReferenceError('folder', folder.parentId);
  }
  parentEntry.folderIds.push(folder.id);
  idToNodes.set(folder.id, { node: folder, projectIds: [], folderIds: [] });
}

/**
 * IDs of every folder below `folderId`, not including `folderId` itself.
 */
export function foldersBeneath(folderId: string, graph: HierarchyGraph): Set<string> {
  const start = graph.idToNodes.get(folderId);
  if (!start) {
    throw new MissingReferenceError('folder', folderId);
  }

  const found = new Set<string>();
  const stack = [...start.folderIds];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || found.has(id)) {
      continue;
    }
    found.add(id);
    const entry = graph.idToNodes.get(id);
    if (!entry) {
      throw new MissingReferenceError('folder', id);
    }
    stack.push(...entry.folderIds);
  }
  return found;
}

export function assetsByName(assets: ReadonlyMap<string, HierarchyNode>): Map<string, HierarchyNode> {
  const byName = new Map<string, HierarchyNode>();
  for (const asset of assets.values()) {
    byName.set(asset.name, asset);
  }
  return byName;
}

/**
 * Union of two by-ID maps; entries of `second` win on collision.
 */
export function mergeAssets(
  first: ReadonlyMap<string, HierarchyNode>,
  second: ReadonlyMap<string, HierarchyNode>
): Map<string, HierarchyNode> {
  return new Map([...first, ...second]);
}

export function assetsById(assets: readonly HierarchyNode[]): Map<string, HierarchyNode> {
  return new Map(assets.map(asset => [asset.id, asset]));
}
