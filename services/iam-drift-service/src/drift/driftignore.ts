/**
 * Drift Ignore List
 *
 * Parses `.driftignore` files and decides which grants are excluded from
 * drift results. Ignoring a folder ignores every folder and project beneath
 * it once the list has been expanded against the hierarchy graph.
 */

import { readFile } from 'node:fs/promises';
import type { AssetIAM, HierarchyGraph, HierarchyNode, IgnoredAssets } from '@driftwatch/shared-types';
import { DriftDetectionError, logger } from '@driftwatch/shared-utils';
import { assetsByName, foldersBeneath } from '../assets/hierarchy';
import { roleUri } from './uri';

const IGNORED_PROJECT_PATTERN = /^\/organizations\/(?:\d*)\/projects\/([^/]*)$/;
const IGNORED_FOLDER_PATTERN = /^\/organizations\/(?:\d*)\/folders\/([^/]*)$/;
const IGNORED_ROLE_PATTERN = /^\/roles\/([^/\s]*)\/(serviceAccount|group|user):([^/\s]*)$/;

const log = logger.child('driftignore');

export function emptyIgnoredAssets(): IgnoredAssets {
  return {
    iamAssets: new Set(),
    projectIds: new Set(),
    folderIds: new Set(),
    roles: new Set(),
  };
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function resolveAsset(
  nameOrId: string,
  byId: ReadonlyMap<string, HierarchyNode>,
  byName: ReadonlyMap<string, HierarchyNode>
): HierarchyNode | undefined {
  return byId.get(nameOrId) ?? byName.get(nameOrId);
}

/**
 * Parse ignore-file content. Every non-blank line is kept as a literal URI;
 * project, folder and role lines are also resolved into their sets.
 */
export function parseDriftignoreContent(
  content: string,
  knownFolders: ReadonlyMap<string, HierarchyNode>,
  knownProjects: ReadonlyMap<string, HierarchyNode>
): IgnoredAssets {
  const ignored = emptyIgnoredAssets();
  const foldersByName = assetsByName(knownFolders);
  const projectsByName = assetsByName(knownProjects);

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '') {
      continue;
    }
    ignored.iamAssets.add(line);

    const project = IGNORED_PROJECT_PATTERN.exec(line);
    if (project) {
      const asset = resolveAsset(project[1], knownProjects, projectsByName);
      if (asset) {
        ignored.projectIds.add(asset.id);
      } else {
        log.warn(`Ignored project ${project[1]} was not found in the organization`, { line });
      }
    }

    const folder = IGNORED_FOLDER_PATTERN.exec(line);
    if (folder) {
      const asset = resolveAsset(folder[1], knownFolders, foldersByName);
      if (asset) {
        ignored.folderIds.add(asset.id);
      } else {
        log.warn(`Ignored folder ${folder[1]} was not found in the organization`, { line });
      }
    }

    if (IGNORED_ROLE_PATTERN.test(line)) {
      ignored.roles.add(line);
    }
  }

  return ignored;
}

/**
 * Read and parse an ignore file. A missing file means nothing is ignored.
 */
export async function parseDriftignore(
  path: string,
  knownFolders: ReadonlyMap<string, HierarchyNode>,
  knownProjects: ReadonlyMap<string, HierarchyNode>
): Promise<IgnoredAssets> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isFileNotFound(error)) {
      log.debug(`No ignore file at ${path}`);
      return emptyIgnoredAssets();
    }
    throw new DriftDetectionError(`failed to read ignore file ${path}`, error, { path });
  }
  return parseDriftignoreContent(content, knownFolders, knownProjects);
}

/**
 * Propagate folder ignores to every descendant folder and to the projects
 * directly under any ignored folder. The input is left untouched.
 */
export function expandIgnoredAssets(ignored: IgnoredAssets, graph: HierarchyGraph): IgnoredAssets {
  const folderIds = new Set(ignored.folderIds);
  const projectIds = new Set(ignored.projectIds);

  for (const folderId of ignored.folderIds) {
    let beneath: Set<string>;
    try {
      beneath = foldersBeneath(folderId, graph);
    } catch (error) {
      throw new DriftDetectionError(`failed to traverse hierarchy for folder with ID ${folderId}`, error, {
        folderId,
      });
    }
    for (const id of beneath) {
      folderIds.add(id);
    }
  }

  for (const folderId of folderIds) {
    for (const projectId of graph.idToNodes.get(folderId)?.projectIds ?? []) {
      projectIds.add(projectId);
    }
  }

  return {
    iamAssets: new Set(ignored.iamAssets),
    projectIds,
    folderIds,
    roles: new Set(ignored.roles),
  };
}

export function isIgnored(iam: AssetIAM, ignored: IgnoredAssets): boolean {
  if (ignored.roles.has(roleUri(iam))) {
    return true;
  }
  switch (iam.resourceType) {
    case 'Project':
      return ignored.projectIds.has(iam.resourceId);
    case 'Folder':
      return ignored.folderIds.has(iam.resourceId);
    default:
      return false;
  }
}

export function filterIgnored<T extends AssetIAM>(
  values: ReadonlyMap<string, T>,
  ignored: IgnoredAssets
): Map<string, T> {
  const filtered = new Map<string, T>();
  for (const [uri, iam] of values) {
    if (!isIgnored(iam, ignored)) {
      filtered.set(uri, iam);
    }
  }
  return filtered;
}
