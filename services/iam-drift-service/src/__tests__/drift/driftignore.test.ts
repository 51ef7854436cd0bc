import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AssetIAM } from '@driftwatch/shared-types';
import { DriftDetectionError, MissingReferenceError, findCause } from '@driftwatch/shared-utils';
import { newHierarchyGraph } from '../../assets/hierarchy';
import {
  emptyIgnoredAssets,
  expandIgnoredAssets,
  filterIgnored,
  isIgnored,
  parseDriftignore,
  parseDriftignoreContent,
} from '../../drift/driftignore';
import { byId, folder, project } from '../helpers/fakes';

const ORG_ID = '123';

// 123 -> 1 (platform) -> 2 -> p1
//              \-> p3
//     -> 3 -> p2
const folders = byId([
  folder('1', ORG_ID, 'Organization', 'platform'),
  folder('2', '1', 'Folder', 'platform-prod'),
  folder('3', ORG_ID, 'Organization', 'sandbox'),
]);
const projects = byId([
  project('p1', 'app-prod', '2'),
  project('p2', 'sibling-proj', '3'),
  project('p3', 'direct', '1'),
]);
const graph = newHierarchyGraph(ORG_ID, folders, projects);

const IGNORE_FILE = [
  '/organizations/123/folders/platform',
  '/organizations/123/projects/sibling-proj',
  '/organizations/123/projects/does-not-exist',
  '  /roles/owner/user:admin@example.com  ',
  '',
  '/organizations/123/roles/browser/group:g@example.com',
  '# not a comment',
].join('\n');

function grant(overrides: Partial<AssetIAM>): AssetIAM {
  return { resourceId: ORG_ID, resourceType: 'Organization', member: 'user:a@example.com', role: 'roles/viewer', ...overrides };
}

describe('parseDriftignoreContent', () => {
  const ignored = parseDriftignoreContent(IGNORE_FILE, folders, projects);

  test('keeps every non-blank trimmed line', () => {
    expect(ignored.iamAssets).toEqual(
      new Set([
        '/organizations/123/folders/platform',
        '/organizations/123/projects/sibling-proj',
        '/organizations/123/projects/does-not-exist',
        '/roles/owner/user:admin@example.com',
        '/organizations/123/roles/browser/group:g@example.com',
        '# not a comment',
      ])
    );
  });

  test('resolves folders and projects by name', () => {
    expect(ignored.folderIds).toEqual(new Set(['1']));
    expect(ignored.projectIds).toEqual(new Set(['p2']));
  });

  test('collects role and member pairs', () => {
    expect(ignored.roles).toEqual(new Set(['/roles/owner/user:admin@example.com']));
  });

  test('resolves IDs before names', () => {
    const byIdOnly = parseDriftignoreContent('/organizations/123/folders/3\n/organizations/123/projects/p1', folders, projects);

    expect(byIdOnly.folderIds).toEqual(new Set(['3']));
    expect(byIdOnly.projectIds).toEqual(new Set(['p1']));
  });

  test('handles CRLF line endings', () => {
    const crlf = parseDriftignoreContent('/roles/viewer/group:g@example.com\r\n', folders, projects);

    expect(crlf.roles).toEqual(new Set(['/roles/viewer/group:g@example.com']));
  });

  test('role lines need a known member type', () => {
    const other = parseDriftignoreContent('/roles/viewer/domain:example.com', folders, projects);

    expect(other.roles.size).toBe(0);
    expect(other.iamAssets).toEqual(new Set(['/roles/viewer/domain:example.com']));
  });
});

describe('parseDriftignore', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'driftignore-'));
    await writeFile(join(dir, '.driftignore'), IGNORE_FILE);
    await mkdir(join(dir, 'not-a-file'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reads the ignore file', async () => {
    const ignored = await parseDriftignore(join(dir, '.driftignore'), folders, projects);

    expect(ignored.folderIds).toEqual(new Set(['1']));
    expect(ignored.iamAssets.size).toBe(6);
  });

  test('treats a missing file as an empty ignore list', async () => {
    await expect(parseDriftignore(join(dir, 'missing'), folders, projects)).resolves.toEqual(emptyIgnoredAssets());
  });

  test('fails on other read errors', async () => {
    await expect(parseDriftignore(join(dir, 'not-a-file'), folders, projects)).rejects.toThrow(
      `failed to read ignore file ${join(dir, 'not-a-file')}`
    );
  });
});

describe('expandIgnoredAssets', () => {
  const ignored = parseDriftignoreContent(IGNORE_FILE, folders, projects);
  const expanded = expandIgnoredAssets(ignored, graph);

  test('adds every folder beneath an ignored folder', () => {
    expect(expanded.folderIds).toEqual(new Set(['1', '2']));
  });

  test('adds projects under ignored folders and their descendants only', () => {
    expect(expanded.projectIds).toEqual(new Set(['p2', 'p3', 'p1']));
    expect(expanded.folderIds.has('3')).toBe(false);
  });

  test('keeps literal lines and roles', () => {
    expect(expanded.iamAssets).toEqual(ignored.iamAssets);
    expect(expanded.roles).toEqual(ignored.roles);
  });

  test('does not mutate its input', () => {
    expect(ignored.folderIds).toEqual(new Set(['1']));
    expect(ignored.projectIds).toEqual(new Set(['p2']));
  });

  test('fails for folders outside the graph', () => {
    const unknown = emptyIgnoredAssets();
    unknown.folderIds.add('404');

    let thrown: unknown;
    try {
      expandIgnoredAssets(unknown, graph);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(DriftDetectionError);
    expect(findCause(thrown, MissingReferenceError)?.referenceId).toBe('404');
  });
});

describe('isIgnored', () => {
  const expanded = expandIgnoredAssets(parseDriftignoreContent(IGNORE_FILE, folders, projects), graph);

  test('matches role and member on any resource', () => {
    expect(isIgnored(grant({ role: 'roles/owner', member: 'user:admin@example.com' }), expanded)).toBe(true);
    expect(
      isIgnored(grant({ resourceId: 'p2', resourceType: 'Project', role: 'roles/owner', member: 'user:admin@example.com' }), expanded)
    ).toBe(true);
  });

  test('matches ignored projects and folders', () => {
    expect(isIgnored(grant({ resourceId: 'p1', resourceType: 'Project' }), expanded)).toBe(true);
    expect(isIgnored(grant({ resourceId: '2', resourceType: 'Folder' }), expanded)).toBe(true);
    expect(isIgnored(grant({ resourceId: '3', resourceType: 'Folder' }), expanded)).toBe(false);
  });

  test('never matches organization or unknown grants by ID', () => {
    expect(isIgnored(grant({}), expanded)).toBe(false);
    expect(isIgnored(grant({ resourceId: 'p1', resourceType: 'Unknown' }), expanded)).toBe(false);
  });
});

describe('filterIgnored', () => {
  test('drops ignored grants and keeps the rest in order', () => {
    const expanded = expandIgnoredAssets(parseDriftignoreContent(IGNORE_FILE, folders, projects), graph);
    const values = new Map([
      ['a', grant({ resourceId: 'p1', resourceType: 'Project' })],
      ['b', grant({})],
      ['c', grant({ resourceId: '3', resourceType: 'Folder' })],
    ]);

    expect([...filterIgnored(values, expanded).keys()]).toEqual(['b', 'c']);
  });
});
