import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { USAGE, main } from '../main';

async function run(argv: string[]) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const code = await main(
    argv,
    text => stdout.push(text),
    text => stderr.push(text)
  );
  return { code, stdout: stdout.join(''), stderr: stderr.join('') };
}

describe('main', () => {
  let savedOrganizationId: string | undefined;

  beforeEach(() => {
    savedOrganizationId = process.env.DRIFTWATCH_ORGANIZATION_ID;
    delete process.env.DRIFTWATCH_ORGANIZATION_ID;
  });

  afterEach(() => {
    if (savedOrganizationId === undefined) {
      delete process.env.DRIFTWATCH_ORGANIZATION_ID;
    } else {
      process.env.DRIFTWATCH_ORGANIZATION_ID = savedOrganizationId;
    }
  });

  test.each(['help', '--help', '-h'])('%s prints usage', async command => {
    await expect(run([command])).resolves.toEqual({ code: 0, stdout: USAGE, stderr: '' });
  });

  test('prints usage and fails without a command', async () => {
    await expect(run([])).resolves.toEqual({ code: 1, stdout: '', stderr: USAGE });
  });

  test('rejects unknown commands', async () => {
    await expect(run(['deploy'])).resolves.toEqual({
      code: 1,
      stdout: '',
      stderr: `Unknown command: deploy\n\n${USAGE}`,
    });
  });

  test('reports configuration errors', async () => {
    await expect(run(['detect-iam-drift', '--skip-github-issue'])).resolves.toEqual({
      code: 1,
      stdout: '',
      stderr: 'Error: invalid configuration: organizationId: missing --organization-id\n',
    });
  });

  test('reports flag errors for empty-statefiles', async () => {
    await expect(run(['empty-statefiles', '--organization-id', '123', '--bogus'])).resolves.toEqual({
      code: 1,
      stdout: '',
      stderr: 'Error: unknown flag --bogus\n',
    });
  });
});
