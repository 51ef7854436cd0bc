/**
 * Command dispatch for the driftwatch CLI
 */

import { formatErrorChain, logger } from '@driftwatch/shared-utils';
import { loadDetectIamDriftConfig, loadEmptyStatefilesConfig } from './config';
import { createDetectIamDriftDependencies, runDetectIamDrift } from './commands/detect-iam-drift';
import { createEmptyStatefilesDependencies, runEmptyStatefiles } from './commands/empty-statefiles';

export const USAGE = `Usage: driftwatch <command> [options]

Commands:
  detect-iam-drift   Compare Terraform state IAM with the IAM applied in a GCP organization
  empty-statefiles   List Terraform state files that declare no resources

detect-iam-drift options:
  --organization-id <id>                 GCP organization ID (required)
  --gcs-bucket-query <query>             Asset query selecting buckets with Terraform state, e.g. labels.terraform:*
  --driftignore-file <path>              Ignore file (default: .driftignore)
  --max-concurrent-requests <n>          Concurrent GCP requests (default: 10)
  --skip-github-issue                    Do not create, update or close GitHub issues
  --github-token <token>                 GitHub token (or GITHUB_TOKEN)
  --github-owner <owner>                 Repository owner (or GITHUB_OWNER)
  --github-repo <repo>                   Repository name (or GITHUB_REPO)
  --github-issue-labels <a,b>            Labels of the drift issue (default: iam-drift)
  --github-issue-assignees <a,b>         Assignees of a new drift issue
  --github-comment-message-append <text> Text appended to drift comments
  --log-level <level>                    debug, info, warn or error

empty-statefiles options:
  --organization-id, --gcs-bucket-query, --max-concurrent-requests, --log-level
`;

export type Writer = (text: string) => void;

/**
 * Run a command and return the process exit code.
 */
export async function main(
  argv: readonly string[],
  stdout: Writer = text => process.stdout.write(text),
  stderr: Writer = text => process.stderr.write(text)
): Promise<number> {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case 'detect-iam-drift': {
        const config = loadDetectIamDriftConfig(args);
        logger.setLevel(config.logLevel);
        await runDetectIamDrift(config, { ...createDetectIamDriftDependencies(config), write: stdout });
        return 0;
      }

      case 'empty-statefiles': {
        const config = loadEmptyStatefilesConfig(args);
        logger.setLevel(config.logLevel);
        await runEmptyStatefiles(config, { ...createEmptyStatefilesDependencies(config), write: stdout });
        return 0;
      }

      case 'help':
      case '--help':
      case '-h':
        stdout(USAGE);
        return 0;

      default:
        stderr(command ? `Unknown command: ${command}\n\n${USAGE}` : USAGE);
        return 1;
    }
  } catch (error) {
    logger.debug('Command failed', error);
    stderr(`Error: ${formatErrorChain(error)}\n`);
    return 1;
  }
}
