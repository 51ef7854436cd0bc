/**
 * detect-iam-drift command
 *
 * Prints the drift report to stdout and keeps the GitHub drift issue in
 * sync with it.
 */

import type { DetectIamDriftConfig, IAMDrift } from '@driftwatch/shared-types';
import { ConfigurationError, DriftDetectionError, logger } from '@driftwatch/shared-utils';
import { createIAMDriftDetector } from '../drift/detector';
import { driftMessage, hasDrift } from '../drift/report';
import { GitHubDriftIssueService, type DriftIssueReporter } from '../github/issues';

export interface DriftDetector {
  detectDrift(bucketQuery: string, driftignoreFile: string): Promise<IAMDrift>;
}

export interface DetectIamDriftDependencies {
  detector: DriftDetector;
  issues?: DriftIssueReporter;
  write: (text: string) => void;
}

export function createDetectIamDriftDependencies(config: DetectIamDriftConfig): DetectIamDriftDependencies {
  const { token, owner, repo } = config.github;
  return {
    detector: createIAMDriftDetector({
      organizationId: config.organizationId,
      maxConcurrentRequests: config.maxConcurrentRequests,
    }),
    issues:
      config.github.skip || !token || !owner || !repo
        ? undefined
        : new GitHubDriftIssueService(token, { owner, repo }),
    write: text => process.stdout.write(text),
  };
}

export function issueComment(message: string, append?: string): string {
  return append ? `${message}\n\n${append}` : message;
}

/**
 * Returns the drift report, empty when there is no drift.
 */
export async function runDetectIamDrift(
  config: DetectIamDriftConfig,
  deps: DetectIamDriftDependencies
): Promise<string> {
  logger.debug('Running IAM drift detection', {
    organizationId: config.organizationId,
    gcsBucketQuery: config.gcsBucketQuery,
    driftignoreFile: config.driftignoreFile,
  });

  let drift: IAMDrift;
  try {
    drift = await deps.detector.detectDrift(config.gcsBucketQuery, config.driftignoreFile);
  } catch (error) {
    throw new DriftDetectionError('failed to detect drift', error);
  }

  const message = driftMessage(drift);
  if (message) {
    deps.write(`${message}\n`);
  }

  if (config.github.skip) {
    return message;
  }
  if (!deps.issues) {
    throw new ConfigurationError('GitHub issue reporting is enabled but no GitHub client is configured', 'iam-drift');
  }

  const { labels, assignees, commentMessageAppend } = config.github;
  if (hasDrift(drift)) {
    try {
      await deps.issues.createOrUpdateIssue(assignees, labels, issueComment(message, commentMessageAppend));
    } catch (error) {
      throw new DriftDetectionError('failed to create or update GitHub issue', error);
    }
  } else {
    try {
      await deps.issues.closeIssues(labels);
    } catch (error) {
      throw new DriftDetectionError('failed to close GitHub issues', error);
    }
  }
  return message;
}
