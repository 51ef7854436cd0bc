/**
 * GitHub Drift Issues
 *
 * Keeps a single open, labelled issue per repository in sync with the
 * latest drift report.
 */

import { Octokit } from '@octokit/rest';
import { ValidationError, logger } from '@driftwatch/shared-utils';

export const ISSUE_TITLE = 'IAM drift detected';

export const ISSUE_BODY = `We've detected a drift between your submitted IAM policies and actual IAM policies.

See the comment(s) below to see details of the drift.

Please determine which parts are correct, and submit updated terraform config and/or remove the extra policies.

Re-run drift detection manually once complete to verify all diffs are properly resolved.`;

export const RESOLVED_COMMENT = 'Drift Resolved.';

const log = logger.child('github');

export interface GitHubRepository {
  owner: string;
  repo: string;
}

export interface DriftIssueReporter {
  createOrUpdateIssue(assignees: string[], labels: string[], message: string): Promise<number>;
  closeIssues(labels: string[]): Promise<number[]>;
}

function requireLabels(labels: string[]): void {
  if (labels.length === 0) {
    throw new ValidationError("invalid argument - at least one 'label' must be provided", 'github', { labels });
  }
}

export class GitHubDriftIssueService implements DriftIssueReporter {
  private octokit: Octokit;
  private owner: string;
  private repo: string;

  constructor(token: string, repository: GitHubRepository) {
    this.octokit = new Octokit({ auth: token });
    this.owner = repository.owner;
    this.repo = repository.repo;
  }

  /**
   * Comment `message` on the open drift issue, creating it first when there
   * is none. Returns the issue number.
   */
  async createOrUpdateIssue(assignees: string[], labels: string[], message: string): Promise<number> {
    requireLabels(labels);

    const [existing] = await this.openIssueNumbers(labels);
    let issueNumber: number;
    if (existing === undefined) {
      const { data } = await this.octokit.issues.create({
        owner: this.owner,
        repo: this.repo,
        title: ISSUE_TITLE,
        body: ISSUE_BODY,
        assignees,
        labels,
      });
      issueNumber = data.number;
      log.info(`Created drift issue #${issueNumber} in ${this.owner}/${this.repo}`);
    } else {
      issueNumber = existing;
    }

    await this.octokit.issues.createComment({
      owner: this.owner,
      repo: this.repo,
      issue_number: issueNumber,
      body: message,
    });
    return issueNumber;
  }

  /**
   * Mark every open drift issue as resolved and close it. Returns the closed
   * issue numbers.
   */
  async closeIssues(labels: string[]): Promise<number[]> {
    requireLabels(labels);

    const issueNumbers = await this.openIssueNumbers(labels);
    for (const issueNumber of issueNumbers) {
      await this.octokit.issues.createComment({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        body: RESOLVED_COMMENT,
      });
      await this.octokit.issues.update({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        state: 'closed',
      });
      log.info(`Closed drift issue #${issueNumber} in ${this.owner}/${this.repo}`);
    }
    return issueNumbers;
  }

  private async openIssueNumbers(labels: string[]): Promise<number[]> {
    const issues = await this.octokit.paginate(this.octokit.issues.listForRepo, {
      owner: this.owner,
      repo: this.repo,
      labels: labels.join(','),
      state: 'open',
      per_page: 100,
    });
    return issues.filter(issue => !issue.pull_request).map(issue => issue.number);
  }
}
