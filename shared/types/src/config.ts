/**
 * Driftwatch Configuration
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface GitHubIssueConfig {
  skip: boolean;
  token?: string;
  owner?: string;
  repo?: string;
  labels: string[];
  assignees: string[];
  commentMessageAppend?: string;
}

export interface DetectIamDriftConfig {
  organizationId: string;
  gcsBucketQuery: string;
  driftignoreFile: string;
  maxConcurrentRequests: number;
  logLevel: LogLevel;
  github: GitHubIssueConfig;
}

export interface EmptyStatefilesConfig {
  organizationId: string;
  gcsBucketQuery: string;
  maxConcurrentRequests: number;
  logLevel: LogLevel;
}
