/**
 * Command Configuration
 *
 * Flags are merged with environment fallbacks and validated with zod.
 */

import { z } from 'zod';
import type { DetectIamDriftConfig, EmptyStatefilesConfig } from '@driftwatch/shared-types';
import { ConfigurationError, DEFAULT_CONCURRENCY, getEnvOptional } from '@driftwatch/shared-utils';
import { booleanFlag, parseFlags, stringFlag, type FlagValues } from './commands/flags';

export const DEFAULT_DRIFTIGNORE_FILE = '.driftignore';
export const DEFAULT_ISSUE_LABELS = 'iam-drift';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const CommaListSchema = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0));

const BaseConfigSchema = z.object({
  organizationId: z
    .string({ required_error: 'missing --organization-id' })
    .regex(/^\d+$/, 'organization ID must be numeric'),
  gcsBucketQuery: z.string().default(''),
  maxConcurrentRequests: z.coerce
    .number()
    .int('max concurrent requests must be an integer')
    .min(1, 'max concurrent requests must be at least 1')
    .default(DEFAULT_CONCURRENCY),
  logLevel: LogLevelSchema.default('info'),
});

export const EmptyStatefilesConfigSchema = BaseConfigSchema;

export const GitHubIssueConfigSchema = z
  .object({
    skip: z.boolean().default(false),
    token: z.string().optional(),
    owner: z.string().optional(),
    repo: z.string().optional(),
    labels: CommaListSchema.default(DEFAULT_ISSUE_LABELS),
    assignees: CommaListSchema.default(''),
    commentMessageAppend: z.string().optional(),
  })
  .superRefine((github, ctx) => {
    if (github.skip) {
      return;
    }
    for (const key of ['token', 'owner', 'repo'] as const) {
      if (!github[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `missing --github-${key} (required unless --skip-github-issue is set)`,
        });
      }
    }
    if (github.labels.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['labels'],
        message: 'at least one issue label is required',
      });
    }
  });

export const DetectIamDriftConfigSchema = BaseConfigSchema.extend({
  driftignoreFile: z.string().min(1).default(DEFAULT_DRIFTIGNORE_FILE),
  github: GitHubIssueConfigSchema,
});

const BASE_FLAGS = ['organization-id', 'gcs-bucket-query', 'max-concurrent-requests', 'log-level'] as const;

export const DETECT_IAM_DRIFT_FLAGS = {
  strings: [
    ...BASE_FLAGS,
    'driftignore-file',
    'github-token',
    'github-owner',
    'github-repo',
    'github-issue-labels',
    'github-issue-assignees',
    'github-comment-message-append',
  ],
  booleans: ['skip-github-issue'],
};

export const EMPTY_STATEFILES_FLAGS = {
  strings: [...BASE_FLAGS],
};

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`invalid configuration: ${issues.join('; ')}`, 'iam-drift', { issues });
  }
  return result.data;
}

function baseValues(flags: FlagValues) {
  return {
    organizationId: stringFlag(flags, 'organization-id') ?? getEnvOptional('DRIFTWATCH_ORGANIZATION_ID'),
    gcsBucketQuery: stringFlag(flags, 'gcs-bucket-query') ?? getEnvOptional('DRIFTWATCH_GCS_BUCKET_QUERY'),
    maxConcurrentRequests:
      stringFlag(flags, 'max-concurrent-requests') ?? getEnvOptional('DRIFTWATCH_MAX_CONCURRENT_REQUESTS'),
    logLevel: stringFlag(flags, 'log-level') ?? getEnvOptional('LOG_LEVEL'),
  };
}

export function loadDetectIamDriftConfig(args: readonly string[]): DetectIamDriftConfig {
  const flags = parseFlags(args, DETECT_IAM_DRIFT_FLAGS);
  return validate(DetectIamDriftConfigSchema, {
    ...baseValues(flags),
    driftignoreFile: stringFlag(flags, 'driftignore-file'),
    github: {
      skip: booleanFlag(flags, 'skip-github-issue'),
      token: stringFlag(flags, 'github-token') ?? getEnvOptional('GITHUB_TOKEN'),
      owner: stringFlag(flags, 'github-owner') ?? getEnvOptional('GITHUB_OWNER'),
      repo: stringFlag(flags, 'github-repo') ?? getEnvOptional('GITHUB_REPO'),
      labels: stringFlag(flags, 'github-issue-labels'),
      assignees: stringFlag(flags, 'github-issue-assignees'),
      commentMessageAppend: stringFlag(flags, 'github-comment-message-append'),
    },
  });
}

export function loadEmptyStatefilesConfig(args: readonly string[]): EmptyStatefilesConfig {
  const flags = parseFlags(args, EMPTY_STATEFILES_FLAGS);
  return validate(EmptyStatefilesConfigSchema, baseValues(flags));
}
