/**
 * IAM Drift Service
 *
 * Detects IAM drift between Terraform state and a GCP organization.
 */

// Resource hierarchy
export * from './assets/hierarchy';
export * from './assets/inventory';

// Object storage
export * from './storage';

// Terraform state
export * from './terraform/parser';

// Drift detection
export * from './drift/uri';
export * from './drift/driftignore';
export * from './drift/default-filters';
export * from './drift/detector';
export * from './drift/report';

// Reporting and commands
export * from './github/issues';
export * from './config';
export { runDetectIamDrift, type DetectIamDriftDependencies } from './commands/detect-iam-drift';
export { runEmptyStatefiles, type EmptyStatefilesDependencies } from './commands/empty-statefiles';
export { main } from './main';
