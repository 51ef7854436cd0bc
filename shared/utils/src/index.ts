// Logger
export { logger, Logger, isLogLevel } from './logger';

// Errors
export * from './errors';

// Environment helpers
export * from './env';

// Bounded concurrency
export * from './worker-pool';
