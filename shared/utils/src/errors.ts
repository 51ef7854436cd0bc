export interface ServiceError {
  code: string;
  message: string;
  service: string;
  timestamp: string;
  details?: unknown;
  cause?: string;
  stack?: string;
}

export interface DriftwatchErrorOptions {
  cause?: unknown;
}

/**
 * Base Driftwatch Error
 */
export class DriftwatchError extends Error {
  code: string;
  service: string;
  timestamp: string;
  details?: unknown;

  constructor(
    message: string,
    code: string,
    service: string,
    details?: unknown,
    options?: DriftwatchErrorOptions
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DriftwatchError';
    this.code = code;
    this.service = service;
    this.timestamp = new Date().toISOString();
    this.details = details;
  }

  toJSON(): ServiceError {
    return {
      code: this.code,
      message: this.message,
      service: this.service,
      timestamp: this.timestamp,
      details: this.details,
      cause: this.cause === undefined ? undefined : formatErrorChain(this.cause),
      stack: this.stack,
    };
  }
}

export class ValidationError extends DriftwatchError {
  constructor(message: string, service: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', service, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends DriftwatchError {
  constructor(message: string, service: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', service, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A hierarchy node points at a parent (or a folder is requested) that is not
 * part of the resource graph.
 */
export class MissingReferenceError extends DriftwatchError {
  referenceType: string;
  referenceId: string;

  constructor(referenceType: string, referenceId: string) {
    super(
      `missing reference for ${referenceType} with ID ${referenceId}`,
      'MISSING_REFERENCE',
      'iam-drift',
      { referenceType, referenceId }
    );
    this.name = 'MissingReferenceError';
    this.referenceType = referenceType;
    this.referenceId = referenceId;
  }
}

export class StateFileError extends DriftwatchError {
  constructor(message: string, details?: unknown, options?: DriftwatchErrorOptions) {
    super(message, 'STATE_FILE_ERROR', 'iam-drift', details, options);
    this.name = 'StateFileError';
  }
}

export class DriftDetectionError extends DriftwatchError {
  constructor(message: string, cause: unknown, details?: unknown) {
    super(message, 'DRIFT_DETECTION_ERROR', 'iam-drift', details, { cause });
    this.name = 'DriftDetectionError';
  }
}

/**
 * Messages along the cause chain, outermost first.
 */
export function errorChain(error: unknown): string[] {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      break;
    }
  }
  return messages;
}

export function formatErrorChain(error: unknown): string {
  return errorChain(error).join(': ');
}

/**
 * First error in the cause chain that is an instance of `errorClass`.
 */
export function findCause<E extends Error>(
  error: unknown,
  errorClass: abstract new (...args: never[]) => E
): E | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}
