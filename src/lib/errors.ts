/**
 * Error types for ixr with discriminated unions using _tag property
 * These error types follow the Effect pattern for type-safe error handling
 */

/**
 * Configuration-related errors (missing config, invalid config path)
 */
export class ConfigError extends Error {
  readonly _tag = 'ConfigError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * File system operation errors
 */
export class FileSystemError extends Error {
  readonly _tag = 'FileSystemError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'FileSystemError';
  }
}

/**
 * JSON parsing errors
 */
export class ParseError extends Error {
  readonly _tag = 'ParseError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Schema validation errors
 */
export class ValidationError extends Error {
  readonly _tag = 'ValidationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Inventory record could not be read or has no usable identity
 */
export class RecordError extends Error {
  readonly _tag = 'RecordError' as const;
  readonly source: string;

  constructor(source: string, message: string) {
    super(message);
    this.name = 'RecordError';
    this.source = source;
  }
}

/**
 * Rejected credentials (401, 403)
 */
export class ServiceAuthError extends Error {
  readonly _tag = 'ServiceAuthError' as const;
  readonly service: string;
  readonly statusCode: number;

  constructor(service: string, message: string, statusCode: number) {
    super(message);
    this.name = 'ServiceAuthError';
    this.service = service;
    this.statusCode = statusCode;
  }
}

/**
 * Request exceeded the configured timeout
 */
export class ServiceTimeoutError extends Error {
  readonly _tag = 'ServiceTimeoutError' as const;
  readonly service: string;
  readonly timeoutMs: number;

  constructor(service: string, timeoutMs: number) {
    super(`Request to ${service} timed out after ${timeoutMs}ms`);
    this.name = 'ServiceTimeoutError';
    this.service = service;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * DNS, connection or TLS failures
 */
export class ServiceUnreachableError extends Error {
  readonly _tag = 'ServiceUnreachableError' as const;
  readonly service: string;

  constructor(service: string, message: string) {
    super(message);
    this.name = 'ServiceUnreachableError';
    this.service = service;
  }
}

/**
 * Unexpected status or malformed upstream payload
 */
export class ServiceResponseError extends Error {
  readonly _tag = 'ServiceResponseError' as const;
  readonly service: string;
  readonly statusCode: number;

  constructor(service: string, message: string, statusCode: number) {
    super(message);
    this.name = 'ServiceResponseError';
    this.service = service;
    this.statusCode = statusCode;
  }
}

/**
 * Errors a search service may fail with. The aggregator absorbs all of them.
 */
export type ServiceError = ServiceAuthError | ServiceTimeoutError | ServiceUnreachableError | ServiceResponseError;

/**
 * Union type of all error types for comprehensive error handling
 */
export type IxrError =
  | ConfigError
  | FileSystemError
  | ParseError
  | ValidationError
  | RecordError
  | ServiceError;

export function isServiceError(error: unknown): error is ServiceError {
  return (
    error instanceof ServiceAuthError ||
    error instanceof ServiceTimeoutError ||
    error instanceof ServiceUnreachableError ||
    error instanceof ServiceResponseError
  );
}

export function isIxrError(error: unknown): error is IxrError {
  return (
    error instanceof ConfigError ||
    error instanceof FileSystemError ||
    error instanceof ParseError ||
    error instanceof ValidationError ||
    error instanceof RecordError ||
    isServiceError(error)
  );
}

/**
 * Exit codes for CLI
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  CONFIG_ERROR: 2,
  AUTH_ERROR: 3,
  NETWORK_ERROR: 4,
  INVALID_ARGUMENTS: 6,
  RECORD_ERROR: 7,
} as const;

/**
 * Get exit code for a given error
 */
export function getExitCodeForError(error: IxrError): number {
  switch (error._tag) {
    case 'ConfigError':
    case 'ValidationError':
      return EXIT_CODES.CONFIG_ERROR;
    case 'RecordError':
      return EXIT_CODES.RECORD_ERROR;
    case 'ServiceAuthError':
      return EXIT_CODES.AUTH_ERROR;
    case 'ServiceTimeoutError':
    case 'ServiceUnreachableError':
    case 'ServiceResponseError':
      return EXIT_CODES.NETWORK_ERROR;
    default:
      return EXIT_CODES.GENERAL_ERROR;
  }
}
