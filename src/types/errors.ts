/**
 * Centralized error type definitions for relnotes
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Upstream / fetch errors
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED',
  TRANSIENT_FETCH = 'TRANSIENT_FETCH',
  UPSTREAM_REQUEST = 'UPSTREAM_REQUEST',

  // Normalization
  MALFORMED_SOURCE = 'MALFORMED_SOURCE',

  // Store
  STORE_PERMISSION = 'STORE_PERMISSION',
  STORE_PATH = 'STORE_PATH',

  // Invocation-level
  INVALID_SELECTOR = 'INVALID_SELECTOR',
  CONFIGURATION = 'CONFIGURATION',

  INTERNAL = 'INTERNAL',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isRetryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isRetryable: boolean = false,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isRetryable = isRetryable;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The requested identifier does not exist upstream. Reported, never retried.
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, false, { resource, identifier, ...context });
  }
}

/**
 * Upstream throttled the request. `retryAfterSeconds` is set when the upstream said how long to wait.
 */
export class RateLimitedError extends AppError {
  public readonly retryAfterSeconds?: number;

  constructor(message: string = 'Upstream rate limit exceeded', retryAfterSeconds?: number, context?: Record<string, unknown>) {
    super(message, ErrorCode.RATE_LIMITED, true, { retryAfterSeconds, ...context });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Network failure, timeout or 5xx response.
 */
export class TransientFetchError extends AppError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, context?: Record<string, unknown>) {
    super(message, ErrorCode.TRANSIENT_FETCH, true, { statusCode, ...context });
    this.statusCode = statusCode;
  }
}

/**
 * Any other HTTP failure that retrying cannot fix (401, 403 without rate limit headers, 410, ...).
 */
export class UpstreamRequestError extends AppError {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, context?: Record<string, unknown>) {
    super(message, ErrorCode.UPSTREAM_REQUEST, false, { statusCode, ...context });
    this.statusCode = statusCode;
  }
}

export class MalformedSourceError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.MALFORMED_SOURCE, false, context);
  }
}

export class StorePermissionError extends AppError {
  constructor(path: string, cause?: unknown) {
    super(
      `Permission denied writing to ${path}`,
      ErrorCode.STORE_PERMISSION,
      false,
      { path, cause: cause instanceof Error ? cause.message : cause }
    );
  }
}

export class StorePathError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.STORE_PATH, false, context);
  }
}

/**
 * The selector cannot be served by the chosen source. Aborts the invocation.
 */
export class InvalidSelectorError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_SELECTOR, false, context);
  }
}

/**
 * Invalid environment, configuration file or unusable store root. Aborts the invocation.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION, false, context);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Errors that abort the whole invocation instead of a single identifier
 */
export function isInvocationError(error: unknown): error is InvalidSelectorError | ConfigurationError {
  return error instanceof InvalidSelectorError || error instanceof ConfigurationError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL, false, { originalName: error.name });
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL, false, { originalError: String(error) });
}

/**
 * The `code` property of a Node.js system error (ENOENT, EACCES, ...) or of an axios error
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
