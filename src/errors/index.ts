/**
 * Custom Error Classes
 *
 * Standardized error types for the dispatcher and the endpoint services.
 * Every failure a caller can see is one of these; throttling (429) is
 * absorbed by the dispatcher and never surfaces.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for invalid static configuration (rate windows, env vars)
 */
export class ConfigurationError extends AppError {
  constructor(message: string, public setting: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
  }
}

/**
 * Error for external API failures
 */
export class ApiError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error,
    code: string = 'API_ERROR'
  ) {
    super(message, code, statusCode, cause);
  }
}

/**
 * 404 from upstream. Terminal, never retried.
 */
export class NotFoundError extends ApiError {
  constructor(url: string) {
    super(`Resource not found: ${url}`, url, 404, undefined, 'NOT_FOUND');
  }
}

/**
 * 401/403 from upstream: the API key is missing, invalid or expired.
 */
export class UnauthorizedError extends ApiError {
  constructor(url: string, statusCode: 401 | 403) {
    super(`API key rejected (${statusCode}): ${url}`, url, statusCode, undefined, 'UNAUTHORIZED');
  }
}

/**
 * Any other non-2xx status. Carries the raw body for diagnostics.
 */
export class UnclassifiedApiError extends ApiError {
  constructor(url: string, statusCode: number, public body: string) {
    super(`API error ${statusCode}: ${body}`, url, statusCode, undefined, 'UNCLASSIFIED_API_ERROR');
  }
}

/**
 * Network-level failure (DNS, connection reset, timeout). No status was received.
 */
export class TransportError extends ApiError {
  constructor(message: string, url: string, cause?: Error) {
    super(message, url, 0, cause, 'TRANSPORT_ERROR');
  }
}

/**
 * 2xx response whose body does not have the expected shape
 */
export class ResponseValidationError extends ApiError {
  constructor(url: string, public issues: string[], cause?: Error) {
    super(`Unexpected response shape from ${url}: ${issues.join('; ')}`, url, 502, cause, 'RESPONSE_VALIDATION_ERROR');
  }
}

/**
 * A caller abandoned a suspended wait through its AbortSignal
 */
export class CancelledError extends AppError {
  constructor(message: string = 'Operation cancelled', cause?: Error) {
    super(message, 'CANCELLED', 499, cause);
  }
}
