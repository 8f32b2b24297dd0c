/**
 * Custom Error Classes
 *
 * Standardized error types for fetch-and-parse cycles. Every one of them is
 * caught at the cycle boundary and collapsed into a message string.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures on caller input (season years, team ids)
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

/**
 * Error for connectivity failures, timeouts and non-2xx responses
 *
 * statusCode is 0 when no response was received.
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error
  ) {
    super(message, 'NETWORK_ERROR', cause);
  }
}

/**
 * Error for response bodies that are not valid JSON
 */
export class DecodeError extends AppError {
  constructor(message: string, public url: string, cause?: Error) {
    super(message, 'DECODE_ERROR', cause);
  }
}

/**
 * Error for well-formed payloads that lack the fields we need
 */
export class SchemaError extends AppError {
  constructor(message: string, public resource: 'standings' | 'roster') {
    super(message, 'SCHEMA_ERROR');
  }
}

/**
 * Turns any thrown value into a message suitable for the status line
 */
export function describeError(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  const text = String(err);
  return text || 'Unknown error';
}
