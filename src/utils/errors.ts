/**
 * Error Handling Utilities
 *
 * Typed registry errors. Every registry operation either completes or throws
 * one of these before writing anything.
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed input: empty strings, out-of-range numbers, unknown enum values
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }
}

/**
 * Unknown alert or neighborhood id, or unregistered identity
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string | number) {
    const message = identifier !== undefined
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.resource = resource;
  }
}

/**
 * Duplicate registration, response or verification
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

/**
 * Operation not allowed in the record's current state
 */
export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_STATE', 409);
  }
}

/**
 * Caller lacks the required role, ownership or reputation
 */
export class AuthorizationError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 'FORBIDDEN', 403);
  }
}

/**
 * Request carries no usable caller identity
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

/**
 * Request body over the size limit
 */
export class PayloadTooLargeError extends AppError {
  constructor(message: string = 'Request body too large') {
    super(message, 'PAYLOAD_TOO_LARGE', 413);
  }
}

/**
 * Format error for API response
 */
export function formatApiError(error: unknown): {
  status: number;
  body: { error: string; code: string; field?: string };
} {
  if (error instanceof ValidationError && error.field !== undefined) {
    return {
      status: error.statusCode,
      body: {
        error: error.message,
        code: error.code,
        field: error.field,
      },
    };
  }

  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        error: error.message,
        code: error.code,
      },
    };
  }

  // Don't expose internal error details
  return {
    status: 500,
    body: {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
    },
  };
}

/**
 * Log error without exposing sensitive data
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const safeContext = { ...context };
  const sensitiveFields = ['contactInfo', 'contact_info', 'apiKey', 'secret'];

  for (const field of sensitiveFields) {
    if (field in safeContext) {
      safeContext[field] = '[REDACTED]';
    }
  }

  if (error instanceof AppError) {
    const details = {
      ...safeContext,
      errorCode: error.code,
      statusCode: error.statusCode,
      message: error.message,
    };
    if (error.isOperational) {
      logger.warn(details, 'Application error');
    } else {
      logger.error(details, 'Application error');
    }
  } else if (error instanceof Error) {
    logger.error(
      {
        ...safeContext,
        message: error.message,
        name: error.name,
        stack: error.stack,
      },
      'Unexpected error'
    );
  } else {
    logger.error(
      {
        ...safeContext,
        error: String(error),
      },
      'Unknown error'
    );
  }
}
