import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => {
  const mockLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: mockLogger, createChildLogger: () => mockLogger };
});

import {
  AuthorizationError,
  ConflictError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  formatApiError,
  logError,
} from '../../src/utils/errors.js';
import { logger } from '../../src/utils/logger.js';

describe('errors', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('formatApiError', () => {
    it.each([
      [new ValidationError('radius out of range'), 400, 'VALIDATION_ERROR'],
      [new UnauthorizedError(), 401, 'UNAUTHORIZED'],
      [new AuthorizationError('Only the owner'), 403, 'FORBIDDEN'],
      [new NotFoundError('Alert', 3), 404, 'NOT_FOUND'],
      [new ConflictError('User already registered'), 409, 'CONFLICT'],
      [new InvalidStateError('Alert 1 is RESOLVED'), 409, 'INVALID_STATE'],
    ])('maps %s', (error, status, code) => {
      const formatted = formatApiError(error);

      expect(formatted.status).toBe(status);
      expect(formatted.body).toEqual({ error: error.message, code });
    });

    it('includes the field of a validation error', () => {
      expect(formatApiError(new ValidationError('radius must be positive', 'radius'))).toEqual({
        status: 400,
        body: { error: 'radius must be positive', code: 'VALIDATION_ERROR', field: 'radius' },
      });
    });

    it('hides unexpected errors', () => {
      expect(formatApiError(new Error('database exploded'))).toEqual({
        status: 500,
        body: { error: 'Internal server error', code: 'INTERNAL_ERROR' },
      });
    });
  });

  it('NotFoundError names the resource and id', () => {
    const error = new NotFoundError('Neighborhood', 0);

    expect(error.message).toBe('Neighborhood not found: 0');
    expect(error.resource).toBe('Neighborhood');
    expect(error.name).toBe('NotFoundError');
  });

  describe('logError', () => {
    it('logs operational errors at warn and redacts contact info', () => {
      logError(new ConflictError('dup'), { contactInfo: 'alice@example.test', path: '/api/users' });

      expect(logger.warn).toHaveBeenCalledWith(
        {
          contactInfo: '[REDACTED]',
          path: '/api/users',
          errorCode: 'CONFLICT',
          statusCode: 409,
          message: 'dup',
        },
        'Application error'
      );
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('logs unexpected errors at error', () => {
      logError('boom');

      expect(logger.error).toHaveBeenCalledWith({ error: 'boom' }, 'Unknown error');
    });
  });
});
