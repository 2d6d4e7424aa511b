import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import type { Address } from 'viem';
import { ZodError } from 'zod';
import { randomUUID } from 'crypto';
import { normalizeAddress, parseAddress } from '../utils/address.js';
import {
  formatApiError,
  logError,
  PayloadTooLargeError,
  UnauthorizedError,
  ValidationError,
} from '../utils/errors.js';

/**
 * Request with the caller identity resolved
 */
export interface CallerRequest extends Request {
  caller?: Address;
}

export const CALLER_HEADER = 'x-caller-address';

/**
 * Rate limiter keyed by normalized caller identity when the header holds an
 * address, else by IP
 */
export function createRateLimiter(perMinute: number): RequestHandler {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: perMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later', code: 'RATE_LIMIT' },
    keyGenerator: (req) => {
      const header = req.headers[CALLER_HEADER];
      const caller = typeof header === 'string' ? parseAddress(header) : undefined;
      if (caller) {
        return `caller:${caller}`;
      }
      const forwarded = req.headers['x-forwarded-for'];
      if (typeof forwarded === 'string') {
        return forwarded.split(',')[0]?.trim() ?? 'unknown';
      }
      return req.ip ?? 'unknown';
    },
  });
}

/**
 * Resolve the caller identity from the X-Caller-Address header.
 * The header is set by the authenticating gateway in front of this service.
 */
export function requireCaller(req: CallerRequest, _res: Response, next: NextFunction): void {
  const header = req.headers[CALLER_HEADER];

  if (typeof header !== 'string' || header.length === 0) {
    next(new UnauthorizedError('Caller address required'));
    return;
  }

  try {
    req.caller = normalizeAddress(header, 'caller');
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Caller set by requireCaller. Throws if the middleware did not run.
 */
export function getCaller(req: CallerRequest): Address {
  if (!req.caller) {
    throw new UnauthorizedError('Caller address required');
  }
  return req.caller;
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const error = err instanceof ZodError ? toValidationError(err) : fromBodyParserError(err);

  logError(error, { path: req.path, method: req.method });

  const { status, body } = formatApiError(error);
  res.status(status).json(body);
};

function toValidationError(err: ZodError): ValidationError {
  const issue = err.issues[0];
  if (!issue) {
    return new ValidationError('Invalid request');
  }
  const field = issue.path.join('.');
  return new ValidationError(field ? `${field}: ${issue.message}` : issue.message, field || undefined);
}

/**
 * body-parser rejects bodies with an error tagged by `type`; map the ones a
 * client can cause to their AppError counterparts
 */
function fromBodyParserError(err: unknown): unknown {
  if (typeof err !== 'object' || err === null || !('type' in err)) {
    return err;
  }
  if (err.type === 'entity.parse.failed') {
    return new ValidationError('Malformed JSON body');
  }
  if (err.type === 'entity.too.large') {
    return new PayloadTooLargeError();
  }
  return err;
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
}

/**
 * Request ID middleware for tracing
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
  res.setHeader('X-Request-ID', requestId);
  next();
}
