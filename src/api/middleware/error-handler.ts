// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Errors and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════
//
// Error body: { error, code, details?, requestId?, timestamp }
// Server errors (5xx) are reported without message or details in production.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '../../observability/logging/index.js';
import { AccountValidityError } from '../../types/errors.js';

const logger = getLogger({ component: 'http' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode = 400,
    code = 'BAD_REQUEST',
    details?: Record<string, unknown>,
    isOperational = true
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends ApiError {
  constructor(message = 'Access denied') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SHAPING
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

interface NormalizedError {
  statusCode: number;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

function isJsonParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

function normalizeError(error: unknown): NormalizedError {
  if (error instanceof ApiError) {
    return {
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof AccountValidityError) {
    return {
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: error.issues.map((issue) => issue.message).join(', '),
      details: { fields: error.flatten().fieldErrors },
    };
  }

  if (isJsonParseError(error)) {
    return {
      statusCode: 400,
      code: 'INVALID_JSON',
      message: 'Invalid JSON in request body',
    };
  }

  return {
    statusCode: 500,
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}

function requestIdOf(req: Request): string | undefined {
  const header = req.headers['x-request-id'];
  return typeof header === 'string' ? header : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Express error middleware. Must be registered after the routes.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const normalized = normalizeError(error);
  const requestId = requestIdOf(req);
  const isServerError = normalized.statusCode >= 500;

  if (isServerError) {
    logger.error('Request failed', error, { method: req.method, path: req.path, requestId });
  } else {
    logger.warn('Request rejected', {
      method: req.method,
      path: req.path,
      statusCode: normalized.statusCode,
      code: normalized.code,
      requestId,
    });
  }

  const hideInternals = isServerError && process.env.NODE_ENV === 'production';

  const body: ErrorBody = {
    error: hideInternals ? 'An unexpected error occurred' : normalized.message,
    code: normalized.code,
    ...(!hideInternals && normalized.details && { details: normalized.details }),
    ...(requestId && { requestId }),
    timestamp: new Date().toISOString(),
  };

  res.status(normalized.statusCode).json(body);
}

/**
 * Wrap an async route handler so rejections reach the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  return (req, res, next) => fn(req, res, next).catch(next);
}
