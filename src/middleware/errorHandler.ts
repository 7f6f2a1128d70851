/**
 * Global Error Handler Middleware
 *
 * Provides centralized error handling for all Express routes and a
 * consistent error response format across the API.
 */

import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '../utils/logger';
import { requestContext } from '../utils/requestContext';
import { AppError, DataIntegrityError } from '../errors';

const logger = createLogger('errorHandler');

export const REQUEST_ID_HEADER = 'X-Request-ID';

// ─────────────────────────────────────────────────────────────────────────────
// Request ID Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Attach a request ID (the incoming `X-Request-ID` or a fresh UUID) and run
 * the rest of the chain inside a request context so every log line carries
 * it.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const existingId = req.headers['x-request-id'];
  const requestId = typeof existingId === 'string' && existingId.trim() ? existingId.trim() : randomUUID();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  requestContext.run({ requestId }, () => next());
}

export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}

// ─────────────────────────────────────────────────────────────────────────────
// Async Handler Wrapper
// ─────────────────────────────────────────────────────────────────────────────

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void> | void;

/**
 * Wraps async route handlers so rejections reach the error handler.
 *
 * @example
 * router.get('/games/:gameId', asyncHandler(async (req, res) => {
 *   const game = await store.getGame(req.params.gameId);
 *   if (!game) throw AppError.notFound('Game not found');
 *   res.json(game);
 * }));
 */
export function asyncHandler(fn: AsyncRequestHandler): AsyncRequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Response Format
// ─────────────────────────────────────────────────────────────────────────────

interface ErrorResponse {
  error: string;
  code?: string;
  requestId: string;
  details?: unknown;
}

function statusOf(err: Error): number {
  if (err instanceof AppError) return err.statusCode;
  if (err instanceof ZodError) return 400;
  if (err instanceof DataIntegrityError) return 422;
  return 500;
}

function buildErrorResponse(
  err: Error,
  requestId: string,
  includeDetails: boolean,
): { statusCode: number; body: ErrorResponse } {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: {
        error: err.message,
        code: err.code,
        requestId,
        ...(includeDetails && err.details ? { details: err.details } : {}),
      },
    };
  }

  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId,
        details: err.issues.map((issue) => ({ field: issue.path.join('.') || '(root)', message: issue.message })),
      },
    };
  }

  // Stored data that cannot be graded.
  if (err instanceof DataIntegrityError) {
    return {
      statusCode: 422,
      body: {
        error: err.message,
        code: 'DATA_INTEGRITY',
        requestId,
        details: { entity: err.entity, reference: err.reference },
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Handler Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Global error handler middleware. Must be registered after all routes.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const requestId = getRequestId(req);
  const isProduction = process.env.NODE_ENV === 'production';
  const statusCode = statusOf(err);

  const logPayload = {
    requestId,
    method: req.method,
    path: req.path,
    error: err.message,
    statusCode,
    ...(err instanceof AppError ? { code: err.code } : {}),
    ...(!isProduction && statusCode >= 500 ? { stack: err.stack } : {}),
  };
  if (statusCode >= 500) {
    logger.error(logPayload, 'Request failed with server error');
  } else {
    logger.warn(logPayload, 'Request failed with client error');
  }

  const { statusCode: responseStatus, body } = buildErrorResponse(err, requestId, !isProduction);
  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.status(responseStatus).json(body);
}

// ─────────────────────────────────────────────────────────────────────────────
// 404 Handler
// ─────────────────────────────────────────────────────────────────────────────

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Cannot ${req.method} ${req.path}`));
}
