/**
 * Request Validation Middleware
 *
 * Route-level guards that reject a malformed `req.body` or `req.params`
 * with a structured 400 before the controller runs. Controllers read typed
 * values back with `parseParams` / `parseBody`.
 *
 * @example
 * router.post('/picks', validateBody(submitPickBody), asyncHandler(picks.submitPick));
 */

import type { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodError } from 'zod';

function formatZodErrors(error: ZodError): { field: string; message: string }[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * Validate `req.body`. On success the parsed (trimmed / defaulted) data
 * replaces `req.body`.
 */
export function validateBody<T>(schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: formatZodErrors(result.error),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}

export function validateParams<T>(schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      res.status(400).json({
        error: 'Invalid path parameters',
        code: 'VALIDATION_ERROR',
        details: formatZodErrors(result.error),
      });
      return;
    }
    next();
  };
}

/** Typed path parameters; throws `ZodError` (400) when invalid. */
export function parseParams<T>(schema: ZodType<T>, req: Request): T {
  return schema.parse(req.params);
}

export function parseBody<T>(schema: ZodType<T>, req: Request): T {
  return schema.parse(req.body);
}
