import type { Request, Response, NextFunction } from 'express';
import type { ZodIssue, ZodSchema } from 'zod';

/**
 * Send a 400 listing every validation issue.
 */
export function sendValidationError(res: Response, issues: ZodIssue[]): void {
  res.status(400).json({
    success: false,
    error: 'Validation failed',
    code: 'VALIDATION_ERROR',
    details: issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  });
}

/**
 * Zod validation middleware for the request body.
 * The parsed value (defaults applied, unknown keys stripped) replaces the body.
 */
export function validate(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      sendValidationError(res, result.error.issues);
      return;
    }

    req.body = result.data;
    next();
  };
}
