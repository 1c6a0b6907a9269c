/**
 * Collateral Loan Quotes - Error Middleware
 */

import { NextFunction, Request, Response } from 'express';
import { AppError, BadRequestError } from '../../shared/errors';

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    console.warn(`[API] ${err.name}: ${err.message}`);
    res.status(err.statusCode).json({
      error: err.message,
      ...(err instanceof BadRequestError && err.details.length > 0 ? { details: err.details } : {}),
    });
    return;
  }

  // express.json() rejects malformed bodies with a 400 SyntaxError
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    console.warn(`[API] Malformed JSON body: ${err.message}`);
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  console.error('[API] Unhandled error:', error.message);
  console.error(error.stack);
  res.status(500).json({ error: 'Internal server error' });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
}
