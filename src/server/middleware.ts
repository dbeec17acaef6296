/**
 * Validation Middleware
 * Runs the request validator over the raw body before any route sees it.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RequestBody, RequestValidator } from '../types/index.js';

export interface ValidationMiddlewareOptions {
  /** Status sent when the validator rejects the body */
  rejectionStatus: number;
}

/**
 * Only a Buffer from the raw body parser counts as a body; the parser
 * leaves `{}` behind when the request carried none.
 */
function rawBody(req: Request): RequestBody {
  return Buffer.isBuffer(req.body) ? req.body : undefined;
}

export function createValidationMiddleware(
  validator: RequestValidator,
  options: ValidationMiddlewareOptions
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = validator.validate(rawBody(req));

    if (result.verdict === 'reject') {
      // Never log the body itself
      console.warn(`Rejected ${req.method} ${req.path}: ${result.kind}`);
      res.status(options.rejectionStatus).json({ error: 'Request rejected', kind: result.kind });
      return;
    }

    next();
  };
}
