import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '@/errors';

/**
 * 404 for any request no route matched
 * Must be registered after all routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}
