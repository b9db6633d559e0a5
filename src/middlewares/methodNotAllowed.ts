import { Request, Response, NextFunction, RequestHandler } from 'express';
import { MethodNotAllowedError } from '@/errors';

/**
 * Terminal handler for a route: any verb that reaches it is unsupported
 *
 * @example
 * router.route('/').get(list).post(create).all(methodNotAllowed(['GET', 'POST']));
 */
export function methodNotAllowed(allowedMethods: readonly string[]): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new MethodNotAllowedError(req.method, allowedMethods));
  };
}
