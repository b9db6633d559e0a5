import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnsupportedMediaTypeError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Reject requests whose Content-Type header is not exactly `mediaType`
 *
 * Runs before the body parser, so a rejected body is never read. Parameters
 * count: "application/json; charset=utf-8" does not match "application/json".
 */
export function requireContentType(mediaType: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const contentType = req.get('Content-Type');

    if (contentType === mediaType) {
      next();
      return;
    }

    logger.warn({ contentType: contentType ?? null, expected: mediaType }, 'Invalid Content-Type');
    next(new UnsupportedMediaTypeError(mediaType));
  };
}
