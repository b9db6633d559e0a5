import { Request, Response, NextFunction } from 'express';
import { AppError, MethodNotAllowedError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    details?: unknown;
  };
}

/**
 * Errors raised by body-parser (and anything else built on http-errors)
 * carry their own status; `expose` marks messages safe to return
 */
interface HttpError extends Error {
  status: number;
  expose?: boolean;
}

// Personal data: never written to logs
const REDACTED_FIELDS = ['email', 'address', 'phone_number'];

/**
 * Copy of a request body with personal fields redacted, for logging
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }
  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = REDACTED_FIELDS.includes(key) ? '[REDACTED]' : sanitizeRequestBody(value);
  }
  return sanitized;
}

/**
 * Production responses must not leak schema or driver details
 */
export function sanitizeErrorMessage(message: string): string {
  if (env.NODE_ENV !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql|query/i,
    /column|table|constraint|relation/i,
    /file|path|directory/i,
  ];

  return sensitivePatterns.some((pattern) => pattern.test(message))
    ? 'An error occurred while processing your request'
    : message;
}

function isHttpError(err: unknown): err is HttpError {
  return err instanceof Error && 'status' in err && typeof err.status === 'number';
}

function statusCodeOf(err: Error): number {
  if (err instanceof AppError) {
    return err.statusCode;
  }
  if (isHttpError(err) && err.expose) {
    return err.status;
  }
  return 500;
}

/**
 * Global error handler middleware
 * Renders every error as { success: false, error: { message, details? } }
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = statusCodeOf(err);

  const logContext = {
    error: {
      name: err.name,
      message: err.message,
      stack: statusCode >= 500 ? err.stack : undefined,
    },
    request: {
      method: req.method,
      url: req.originalUrl,
      body: sanitizeRequestBody(req.body),
    },
  };

  if (statusCode >= 500) {
    logger.error(logContext, 'Error occurred');
  } else {
    logger.warn(logContext, 'Request rejected');
  }

  if (statusCode === 500) {
    const response: ErrorResponse = {
      success: false,
      error: { message: 'Internal server error' },
    };
    res.status(500).json(response);
    return;
  }

  const response: ErrorResponse = {
    success: false,
    error: { message: sanitizeErrorMessage(err.message) },
  };

  if (err instanceof ValidationError && err.errors) {
    response.error.details = err.errors;
  }

  if (err instanceof MethodNotAllowedError) {
    res.set('Allow', err.allowedMethods.join(', '));
  }

  res.status(statusCode).json(response);
}
