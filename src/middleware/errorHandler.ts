import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { getConfig } from '../config';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ErrorBody {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    stack?: string;
  };
}

function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof ZodError) {
    return new AppError(400, 'VALIDATION_ERROR', 'Invalid request data', err.issues);
  }
  // body-parser marks malformed JSON and oversized bodies with a status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return new AppError(err.status, 'BAD_REQUEST', err.message);
  }
  return new AppError(500, 'INTERNAL_SERVER_ERROR', 'Internal Server Error');
}

export interface ErrorResponse {
  statusCode: number;
  body: ErrorBody;
}

/**
 * Status and JSON body for any thrown value; stacks are only included in development
 */
export function toErrorResponse(err: unknown, isDevelopment: boolean): ErrorResponse {
  const appError = toAppError(err);
  return {
    statusCode: appError.statusCode,
    body: {
      ok: false,
      error: {
        code: appError.code,
        message: appError.message,
        ...(appError.details !== undefined && { details: appError.details }),
        ...(isDevelopment && err instanceof Error && { stack: err.stack }),
      },
    },
  };
}

/**
 * Centralized error handler
 * Format: { ok: false, error: { code: string, message: string, details?: unknown } }
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Ensure response hasn't been sent
  if (res.headersSent) {
    return next(err);
  }

  const { statusCode, body } = toErrorResponse(err, getConfig().nodeEnv === 'development');
  const context = {
    requestId: res.locals.requestId,
    code: body.error.code,
    path: req.path,
    method: req.method,
    statusCode,
  };

  if (statusCode >= 500) {
    logger.error('Unhandled error', err, context);
  } else {
    logger.warn(body.error.message, context);
  }

  res.status(statusCode).json(body);
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', { requestId: res.locals.requestId, path: req.path });
  res.status(404).json({
    ok: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}
