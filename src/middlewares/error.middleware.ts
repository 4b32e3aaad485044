import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import jwt from 'jsonwebtoken';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import {
  PG_FOREIGN_KEY_VIOLATION,
  PG_UNIQUE_VIOLATION,
  getPgErrorCode,
  isAppError,
} from '../utils/errors';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const error = err instanceof Error ? err : new Error(String(err));

  logger.error('[Error Handler]', {
    name: error.name,
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    params: req.params,
  });

  if (isAppError(err)) {
    return ResponseHandler.appError(res, err);
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    return ResponseHandler.fail(res, 'validation', 'Invalid request data', err.errors);
  }

  // JWT errors
  if (err instanceof jwt.TokenExpiredError) {
    return ResponseHandler.fail(res, 'unauthorized', 'Token has expired');
  }

  if (err instanceof jwt.JsonWebTokenError) {
    return ResponseHandler.fail(res, 'unauthorized', 'Invalid token');
  }

  // Database errors
  const pgCode = getPgErrorCode(err);

  if (pgCode === PG_UNIQUE_VIOLATION) {
    return ResponseHandler.fail(res, 'conflict', 'Resource already exists');
  }

  if (pgCode === PG_FOREIGN_KEY_VIOLATION) {
    return ResponseHandler.fail(res, 'foreign_key', 'Referenced resource does not exist');
  }

  return ResponseHandler.fail(
    res,
    'internal',
    'Internal server error',
    appConfig.nodeEnv === 'development' ? error.stack : undefined
  );
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.fail(res, 'not_found', 'Route not found');
};
