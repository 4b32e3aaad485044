import type { Response } from 'express';
import type { AppError } from './errors';
import { logger } from './logging';

type Meta = Record<string, unknown>;

export interface ApiErrorBody {
  code: string;
  details?: unknown;
}

/**
 * Envelope shared by every route. Writes carry their cascade reports in `meta`.
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ApiErrorBody;
  meta?: Meta;
}

export type Failure =
  | 'validation'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'conflict'
  | 'foreign_key'
  | 'internal';

const FAILURES: Record<Failure, { status: number; code: string }> = {
  validation: { status: 400, code: 'VALIDATION_ERROR' },
  unauthorized: { status: 401, code: 'UNAUTHORIZED' },
  forbidden: { status: 403, code: 'FORBIDDEN' },
  not_found: { status: 404, code: 'NOT_FOUND' },
  conflict: { status: 409, code: 'CONFLICT' },
  foreign_key: { status: 400, code: 'FOREIGN_KEY_VIOLATION' },
  internal: { status: 500, code: 'INTERNAL_ERROR' },
};

const send = <T>(res: Response, status: number, body: ApiResponse<T>): Response => res.status(status).json(body);

const reject = (res: Response, status: number, message: string, error: ApiErrorBody): Response => {
  logger.log(status >= 500 ? 'error' : 'warn', `[API Error] ${message}`, { statusCode: status, ...error });

  return send(res, status, { success: false, message, error });
};

export class ResponseHandler {
  static success<T>(res: Response, data: T, message: string = 'Success', meta?: Meta): Response {
    return send(res, 200, { success: true, message, data, ...(meta && { meta }) });
  }

  static created<T>(res: Response, data: T, message: string, meta?: Meta): Response {
    return send(res, 201, { success: true, message, data, ...(meta && { meta }) });
  }

  // Engine errors already know their status and code
  static appError(res: Response, error: AppError): Response {
    return reject(res, error.statusCode, error.message, { code: error.code, details: error.details });
  }

  static fail(res: Response, failure: Failure, message: string, details?: unknown): Response {
    const { status, code } = FAILURES[failure];
    return reject(res, status, message, details === undefined ? { code } : { code, details });
  }
}
