import jwt from 'jsonwebtoken';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { mockRequest, mockResponse } from '../../__tests__/http';
import { CategoryCycleError, CategoryDepthError, DuplicateBindingError } from '../../utils/errors';
import { errorHandler, notFoundHandler } from '../error.middleware';

const handle = (error: unknown) => {
  const { double, res } = mockResponse();
  errorHandler(error, mockRequest(), res, vi.fn());
  return double;
};

describe('errorHandler', () => {
  it('maps engine errors onto their status and code', () => {
    const double = handle(new DuplicateBindingError(1, 10));

    expect(double.status).toHaveBeenCalledWith(409);
    expect(double.json).toHaveBeenCalledWith({
      success: false,
      message: 'Attribute 10 is already bound to category 1',
      error: { code: 'DUPLICATE_BINDING', details: { category_id: 1, attribute_id: 10 } },
    });
  });

  it('reports a category cycle as a conflict', () => {
    const double = handle(new CategoryCycleError(4));

    expect(double.status).toHaveBeenCalledWith(409);
    expect(double.json.mock.calls[0][0].error).toEqual({ code: 'CATEGORY_CYCLE', details: { category_id: 4 } });
  });

  it('reports an over-deep tree as a conflict', () => {
    const double = handle(new CategoryDepthError(7, 32));

    expect(double.status).toHaveBeenCalledWith(409);
    expect(double.json.mock.calls[0][0].error).toEqual({
      code: 'CATEGORY_TOO_DEEP',
      details: { category_id: 7, max_depth: 32 },
    });
  });

  it('reports zod failures as validation errors', () => {
    const result = z.object({ sort: z.number() }).safeParse({ sort: 'first' });
    const double = handle(result.error);

    expect(double.status).toHaveBeenCalledWith(400);
    expect(double.json.mock.calls[0][0].error.code).toBe('VALIDATION_ERROR');
  });

  it('reports expired tokens as unauthorized', () => {
    const double = handle(new jwt.TokenExpiredError('jwt expired', new Date(0)));

    expect(double.status).toHaveBeenCalledWith(401);
    expect(double.json.mock.calls[0][0].message).toBe('Token has expired');
  });

  it('maps PostgreSQL constraint violations', () => {
    expect(handle({ code: '23505' }).status).toHaveBeenCalledWith(409);
    expect(handle({ code: '23503' }).status).toHaveBeenCalledWith(400);
  });

  it('hides unexpected errors behind a 500', () => {
    const double = handle(new Error('connection reset'));

    expect(double.status).toHaveBeenCalledWith(500);
    expect(double.json).toHaveBeenCalledWith({
      success: false,
      message: 'Internal server error',
      error: { code: 'INTERNAL_ERROR' },
    });
  });
});

describe('notFoundHandler', () => {
  it('answers 404 for unknown routes', () => {
    const { double, res } = mockResponse();

    notFoundHandler(mockRequest(), res, vi.fn());

    expect(double.status).toHaveBeenCalledWith(404);
    expect(double.json).toHaveBeenCalledWith({
      success: false,
      message: 'Route not found',
      error: { code: 'NOT_FOUND' },
    });
  });
});
