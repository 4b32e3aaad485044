import type { Response } from 'express';
import { vi } from 'vitest';
import type { AuthRequest } from '../types/request.types';

interface RequestFields {
  params?: Record<string, string>;
  body?: unknown;
  headers?: Record<string, string>;
}

export const mockRequest = (fields: RequestFields = {}) =>
  ({
    originalUrl: '/api/test',
    method: 'GET',
    ip: '127.0.0.1',
    params: {},
    body: {},
    headers: {},
    ...fields,
  }) as unknown as AuthRequest;

export const mockResponse = () => {
  const double = { status: vi.fn(), json: vi.fn() };
  double.status.mockReturnValue(double);
  double.json.mockReturnValue(double);
  return { double, res: double as unknown as Response };
};
