import { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AuthRequest, UserRole } from '../types/request.types';
import { ResponseHandler } from '../utils/response';

const tokenPayloadSchema = z
  .object({
    userId: z.union([z.string(), z.number()]).optional(),
    sub: z.string().optional(),
    role: z.enum(['customer', 'staff', 'admin']),
  })
  .refine((payload) => payload.userId !== undefined || payload.sub !== undefined, {
    message: 'Token has no subject',
  });

const resolveUserFromToken = (token: string) => {
  const payload = tokenPayloadSchema.parse(jwt.verify(token, appConfig.jwtSecret));

  return {
    id: String(payload.userId ?? payload.sub),
    role: payload.role,
  };
};

export const authenticate = (
  req: AuthRequest,
  res: Response,
  next: NextFunction
) => {
  const token = req.headers.authorization?.split(' ')[1];

  if (!token) {
    return ResponseHandler.fail(res, 'unauthorized', 'No token provided');
  }

  try {
    req.user = resolveUserFromToken(token);
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      return ResponseHandler.fail(res, 'unauthorized', 'Token has expired');
    }
    return ResponseHandler.fail(res, 'unauthorized', 'Invalid token');
  }

  next();
};

export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.fail(res, 'unauthorized', 'Not authenticated');
    }

    if (!roles.includes(req.user.role)) {
      return ResponseHandler.fail(res, 'forbidden', 'Insufficient role');
    }

    next();
  };
};
