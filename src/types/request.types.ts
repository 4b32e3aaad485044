import { Request } from 'express';

/**
 * Roles that may change category attribute bindings
 */
export const WRITE_ROLES = ['staff', 'admin'] as const;

export type UserRole = 'customer' | (typeof WRITE_ROLES)[number];

/**
 * Auth Request - request carrying the verified token subject
 */
export interface AuthRequest extends Request {
  user?: {
    id: string;
    role: UserRole;
  };
}
