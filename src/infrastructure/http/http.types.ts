import type { Request } from 'express';
import type { AuthenticatedUser } from '@/domain/types/user.types';

export interface SessionRequest extends Request {
  user?: AuthenticatedUser;
}

/**
 * Request that went through SessionGuard
 */
export interface AuthenticatedRequest extends Request {
  user: AuthenticatedUser;
}
