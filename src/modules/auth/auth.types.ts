import type { Request } from 'express';
import { UserRole } from '../users/user-role.enum';

export interface AuthUser {
  userId: string;
  email: string;
  role: UserRole;
  displayName: string;
}

export interface AuthenticatedRequest extends Request {
  user: AuthUser;
}

/** Admins act on any reservation; players only on their own. */
export function isPrivileged(user: Pick<AuthUser, 'role'>): boolean {
  return user.role === UserRole.ADMIN;
}
