import type { Action, UserRole } from '../types/user.types';

export const ROLE_CAPABILITIES: Readonly<Record<UserRole, readonly Action[]>> = {
  OWNER: [
    'coupon:manage',
    'coupon:validate',
    'coupon:redeem',
    'plan:manage',
    'plan:read',
    'user:manage',
    'user:read',
    'dashboard:read',
  ],
  ADMIN: [
    'coupon:validate',
    'coupon:redeem',
    'plan:read',
    'user:manage',
    'user:read',
    'dashboard:read',
  ],
  AGENT: ['coupon:validate', 'coupon:redeem', 'plan:read', 'dashboard:read'],
};

export class PermissionsUtil {
  static can(role: UserRole, action: Action): boolean {
    return ROLE_CAPABILITIES[role].includes(action);
  }

  /**
   * Whether an actor may create or change users of the target role.
   * Owners manage anyone, admins only agents.
   */
  static canManageRole(actorRole: UserRole, targetRole: UserRole): boolean {
    if (actorRole === 'OWNER') {
      return true;
    }
    return actorRole === 'ADMIN' && targetRole === 'AGENT';
  }
}
