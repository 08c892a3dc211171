import { PermissionsUtil } from './permissions.util';

describe('PermissionsUtil', () => {
  describe('can', () => {
    it('should let only owners manage coupons and plans', () => {
      expect(PermissionsUtil.can('OWNER', 'coupon:manage')).toBe(true);
      expect(PermissionsUtil.can('OWNER', 'plan:manage')).toBe(true);
      expect(PermissionsUtil.can('ADMIN', 'coupon:manage')).toBe(false);
      expect(PermissionsUtil.can('ADMIN', 'plan:manage')).toBe(false);
      expect(PermissionsUtil.can('AGENT', 'coupon:manage')).toBe(false);
    });

    it('should let every role validate and redeem coupons', () => {
      for (const role of ['OWNER', 'ADMIN', 'AGENT'] as const) {
        expect(PermissionsUtil.can(role, 'coupon:validate')).toBe(true);
        expect(PermissionsUtil.can(role, 'coupon:redeem')).toBe(true);
      }
    });

    it('should keep agents out of user management', () => {
      expect(PermissionsUtil.can('ADMIN', 'user:manage')).toBe(true);
      expect(PermissionsUtil.can('AGENT', 'user:manage')).toBe(false);
      expect(PermissionsUtil.can('AGENT', 'user:read')).toBe(false);
    });
  });

  describe('canManageRole', () => {
    it('should let owners manage any role', () => {
      expect(PermissionsUtil.canManageRole('OWNER', 'OWNER')).toBe(true);
      expect(PermissionsUtil.canManageRole('OWNER', 'ADMIN')).toBe(true);
      expect(PermissionsUtil.canManageRole('OWNER', 'AGENT')).toBe(true);
    });

    it('should let admins manage agents only', () => {
      expect(PermissionsUtil.canManageRole('ADMIN', 'AGENT')).toBe(true);
      expect(PermissionsUtil.canManageRole('ADMIN', 'ADMIN')).toBe(false);
      expect(PermissionsUtil.canManageRole('ADMIN', 'OWNER')).toBe(false);
    });

    it('should not let agents manage anyone', () => {
      expect(PermissionsUtil.canManageRole('AGENT', 'AGENT')).toBe(false);
    });
  });
});
