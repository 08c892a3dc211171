import { CouponStatusUtil } from './coupon-status.util';

describe('CouponStatusUtil', () => {
  const baseCoupon = {
    isActive: true,
    validFrom: new Date('2026-06-01T00:00:00Z'),
    validUntil: new Date('2026-06-30T23:59:59Z'),
    usageLimit: null,
    usageCount: 0,
  };
  const midJune = new Date('2026-06-15T12:00:00Z');

  describe('classify', () => {
    it('should report ACTIVE inside the window with uses left', () => {
      expect(CouponStatusUtil.classify({ ...baseCoupon, usageLimit: 5, usageCount: 4 }, midJune)).toBe('ACTIVE');
    });

    it('should report DISABLED whenever the coupon is switched off', () => {
      const expired = new Date('2026-07-10T00:00:00Z');
      expect(CouponStatusUtil.classify({ ...baseCoupon, isActive: false }, expired)).toBe('DISABLED');
    });

    it('should report SCHEDULED before the window opens', () => {
      expect(CouponStatusUtil.classify(baseCoupon, new Date('2026-05-31T23:59:59Z'))).toBe('SCHEDULED');
    });

    it('should report EXPIRED after the window closes, even when exhausted', () => {
      const coupon = { ...baseCoupon, usageLimit: 1, usageCount: 1 };
      expect(CouponStatusUtil.classify(coupon, new Date('2026-07-01T00:00:00Z'))).toBe('EXPIRED');
    });

    it('should treat both window bounds as inclusive', () => {
      expect(CouponStatusUtil.classify(baseCoupon, baseCoupon.validFrom)).toBe('ACTIVE');
      expect(CouponStatusUtil.classify(baseCoupon, baseCoupon.validUntil)).toBe('ACTIVE');
    });

    it('should report EXHAUSTED once usage reaches the limit', () => {
      expect(CouponStatusUtil.classify({ ...baseCoupon, usageLimit: 5, usageCount: 5 }, midJune)).toBe('EXHAUSTED');
    });
  });

  describe('usageHeadroom', () => {
    it('should be null for unlimited coupons', () => {
      expect(CouponStatusUtil.usageHeadroom({ usageLimit: null, usageCount: 12 })).toBeNull();
    });

    it('should count remaining uses and never go below zero', () => {
      expect(CouponStatusUtil.usageHeadroom({ usageLimit: 5, usageCount: 2 })).toBe(3);
      expect(CouponStatusUtil.usageHeadroom({ usageLimit: 5, usageCount: 7 })).toBe(0);
    });
  });
});
