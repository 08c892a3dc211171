import type { CouponData, CouponStatus } from '../types/coupon.types';

type StatusFields = Pick<
  CouponData,
  'isActive' | 'validFrom' | 'validUntil' | 'usageLimit' | 'usageCount'
>;

export class CouponStatusUtil {
  /**
   * Read-time status. The admin toggle wins over the window, the window over usage.
   */
  static classify(coupon: StatusFields, at: Date): CouponStatus {
    if (!coupon.isActive) {
      return 'DISABLED';
    }
    if (at.getTime() < coupon.validFrom.getTime()) {
      return 'SCHEDULED';
    }
    if (at.getTime() > coupon.validUntil.getTime()) {
      return 'EXPIRED';
    }
    if (CouponStatusUtil.isExhausted(coupon)) {
      return 'EXHAUSTED';
    }
    return 'ACTIVE';
  }

  static isWithinWindow(coupon: Pick<CouponData, 'validFrom' | 'validUntil'>, at: Date): boolean {
    const time = at.getTime();
    return time >= coupon.validFrom.getTime() && time <= coupon.validUntil.getTime();
  }

  static isExhausted(coupon: Pick<CouponData, 'usageLimit' | 'usageCount'>): boolean {
    return coupon.usageLimit !== null && coupon.usageCount >= coupon.usageLimit;
  }

  /**
   * Redemptions left before the cap; null when unlimited
   */
  static usageHeadroom(coupon: Pick<CouponData, 'usageLimit' | 'usageCount'>): number | null {
    if (coupon.usageLimit === null) {
      return null;
    }
    return Math.max(0, coupon.usageLimit - coupon.usageCount);
  }
}
