import { Injectable } from '@nestjs/common';
import type { CouponData, CouponRejection } from '../types/coupon.types';
import type { PlanData } from '../types/plan.types';
import { CouponStatusUtil } from '../utils/coupon-status.util';

/**
 * Business rules deciding whether a stored coupon applies to a purchase.
 * Checks run in a fixed order so the first failing rule names the rejection.
 */
@Injectable()
export class CouponEligibilityService {
  private static reject(code: CouponRejection['code'], message: string): CouponRejection {
    return { code, message };
  }

  /**
   * @param plan the plan being bought, null when no such plan exists
   */
  check(
    coupon: CouponData,
    plan: Pick<PlanData, 'id' | 'isActive'> | null,
    baseInCents: number,
    at: Date,
  ): CouponRejection | null {
    if (!coupon.isActive) {
      return CouponEligibilityService.reject('Inactive', 'Coupon is not active');
    }

    if (!CouponStatusUtil.isWithinWindow(coupon, at)) {
      const notYetValid = at.getTime() < coupon.validFrom.getTime();
      return {
        code: 'Expired',
        message: notYetValid ? 'Coupon is not yet valid' : 'Coupon has expired',
        notYetValid,
      };
    }

    if (CouponStatusUtil.isExhausted(coupon)) {
      return CouponEligibilityService.reject('UsageLimitReached', 'Coupon usage limit reached');
    }

    if (!plan || !plan.isActive) {
      return CouponEligibilityService.reject('PlanNotEligible', 'Selected plan is not available');
    }

    if (coupon.applicablePlanIds.length > 0 && !coupon.applicablePlanIds.includes(plan.id)) {
      return CouponEligibilityService.reject(
        'PlanNotEligible',
        'Coupon is not applicable to the selected plan',
      );
    }

    if (baseInCents < coupon.minPurchaseInCents) {
      return CouponEligibilityService.reject(
        'MinimumPurchaseNotMet',
        `Coupon requires a minimum purchase of ${coupon.minPurchaseInCents} cents`,
      );
    }

    return null;
  }
}
