import { Injectable } from '@nestjs/common';
import type { CouponData, CouponQuote } from '../types/coupon.types';

type DiscountFields = Pick<CouponData, 'discountType' | 'discountValue' | 'maxDiscountInCents'>;

/**
 * Computes coupon discounts over integer cent amounts
 */
@Injectable()
export class DiscountCalculatorService {
  /**
   * Discount for a base price. Percentages round half-up to the cent, then the
   * coupon cap applies, then the base price. Never negative, never above `base`.
   */
  computeDiscount(coupon: DiscountFields, baseInCents: number): number {
    if (!(baseInCents > 0)) {
      return 0;
    }

    let discount: number;
    if (coupon.discountType === 'PERCENTAGE') {
      discount = Math.round((baseInCents * coupon.discountValue) / 100);
      if (coupon.maxDiscountInCents !== null) {
        discount = Math.min(discount, coupon.maxDiscountInCents);
      }
    } else {
      discount = coupon.discountValue;
    }

    return Math.max(0, Math.min(discount, baseInCents));
  }

  quote(coupon: CouponData, baseInCents: number): CouponQuote {
    const computedDiscountInCents = this.computeDiscount(coupon, baseInCents);
    return {
      couponId: coupon.id,
      code: coupon.code,
      discountType: coupon.discountType,
      discountValue: coupon.discountValue,
      baseAmountInCents: baseInCents,
      computedDiscountInCents,
      finalAmountInCents: Math.max(0, baseInCents - computedDiscountInCents),
    };
  }
}
