import type { CouponDefinition } from '../types/coupon.types';

export class CouponDefinitionUtil {
  /**
   * Returns every invariant the definition breaks; empty when valid
   */
  static findIssues(definition: CouponDefinition): string[] {
    const issues: string[] = [];

    if (!(definition.discountValue > 0)) {
      issues.push('discountValue must be greater than zero');
    }

    if (definition.discountType === 'PERCENTAGE' && definition.discountValue > 100) {
      issues.push('percentage discountValue cannot exceed 100');
    }

    if (definition.discountType === 'FIXED_AMOUNT' && !Number.isInteger(definition.discountValue)) {
      issues.push('fixed discountValue must be a whole number of cents');
    }

    if (definition.discountType === 'FIXED_AMOUNT' && definition.maxDiscountInCents !== null) {
      issues.push('maxDiscountInCents only applies to percentage coupons');
    }

    if (definition.minPurchaseInCents < 0) {
      issues.push('minPurchaseInCents cannot be negative');
    }

    if (Number.isNaN(definition.validFrom.getTime()) || Number.isNaN(definition.validUntil.getTime())) {
      issues.push('validity dates must be valid dates');
    } else if (definition.validFrom.getTime() > definition.validUntil.getTime()) {
      issues.push('validFrom must not be after validUntil');
    }

    if (definition.usageLimit !== null) {
      if (!Number.isInteger(definition.usageLimit) || definition.usageLimit <= 0) {
        issues.push('usageLimit must be a positive integer');
      } else if (definition.usageLimit < definition.usageCount) {
        issues.push(`usageLimit cannot be lower than the ${definition.usageCount} redemptions already made`);
      }
    }

    return issues;
  }
}
