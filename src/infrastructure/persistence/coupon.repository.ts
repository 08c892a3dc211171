import type { CouponData } from '@/domain/types/coupon.types';

/**
 * Fields written when a coupon is created. usage_count always starts at zero.
 */
export type NewCouponData = Omit<CouponData, 'id' | 'usageCount' | 'createdAt' | 'updatedAt'>;

/**
 * Editable fields. Code, usage count and creator are never rewritten.
 */
export type CouponChanges = Partial<
  Omit<CouponData, 'id' | 'code' | 'usageCount' | 'createdBy' | 'createdAt' | 'updatedAt'>
>;

export interface CouponListFilter {
  /** Prefix match on the normalized code */
  codePrefix?: string;
}

/**
 * Abstract repository for coupon storage
 */
export abstract class CouponRepository {
  abstract getByCode(code: string): Promise<CouponData | null>;

  abstract getById(id: number): Promise<CouponData | null>;

  abstract existsByCode(code: string): Promise<boolean>;

  /**
   * All coupons matching the filter, newest first
   */
  abstract list(filter: CouponListFilter): Promise<CouponData[]>;

  abstract countActive(): Promise<number>;

  /**
   * Inserts the coupon; null when the code is already taken
   */
  abstract create(input: NewCouponData): Promise<CouponData | null>;

  /**
   * Applies the changes; null when the coupon is missing or when a new
   * usageLimit is below the usage count at the time of the write
   */
  abstract update(id: number, changes: CouponChanges): Promise<CouponData | null>;

  /**
   * Atomically adds one redemption, only while the coupon is below its cap.
   * Returns the updated coupon, or null when the cap was already reached.
   */
  abstract incrementUsageIfBelowLimit(id: number): Promise<CouponData | null>;
}
