import { z } from 'zod';

export const DISCOUNT_TYPES = ['PERCENTAGE', 'FIXED_AMOUNT'] as const;
export type DiscountType = (typeof DISCOUNT_TYPES)[number];

/**
 * Derived classification of a coupon. Computed at read time, never stored.
 */
export const COUPON_STATUSES = ['ACTIVE', 'SCHEDULED', 'EXPIRED', 'EXHAUSTED', 'DISABLED'] as const;
export type CouponStatus = (typeof COUPON_STATUSES)[number];

/**
 * Stored coupon fields
 */
export interface CouponData {
  id: number;
  code: string;
  name: string;
  description: string | null;
  discountType: DiscountType;
  discountValue: number;
  minPurchaseInCents: number;
  maxDiscountInCents: number | null;
  validFrom: Date;
  validUntil: Date;
  usageLimit: number | null;
  usageCount: number;
  applicablePlanIds: number[];
  isActive: boolean;
  createdBy: number | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Reasons a coupon cannot be applied
 */
export type CouponRejectionCode =
  | 'NotFound'
  | 'Inactive'
  | 'Expired'
  | 'UsageLimitReached'
  | 'PlanNotEligible'
  | 'MinimumPurchaseNotMet'
  | 'NotApplicable'
  | 'ConcurrentLimitExceeded';

export interface CouponRejection {
  code: CouponRejectionCode;
  message: string;
  /** Set on `Expired` when the window has not opened yet */
  notYetValid?: boolean;
}

/**
 * Priced outcome of applying a coupon to a base amount
 */
export interface CouponQuote {
  couponId: number;
  code: string;
  discountType: DiscountType;
  discountValue: number;
  baseAmountInCents: number;
  computedDiscountInCents: number;
  finalAmountInCents: number;
}

export type CouponApplicationResult =
  | { success: true; quote: CouponQuote }
  | { success: false; error: CouponRejection };

/**
 * Fields a coupon definition is checked against on create and edit
 */
export type CouponDefinition = Pick<
  CouponData,
  | 'discountType'
  | 'discountValue'
  | 'minPurchaseInCents'
  | 'maxDiscountInCents'
  | 'validFrom'
  | 'validUntil'
  | 'usageLimit'
  | 'usageCount'
>;

// Only strings and epoch numbers are coerced; null or booleans would become 1970
const isoDate = z
  .union([z.string(), z.number()])
  .pipe(z.coerce.date({ invalid_type_error: 'must be a date' }));

/**
 * Body accepted when creating a coupon. Invariants spanning several fields are
 * checked by CouponDefinitionUtil after parsing.
 */
export const CreateCouponSchema = z.object({
  code: z
    .string()
    .trim()
    .min(3)
    .max(32)
    .regex(/^[A-Za-z0-9_-]+$/, 'only letters, digits, "-" and "_"')
    .optional(),
  name: z.string().trim().min(1).max(120),
  description: z.string().trim().max(500).nullable().optional(),
  discountType: z.enum(DISCOUNT_TYPES),
  discountValue: z.number().positive(),
  minPurchaseInCents: z.number().int().nonnegative().optional(),
  maxDiscountInCents: z.number().int().positive().nullable().optional(),
  validFrom: isoDate.optional(),
  validUntil: isoDate,
  usageLimit: z.number().int().positive().nullable().optional(),
  applicablePlanIds: z.array(z.number().int().positive()).optional(),
  isActive: z.boolean().optional(),
});

export type CreateCouponInput = z.infer<typeof CreateCouponSchema>;

/**
 * Body accepted when editing a coupon. Code, usage count and creator are fixed.
 */
export const UpdateCouponSchema = CreateCouponSchema.omit({ code: true, isActive: true })
  .partial()
  .strict();

export type UpdateCouponInput = z.infer<typeof UpdateCouponSchema>;

export const ApplyCouponSchema = z.object({
  code: z.string(),
  planId: z.number().int().positive(),
  amountInCents: z.number().int().nonnegative(),
});

export type ApplyCouponInput = z.infer<typeof ApplyCouponSchema>;

export const CouponListQuerySchema = z.object({
  page: z.coerce.number().int().positive().optional(),
  perPage: z.coerce.number().int().positive().max(100).optional(),
  search: z.string().trim().optional(),
  status: z.enum(COUPON_STATUSES).optional(),
});

export type CouponListQuery = z.infer<typeof CouponListQuerySchema>;

export const GenerateCodeSchema = z.object({
  length: z.number().int().min(4).max(32).optional(),
});
