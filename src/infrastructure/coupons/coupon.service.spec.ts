import { Test, type TestingModule } from '@nestjs/testing';
import {
  CouponService,
  CouponCodeGenerationError,
  CouponCodeTakenError,
  InvalidCouponDefinitionError,
} from './coupon.service';
import { CouponRepository } from '@/infrastructure/persistence/coupon.repository';
import { PlanRepository } from '@/infrastructure/persistence/plan.repository';
import { ActivityRepository } from '@/infrastructure/persistence/activity.repository';
import { CouponStore } from '@/infrastructure/persistence/in-memory/coupon-store';
import { PlanStore } from '@/infrastructure/persistence/in-memory/plan-store';
import { ActivityStore } from '@/infrastructure/persistence/in-memory/activity-store';
import { ActivityLogService } from '@/infrastructure/activity/activity-log.service';
import { AppConfigService } from '@/config/app.config';
import { CouponEligibilityService } from '@/domain/services/coupon-eligibility.service';
import { DiscountCalculatorService } from '@/domain/services/discount-calculator.service';
import { COUPON_CODE_ALPHABET } from '@/domain/utils/coupon-code.util';
import type { CreateCouponInput } from '@/domain/types/coupon.types';
import type { PlanData } from '@/domain/types/plan.types';

const OWNER_ID = 1;
const NOW = new Date('2026-06-15T12:00:00Z');

const percentInput: CreateCouponInput = {
  code: 'summer20',
  name: 'Summer sale',
  discountType: 'PERCENTAGE',
  discountValue: 20,
  validFrom: new Date('2026-06-01T00:00:00Z'),
  validUntil: new Date('2026-06-30T23:59:59Z'),
};

describe('CouponService', () => {
  let service: CouponService;
  let couponStore: CouponStore;
  let planStore: PlanStore;
  let activityStore: ActivityStore;
  let basicPlan: PlanData;
  let proPlan: PlanData;

  beforeEach(async () => {
    couponStore = new CouponStore();
    planStore = new PlanStore();
    activityStore = new ActivityStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CouponService,
        CouponEligibilityService,
        DiscountCalculatorService,
        ActivityLogService,
        { provide: CouponRepository, useValue: couponStore },
        { provide: PlanRepository, useValue: planStore },
        { provide: ActivityRepository, useValue: activityStore },
        {
          provide: AppConfigService,
          useValue: {
            getCouponCodeLength: jest.fn().mockReturnValue(8),
            getCouponCodeMaxAttempts: jest.fn().mockReturnValue(3),
            getItemsPerPage: jest.fn().mockReturnValue(10),
          },
        },
      ],
    }).compile();

    service = module.get(CouponService);

    const planFields = {
      description: null,
      billingPeriod: 'MONTHLY' as const,
      periodValue: 1,
      pdfLimit: 10,
      features: [],
      isActive: true,
      createdBy: null,
    };
    basicPlan = await planStore.create({ ...planFields, name: 'Basic', priceInCents: 10000 });
    proPlan = await planStore.create({ ...planFields, name: 'Pro', priceInCents: 25000 });
  });

  describe('validate', () => {
    it('should quote a percentage discount', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', basicPlan.id, 10000, NOW);

      expect(result).toEqual({
        success: true,
        quote: {
          couponId: 1,
          code: 'SUMMER20',
          discountType: 'PERCENTAGE',
          discountValue: 20,
          baseAmountInCents: 10000,
          computedDiscountInCents: 2000,
          finalAmountInCents: 8000,
        },
      });
    });

    it('should match codes case-insensitively and ignore surrounding spaces', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      const result = await service.validate('  Summer20 ', basicPlan.id, 10000, NOW);

      expect(result.success).toBe(true);
    });

    it('should cap a fixed discount at the base amount', async () => {
      await service.create(
        { ...percentInput, code: 'FIFTY', discountType: 'FIXED_AMOUNT', discountValue: 50 },
        OWNER_ID,
        NOW,
      );

      const result = await service.validate('FIFTY', basicPlan.id, 30, NOW);

      expect(result.success && result.quote.computedDiscountInCents).toBe(30);
      expect(result.success && result.quote.finalAmountInCents).toBe(0);
    });

    it('should never change the usage count', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 1 }, OWNER_ID, NOW);

      for (let i = 0; i < 5; i++) {
        await service.validate('SUMMER20', basicPlan.id, 10000, NOW);
      }

      expect((await service.getById(coupon.id, NOW)).usageCount).toBe(0);
    });

    it('should reject unknown and empty codes', async () => {
      expect(await service.validate('NOPE', basicPlan.id, 10000, NOW)).toEqual({
        success: false,
        error: { code: 'NotFound', message: 'Invalid coupon code' },
      });
      expect(await service.validate('   ', basicPlan.id, 10000, NOW)).toEqual({
        success: false,
        error: { code: 'NotFound', message: 'Invalid coupon code' },
      });
    });

    it('should reject an inactive coupon', async () => {
      await service.create({ ...percentInput, isActive: false }, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', basicPlan.id, 10000, NOW);

      expect(result).toEqual({
        success: false,
        error: { code: 'Inactive', message: 'Coupon is not active' },
      });
    });

    it('should reject an expired coupon', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', basicPlan.id, 10000, new Date('2026-07-01T00:00:00Z'));

      expect(result).toEqual({
        success: false,
        error: { code: 'Expired', message: 'Coupon has expired', notYetValid: false },
      });
    });

    it('should flag a coupon whose window has not opened', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', basicPlan.id, 10000, new Date('2026-05-31T23:59:59Z'));

      expect(result).toEqual({
        success: false,
        error: { code: 'Expired', message: 'Coupon is not yet valid', notYetValid: true },
      });
    });

    it('should accept both ends of the validity window', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      expect((await service.validate('SUMMER20', basicPlan.id, 100, percentInput.validUntil)).success).toBe(true);
      expect((await service.validate('SUMMER20', basicPlan.id, 100, new Date('2026-06-01T00:00:00Z'))).success).toBe(
        true,
      );
    });

    it('should reject a plan outside the coupon scope', async () => {
      await service.create({ ...percentInput, applicablePlanIds: [proPlan.id] }, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', basicPlan.id, 10000, NOW);

      expect(result).toEqual({
        success: false,
        error: { code: 'PlanNotEligible', message: 'Coupon is not applicable to the selected plan' },
      });
    });

    it('should reject a plan that does not exist', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', 424242, 10000, NOW);

      expect(result).toEqual({
        success: false,
        error: { code: 'PlanNotEligible', message: 'Selected plan is not available' },
      });
    });

    it('should reject an inactive plan', async () => {
      await service.create(percentInput, OWNER_ID, NOW);
      await planStore.update(basicPlan.id, { isActive: false });

      const result = await service.validate('SUMMER20', basicPlan.id, 10000, NOW);

      expect(!result.success && result.error.code).toBe('PlanNotEligible');
    });

    it('should reject a coupon that takes nothing off the price', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', basicPlan.id, 0, NOW);

      expect(result).toEqual({
        success: false,
        error: { code: 'NotApplicable', message: 'Coupon not applicable for this purchase' },
      });
    });

    it('should reject a purchase below the minimum', async () => {
      await service.create({ ...percentInput, minPurchaseInCents: 5000 }, OWNER_ID, NOW);

      const result = await service.validate('SUMMER20', basicPlan.id, 4999, NOW);

      expect(result.success).toBe(false);
      expect(!result.success && result.error.code).toBe('MinimumPurchaseNotMet');
    });
  });

  describe('redeem', () => {
    it('should consume one use and log the redemption', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 2 }, OWNER_ID, NOW);

      const result = await service.redeem('summer20', basicPlan.id, 10000, NOW, 7);

      expect(result.success).toBe(true);
      expect((await service.getById(coupon.id, NOW)).usageCount).toBe(1);
      const [activity] = await activityStore.listRecent(1);
      expect(activity).toMatchObject({
        userId: 7,
        activityType: 'COUPON_REDEEMED',
        metadata: { couponId: coupon.id, planId: basicPlan.id, baseAmountInCents: 10000, discountInCents: 2000 },
      });
    });

    it('should reject once the usage limit is reached', async () => {
      await service.create({ ...percentInput, usageLimit: 1 }, OWNER_ID, NOW);
      await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);

      const result = await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);

      expect(result).toEqual({
        success: false,
        error: { code: 'UsageLimitReached', message: 'Coupon usage limit reached' },
      });
    });

    it('should let exactly one of several concurrent redemptions take the last use', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 1 }, OWNER_ID, NOW);

      const results = await Promise.all(
        Array.from({ length: 10 }, () => service.redeem('SUMMER20', basicPlan.id, 10000, NOW)),
      );

      expect(results.filter((result) => result.success)).toHaveLength(1);
      const failures = results.filter((result) => !result.success);
      expect(failures).toHaveLength(9);
      for (const failure of failures) {
        expect(!failure.success && failure.error.code).toMatch(/^(ConcurrentLimitExceeded|UsageLimitReached)$/);
      }
      const stored = await service.getById(coupon.id, NOW);
      expect(stored.usageCount).toBe(1);
      expect(stored.status).toBe('EXHAUSTED');
    });

    it('should not consume a use for a zero discount or an unknown plan', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 3 }, OWNER_ID, NOW);

      const zero = await service.redeem('SUMMER20', basicPlan.id, 0, NOW);
      const unknownPlan = await service.redeem('SUMMER20', 424242, 10000, NOW);

      expect(!zero.success && zero.error.code).toBe('NotApplicable');
      expect(!unknownPlan.success && unknownPlan.error.code).toBe('PlanNotEligible');
      expect((await service.getById(coupon.id, NOW)).usageCount).toBe(0);
      expect(await activityStore.listRecent(10)).toHaveLength(1);
    });

    it('should not consume a use when validation fails', async () => {
      const coupon = await service.create({ ...percentInput, applicablePlanIds: [proPlan.id] }, OWNER_ID, NOW);

      await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);

      expect((await service.getById(coupon.id, NOW)).usageCount).toBe(0);
    });
  });

  describe('generateCode', () => {
    it('should produce codes of the requested length from the code alphabet', async () => {
      const code = await service.generateCode(12);

      expect(code).toHaveLength(12);
      for (const char of code) {
        expect(COUPON_CODE_ALPHABET).toContain(char);
      }
    });

    it('should default to the configured length', async () => {
      expect(await service.generateCode()).toHaveLength(8);
    });

    it('should produce distinct codes', async () => {
      const codes = new Set<string>();
      for (let i = 0; i < 50; i++) {
        codes.add(await service.generateCode());
      }

      expect(codes.size).toBe(50);
    });

    it('should reject lengths outside 4 to 32', async () => {
      await expect(service.generateCode(3)).rejects.toThrow(InvalidCouponDefinitionError);
      await expect(service.generateCode(33)).rejects.toThrow(InvalidCouponDefinitionError);
    });

    it('should give up after the configured number of collisions', async () => {
      const existsSpy = jest.spyOn(couponStore, 'existsByCode').mockResolvedValue(true);

      await expect(service.generateCode(6)).rejects.toThrow(CouponCodeGenerationError);
      expect(existsSpy).toHaveBeenCalledTimes(3);
    });
  });

  describe('create', () => {
    it('should normalize the code and start usage at zero', async () => {
      const coupon = await service.create(percentInput, OWNER_ID, NOW);

      expect(coupon).toMatchObject({
        code: 'SUMMER20',
        usageCount: 0,
        minPurchaseInCents: 0,
        maxDiscountInCents: null,
        usageLimit: null,
        applicablePlanIds: [],
        isActive: true,
        createdBy: OWNER_ID,
        status: 'ACTIVE',
        usageHeadroom: null,
      });
    });

    it('should generate a code when none is given and default validFrom to now', async () => {
      const coupon = await service.create({ ...percentInput, code: undefined, validFrom: undefined }, OWNER_ID, NOW);

      expect(coupon.code).toHaveLength(8);
      expect(coupon.validFrom).toEqual(NOW);
    });

    it('should reject a duplicate code regardless of case', async () => {
      await service.create(percentInput, OWNER_ID, NOW);

      await expect(service.create({ ...percentInput, code: 'SUMMER20' }, OWNER_ID, NOW)).rejects.toThrow(
        CouponCodeTakenError,
      );
    });

    it('should report every broken invariant', async () => {
      await expect(
        service.create(
          {
            ...percentInput,
            discountValue: 150,
            validFrom: new Date('2026-07-01T00:00:00Z'),
            validUntil: new Date('2026-06-01T00:00:00Z'),
          },
          OWNER_ID,
          NOW,
        ),
      ).rejects.toThrow(
        expect.objectContaining({
          code: 'invalid_coupon_definition',
          issues: ['percentage discountValue cannot exceed 100', 'validFrom must not be after validUntil'],
        }),
      );
    });

    it('should reject unknown plan ids', async () => {
      await expect(
        service.create({ ...percentInput, applicablePlanIds: [basicPlan.id, 404] }, OWNER_ID, NOW),
      ).rejects.toThrow(expect.objectContaining({ issues: ['unknown plan ids: 404'] }));
    });

    it('should log the creation', async () => {
      const coupon = await service.create(percentInput, OWNER_ID, NOW);

      const [activity] = await activityStore.listRecent(1);
      expect(activity).toMatchObject({
        userId: OWNER_ID,
        activityType: 'COUPON_CREATED',
        metadata: { couponId: coupon.id, code: 'SUMMER20' },
      });
    });
  });

  describe('update', () => {
    it('should merge the changes and keep the code', async () => {
      const coupon = await service.create(percentInput, OWNER_ID, NOW);

      const updated = await service.update(coupon.id, { discountValue: 30, name: 'Bigger sale' }, OWNER_ID, NOW);

      expect(updated).toMatchObject({ code: 'SUMMER20', discountValue: 30, name: 'Bigger sale' });
    });

    it('should refuse a usage limit below the redemptions already made', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 5 }, OWNER_ID, NOW);
      await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);
      await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);

      await expect(service.update(coupon.id, { usageLimit: 1 }, OWNER_ID, NOW)).rejects.toThrow(
        expect.objectContaining({
          issues: ['usageLimit cannot be lower than the 2 redemptions already made'],
        }),
      );
    });

    it('should refuse a lower limit when a redemption lands after the coupon was read', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 5 }, OWNER_ID, NOW);
      await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);
      const readCoupon = couponStore.getById.bind(couponStore);
      jest.spyOn(couponStore, 'getById').mockImplementationOnce(async (id) => {
        const snapshot = await readCoupon(id);
        await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);
        return snapshot;
      });

      await expect(service.update(coupon.id, { usageLimit: 1 }, OWNER_ID, NOW)).rejects.toThrow(
        expect.objectContaining({
          code: 'invalid_coupon_definition',
          issues: ['usageLimit cannot be lower than the 2 redemptions already made'],
        }),
      );
      const stored = await service.getById(coupon.id, NOW);
      expect(stored.usageLimit).toBe(5);
      expect(stored.usageCount).toBe(2);
    });

    it('should keep usage within the limit when an edit and a redemption race', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 5 }, OWNER_ID, NOW);
      await service.redeem('SUMMER20', basicPlan.id, 10000, NOW);

      await Promise.allSettled([
        service.update(coupon.id, { usageLimit: 1 }, OWNER_ID, NOW),
        service.redeem('SUMMER20', basicPlan.id, 10000, NOW),
      ]);

      const stored = await service.getById(coupon.id, NOW);
      expect(stored.usageLimit).not.toBeNull();
      expect(stored.usageCount).toBeLessThanOrEqual(stored.usageLimit ?? 0);
    });

    it('should check the merged window', async () => {
      const coupon = await service.create(percentInput, OWNER_ID, NOW);

      await expect(
        service.update(coupon.id, { validUntil: new Date('2026-05-01T00:00:00Z') }, OWNER_ID, NOW),
      ).rejects.toThrow(expect.objectContaining({ issues: ['validFrom must not be after validUntil'] }));
    });

    it('should clear the usage limit when set to null', async () => {
      const coupon = await service.create({ ...percentInput, usageLimit: 5 }, OWNER_ID, NOW);

      const updated = await service.update(coupon.id, { usageLimit: null }, OWNER_ID, NOW);

      expect(updated.usageLimit).toBeNull();
      expect(updated.usageHeadroom).toBeNull();
    });

    it('should fail for an unknown coupon', async () => {
      await expect(service.update(42, { discountValue: 5 }, OWNER_ID, NOW)).rejects.toThrow(
        expect.objectContaining({ code: 'coupon_not_found' }),
      );
    });
  });

  describe('toggleActive', () => {
    it('should disable and re-enable a coupon', async () => {
      const coupon = await service.create(percentInput, OWNER_ID, NOW);

      const disabled = await service.toggleActive(coupon.id, OWNER_ID, NOW);
      expect(disabled.status).toBe('DISABLED');

      const enabled = await service.toggleActive(coupon.id, OWNER_ID, NOW);
      expect(enabled.status).toBe('ACTIVE');
    });
  });

  describe('list', () => {
    it('should filter by code prefix and derived status', async () => {
      await service.create(percentInput, OWNER_ID, NOW);
      await service.create({ ...percentInput, code: 'SUMMER-OLD', validUntil: new Date('2026-06-10T00:00:00Z') }, OWNER_ID, NOW);
      await service.create({ ...percentInput, code: 'WINTER10' }, OWNER_ID, NOW);

      const page = await service.list({ search: 'summer', status: 'EXPIRED' }, NOW);

      expect(page.items.map((coupon) => coupon.code)).toEqual(['SUMMER-OLD']);
      expect(page.total).toBe(1);
    });

    it('should paginate newest first', async () => {
      for (const code of ['AAAA', 'BBBB', 'CCCC']) {
        await service.create({ ...percentInput, code }, OWNER_ID, NOW);
      }

      const page = await service.list({ page: 1, perPage: 2 }, NOW);

      expect(page.items.map((coupon) => coupon.code)).toEqual(['CCCC', 'BBBB']);
      expect(page.totalPages).toBe(2);
    });
  });

  describe('classifyStatus', () => {
    it('should report a coupon before its window as scheduled', async () => {
      const coupon = await service.create(percentInput, OWNER_ID, NOW);

      expect(service.classifyStatus(coupon, new Date('2026-01-01T00:00:00Z'))).toBe('SCHEDULED');
    });
  });
});
