import { Injectable, Logger } from '@nestjs/common';
import { CouponRepository, CouponChanges } from '@/infrastructure/persistence/coupon.repository';
import { PlanRepository } from '@/infrastructure/persistence/plan.repository';
import { ActivityLogService } from '@/infrastructure/activity/activity-log.service';
import { AppConfigService } from '@/config/app.config';
import { CouponEligibilityService } from '@/domain/services/coupon-eligibility.service';
import { DiscountCalculatorService } from '@/domain/services/discount-calculator.service';
import { CouponCodeUtil, MAX_COUPON_CODE_LENGTH, MIN_COUPON_CODE_LENGTH } from '@/domain/utils/coupon-code.util';
import { CouponDefinitionUtil } from '@/domain/utils/coupon-definition.util';
import { CouponStatusUtil } from '@/domain/utils/coupon-status.util';
import { PaginationUtil } from '@/domain/utils/pagination.util';
import type {
  CouponApplicationResult,
  CouponData,
  CouponDefinition,
  CouponListQuery,
  CouponStatus,
  CreateCouponInput,
  UpdateCouponInput,
} from '@/domain/types/coupon.types';
import type { Page } from '@/domain/types/plan.types';

export type CouponErrorCode =
  | 'coupon_not_found'
  | 'coupon_code_taken'
  | 'invalid_coupon_definition'
  | 'coupon_code_generation_failed';

/**
 * Error types for coupon administration. Redemption outcomes are not errors:
 * they come back as a CouponApplicationResult.
 */
export class CouponError extends Error {
  constructor(
    message: string,
    public readonly code: CouponErrorCode,
  ) {
    super(message);
    this.name = 'CouponError';
  }
}

export class CouponCodeTakenError extends CouponError {
  constructor(code: string) {
    super(`Coupon code ${code} already exists`, 'coupon_code_taken');
    this.name = 'CouponCodeTakenError';
  }
}

export class InvalidCouponDefinitionError extends CouponError {
  constructor(public readonly issues: string[]) {
    super(`Invalid coupon: ${issues.join('; ')}`, 'invalid_coupon_definition');
    this.name = 'InvalidCouponDefinitionError';
  }
}

export class CouponCodeGenerationError extends CouponError {
  constructor(attempts: number) {
    super(`Could not generate a unique coupon code after ${attempts} attempts`, 'coupon_code_generation_failed');
    this.name = 'CouponCodeGenerationError';
  }
}

/**
 * Coupon with the fields derived at read time
 */
export interface CouponView extends CouponData {
  status: CouponStatus;
  usageHeadroom: number | null;
}

/**
 * Service for validating, redeeming and administering discount coupons
 */
@Injectable()
export class CouponService {
  private readonly logger = new Logger(CouponService.name);

  constructor(
    private readonly couponRepository: CouponRepository,
    private readonly planRepository: PlanRepository,
    private readonly eligibility: CouponEligibilityService,
    private readonly calculator: DiscountCalculatorService,
    private readonly activityLog: ActivityLogService,
    private readonly appConfig: AppConfigService,
  ) {}

  /**
   * Checks a code against a purchase and prices it. Never changes usage.
   * A coupon that would take nothing off the price is rejected, so redeeming
   * it cannot use up a slot.
   */
  async validate(
    code: string,
    planId: number,
    baseInCents: number,
    at: Date = new Date(),
  ): Promise<CouponApplicationResult> {
    const normalized = CouponCodeUtil.normalize(code);
    const coupon = normalized ? await this.couponRepository.getByCode(normalized) : null;

    if (!coupon) {
      return { success: false, error: { code: 'NotFound', message: 'Invalid coupon code' } };
    }

    const plan = await this.planRepository.getById(planId);
    const rejection = this.eligibility.check(coupon, plan, baseInCents, at);
    if (rejection) {
      return { success: false, error: rejection };
    }

    const quote = this.calculator.quote(coupon, baseInCents);
    if (quote.computedDiscountInCents <= 0) {
      return { success: false, error: { code: 'NotApplicable', message: 'Coupon not applicable for this purchase' } };
    }

    return { success: true, quote };
  }

  /**
   * Validates, then consumes one use through the store's conditional increment.
   * Losing a race for the last use yields ConcurrentLimitExceeded.
   */
  async redeem(
    code: string,
    planId: number,
    baseInCents: number,
    at: Date = new Date(),
    actorId: number | null = null,
  ): Promise<CouponApplicationResult> {
    const validation = await this.validate(code, planId, baseInCents, at);
    if (!validation.success) {
      this.logger.warn(`Redemption of ${CouponCodeUtil.normalize(code)} rejected: ${validation.error.code}`);
      return validation;
    }

    const { quote } = validation;
    const updated = await this.couponRepository.incrementUsageIfBelowLimit(quote.couponId);
    if (!updated) {
      this.logger.warn(`Redemption of ${quote.code} lost the race for its last use`);
      return {
        success: false,
        error: {
          code: 'ConcurrentLimitExceeded',
          message: 'Coupon usage limit was reached by another redemption',
        },
      };
    }

    this.logger.log(`Coupon ${quote.code} redeemed (${updated.usageCount}/${updated.usageLimit ?? 'unlimited'})`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'COUPON_REDEEMED',
      description: `Redeemed coupon ${quote.code}`,
      metadata: {
        couponId: quote.couponId,
        planId,
        baseAmountInCents: quote.baseAmountInCents,
        discountInCents: quote.computedDiscountInCents,
      },
    });

    return validation;
  }

  /**
   * Draws random codes until one is unused
   * @throws InvalidCouponDefinitionError for a length outside the allowed range
   * @throws CouponCodeGenerationError when every attempt collided
   */
  async generateCode(length: number = this.appConfig.getCouponCodeLength()): Promise<string> {
    if (!CouponCodeUtil.isValidLength(length)) {
      throw new InvalidCouponDefinitionError([
        `code length must be an integer between ${MIN_COUPON_CODE_LENGTH} and ${MAX_COUPON_CODE_LENGTH}`,
      ]);
    }

    const maxAttempts = this.appConfig.getCouponCodeMaxAttempts();
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const code = CouponCodeUtil.random(length);
      if (!(await this.couponRepository.existsByCode(code))) {
        return code;
      }
      this.logger.debug(`Generated code collided (attempt ${attempt}/${maxAttempts})`);
    }

    throw new CouponCodeGenerationError(maxAttempts);
  }

  async create(input: CreateCouponInput, actorId: number, at: Date = new Date()): Promise<CouponView> {
    const code = input.code ? CouponCodeUtil.normalize(input.code) : await this.generateCode();

    if (await this.couponRepository.existsByCode(code)) {
      throw new CouponCodeTakenError(code);
    }

    const definition: CouponDefinition = {
      discountType: input.discountType,
      discountValue: input.discountValue,
      minPurchaseInCents: input.minPurchaseInCents ?? 0,
      maxDiscountInCents: input.maxDiscountInCents ?? null,
      validFrom: input.validFrom ?? at,
      validUntil: input.validUntil,
      usageLimit: input.usageLimit ?? null,
      usageCount: 0,
    };
    const applicablePlanIds = [...new Set(input.applicablePlanIds ?? [])];
    await this.assertValidDefinition(definition, applicablePlanIds);

    const coupon = await this.couponRepository.create({
      code,
      name: input.name,
      description: input.description ?? null,
      discountType: definition.discountType,
      discountValue: definition.discountValue,
      minPurchaseInCents: definition.minPurchaseInCents,
      maxDiscountInCents: definition.maxDiscountInCents,
      validFrom: definition.validFrom,
      validUntil: definition.validUntil,
      usageLimit: definition.usageLimit,
      applicablePlanIds,
      isActive: input.isActive ?? true,
      createdBy: actorId,
    });
    if (!coupon) {
      throw new CouponCodeTakenError(code);
    }

    this.logger.log(`Coupon ${coupon.code} created by user ${actorId}`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'COUPON_CREATED',
      description: `Created coupon ${coupon.code}`,
      metadata: { couponId: coupon.id, code: coupon.code },
    });

    return this.toView(coupon, at);
  }

  /**
   * Partial edit. The merged coupon is re-checked as a whole, so a new usage
   * limit below the redemptions already made is refused.
   */
  async update(id: number, input: UpdateCouponInput, actorId: number, at: Date = new Date()): Promise<CouponView> {
    const existing = await this.requireCoupon(id);

    const definition: CouponDefinition = {
      discountType: input.discountType ?? existing.discountType,
      discountValue: input.discountValue ?? existing.discountValue,
      minPurchaseInCents: input.minPurchaseInCents ?? existing.minPurchaseInCents,
      maxDiscountInCents:
        input.maxDiscountInCents !== undefined ? input.maxDiscountInCents : existing.maxDiscountInCents,
      validFrom: input.validFrom ?? existing.validFrom,
      validUntil: input.validUntil ?? existing.validUntil,
      usageLimit: input.usageLimit !== undefined ? input.usageLimit : existing.usageLimit,
      usageCount: existing.usageCount,
    };
    const applicablePlanIds =
      input.applicablePlanIds !== undefined ? [...new Set(input.applicablePlanIds)] : existing.applicablePlanIds;
    await this.assertValidDefinition(
      definition,
      input.applicablePlanIds !== undefined ? applicablePlanIds : [],
    );

    const changes: CouponChanges = {
      discountType: definition.discountType,
      discountValue: definition.discountValue,
      minPurchaseInCents: definition.minPurchaseInCents,
      maxDiscountInCents: definition.maxDiscountInCents,
      validFrom: definition.validFrom,
      validUntil: definition.validUntil,
      usageLimit: definition.usageLimit,
      applicablePlanIds,
    };
    if (input.name !== undefined) changes.name = input.name;
    if (input.description !== undefined) changes.description = input.description;

    const coupon = await this.couponRepository.update(id, changes);
    if (!coupon) {
      // Either gone, or redeemed past the new limit since it was read above
      const current = await this.requireCoupon(id);
      throw new InvalidCouponDefinitionError([
        `usageLimit cannot be lower than the ${current.usageCount} redemptions already made`,
      ]);
    }

    this.logger.log(`Coupon ${coupon.code} updated by user ${actorId}`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'COUPON_UPDATED',
      description: `Updated coupon ${coupon.code}`,
      metadata: { couponId: id },
    });

    return this.toView(coupon, at);
  }

  async toggleActive(id: number, actorId: number, at: Date = new Date()): Promise<CouponView> {
    const existing = await this.requireCoupon(id);
    const coupon = await this.requireUpdated(id, { isActive: !existing.isActive });

    const statusText = coupon.isActive ? 'activated' : 'deactivated';
    this.logger.log(`Coupon ${coupon.code} ${statusText} by user ${actorId}`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'COUPON_STATUS_CHANGE',
      description: `Coupon ${coupon.code} ${statusText}`,
      metadata: { couponId: id, isActive: coupon.isActive },
    });

    return this.toView(coupon, at);
  }

  /**
   * @throws CouponError('coupon_not_found')
   */
  async getById(id: number, at: Date = new Date()): Promise<CouponView> {
    return this.toView(await this.requireCoupon(id), at);
  }

  async list(query: CouponListQuery, at: Date = new Date()): Promise<Page<CouponView>> {
    const codePrefix = query.search ? CouponCodeUtil.normalize(query.search) : undefined;
    const coupons = await this.couponRepository.list({ codePrefix });

    const views = coupons
      .map((coupon) => this.toView(coupon, at))
      .filter((view) => !query.status || view.status === query.status);

    return PaginationUtil.paginate(views, query.page ?? 1, query.perPage ?? this.appConfig.getItemsPerPage());
  }

  computeDiscount(coupon: CouponData, baseInCents: number): number {
    return this.calculator.computeDiscount(coupon, baseInCents);
  }

  classifyStatus(coupon: CouponData, at: Date = new Date()): CouponStatus {
    return CouponStatusUtil.classify(coupon, at);
  }

  private toView(coupon: CouponData, at: Date): CouponView {
    return {
      ...coupon,
      status: CouponStatusUtil.classify(coupon, at),
      usageHeadroom: CouponStatusUtil.usageHeadroom(coupon),
    };
  }

  private async assertValidDefinition(definition: CouponDefinition, planIds: number[]): Promise<void> {
    const issues = CouponDefinitionUtil.findIssues(definition);

    if (planIds.length > 0) {
      const plans = await this.planRepository.getByIds(planIds);
      const known = new Set(plans.map((plan) => plan.id));
      const unknown = planIds.filter((planId) => !known.has(planId));
      if (unknown.length > 0) {
        issues.push(`unknown plan ids: ${unknown.join(', ')}`);
      }
    }

    if (issues.length > 0) {
      throw new InvalidCouponDefinitionError(issues);
    }
  }

  private async requireCoupon(id: number): Promise<CouponData> {
    const coupon = await this.couponRepository.getById(id);
    if (!coupon) {
      throw new CouponError('Coupon not found', 'coupon_not_found');
    }
    return coupon;
  }

  private async requireUpdated(id: number, changes: CouponChanges): Promise<CouponData> {
    const coupon = await this.couponRepository.update(id, changes);
    if (!coupon) {
      throw new CouponError('Coupon not found', 'coupon_not_found');
    }
    return coupon;
  }
}
