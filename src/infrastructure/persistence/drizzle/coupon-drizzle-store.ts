import { Injectable, Inject, Logger } from '@nestjs/common';
import { and, count, desc, eq, isNull, like, lt, lte, or, sql } from 'drizzle-orm';
import {
  CouponRepository,
  CouponChanges,
  CouponListFilter,
  NewCouponData,
} from '../coupon.repository';
import type { CouponData } from '@/domain/types/coupon.types';
import { coupons } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type Database } from '@/infrastructure/database/database.module';
import { withRetry } from '@/infrastructure/database/retry';
import { escapeLikePattern } from '@/infrastructure/database/like-pattern';

@Injectable()
export class CouponDrizzleStore extends CouponRepository {
  private readonly logger = new Logger(CouponDrizzleStore.name);

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {
    super();
  }

  private mapToCouponData(row: typeof coupons.$inferSelect): CouponData {
    return {
      id: row.id,
      code: row.code,
      name: row.name,
      description: row.description,
      discountType: row.discountType,
      discountValue: row.discountValue,
      minPurchaseInCents: row.minPurchaseInCents,
      maxDiscountInCents: row.maxDiscountInCents,
      validFrom: row.validFrom,
      validUntil: row.validUntil,
      usageLimit: row.usageLimit,
      usageCount: row.usageCount,
      applicablePlanIds: row.applicablePlanIds,
      isActive: row.isActive,
      createdBy: row.createdBy,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  async getByCode(code: string): Promise<CouponData | null> {
    const result = await withRetry('coupons.getByCode', () =>
      this.db.select().from(coupons).where(eq(coupons.code, code)).limit(1),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToCouponData(result[0]);
  }

  async getById(id: number): Promise<CouponData | null> {
    const result = await withRetry('coupons.getById', () =>
      this.db.select().from(coupons).where(eq(coupons.id, id)).limit(1),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToCouponData(result[0]);
  }

  async existsByCode(code: string): Promise<boolean> {
    const result = await withRetry('coupons.existsByCode', () =>
      this.db.select({ id: coupons.id }).from(coupons).where(eq(coupons.code, code)).limit(1),
    );
    return result.length > 0;
  }

  async list(filter: CouponListFilter): Promise<CouponData[]> {
    const where = filter.codePrefix ? like(coupons.code, `${escapeLikePattern(filter.codePrefix)}%`) : undefined;

    const result = await withRetry('coupons.list', () =>
      this.db.select().from(coupons).where(where).orderBy(desc(coupons.createdAt), desc(coupons.id)),
    );

    return result.map((row) => this.mapToCouponData(row));
  }

  async countActive(): Promise<number> {
    const result = await withRetry('coupons.countActive', () =>
      this.db.select({ value: count() }).from(coupons).where(eq(coupons.isActive, true)),
    );
    return result[0]?.value ?? 0;
  }

  async create(input: NewCouponData): Promise<CouponData | null> {
    const result = await withRetry('coupons.create', () =>
      this.db
        .insert(coupons)
        .values({
          code: input.code,
          name: input.name,
          description: input.description,
          discountType: input.discountType,
          discountValue: input.discountValue,
          minPurchaseInCents: input.minPurchaseInCents,
          maxDiscountInCents: input.maxDiscountInCents,
          validFrom: input.validFrom,
          validUntil: input.validUntil,
          usageLimit: input.usageLimit,
          usageCount: 0,
          applicablePlanIds: input.applicablePlanIds,
          isActive: input.isActive,
          createdBy: input.createdBy,
        })
        .onConflictDoNothing({ target: coupons.code })
        .returning(),
      { idempotent: false },
    );

    if (result.length === 0) {
      return null;
    }

    this.logger.log(`Created coupon ${input.code}`);
    return this.mapToCouponData(result[0]);
  }

  async update(id: number, changes: CouponChanges): Promise<CouponData | null> {
    // Checked in the same statement as the write, so a redemption committed since
    // the caller read the coupon cannot leave usage above the new limit.
    const limitCoversUsage =
      changes.usageLimit !== undefined && changes.usageLimit !== null
        ? lte(coupons.usageCount, changes.usageLimit)
        : undefined;

    const result = await withRetry('coupons.update', () =>
      this.db
        .update(coupons)
        .set({ ...changes, updatedAt: new Date() })
        .where(and(eq(coupons.id, id), limitCoversUsage))
        .returning(),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToCouponData(result[0]);
  }

  async incrementUsageIfBelowLimit(id: number): Promise<CouponData | null> {
    // Single conditional UPDATE: two racing redemptions cannot both pass the cap check.
    const result = await withRetry('coupons.incrementUsage', () =>
      this.db
        .update(coupons)
        .set({
          usageCount: sql`${coupons.usageCount} + 1`,
          updatedAt: new Date(),
        })
        .where(
          and(
            eq(coupons.id, id),
            or(isNull(coupons.usageLimit), lt(coupons.usageCount, coupons.usageLimit)),
          ),
        )
        .returning(),
      { idempotent: false },
    );

    if (result.length === 0) {
      return null;
    }

    this.logger.log(`Incremented usage for coupon ${id} to ${result[0].usageCount}`);
    return this.mapToCouponData(result[0]);
  }
}
