import { InMemoryStore } from '@/infrastructure/persistence/in-memory/in-memory-store';
import {
  CouponRepository,
  CouponChanges,
  CouponListFilter,
  NewCouponData,
} from '../coupon.repository';
import type { CouponData } from '@/domain/types/coupon.types';

export class CouponStore extends InMemoryStore<CouponData> implements CouponRepository {
  protected copy(value: CouponData): CouponData {
    return {
      ...value,
      applicablePlanIds: [...value.applicablePlanIds],
      validFrom: new Date(value.validFrom),
      validUntil: new Date(value.validUntil),
    };
  }

  async getByCode(code: string): Promise<CouponData | null> {
    return this.values().find((coupon) => coupon.code === code) ?? null;
  }

  async getById(id: number): Promise<CouponData | null> {
    return this.get(id) ?? null;
  }

  async existsByCode(code: string): Promise<boolean> {
    return this.values().some((coupon) => coupon.code === code);
  }

  async list(filter: CouponListFilter): Promise<CouponData[]> {
    const { codePrefix } = filter;
    return this.values()
      .filter((coupon) => !codePrefix || coupon.code.startsWith(codePrefix))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
  }

  async countActive(): Promise<number> {
    return this.values().filter((coupon) => coupon.isActive).length;
  }

  async create(input: NewCouponData): Promise<CouponData | null> {
    if (this.values().some((coupon) => coupon.code === input.code)) {
      return null;
    }
    const now = new Date();
    const coupon: CouponData = {
      ...input,
      id: this.nextId(),
      usageCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.set(coupon);
    return this.copy(coupon);
  }

  async update(id: number, changes: CouponChanges): Promise<CouponData | null> {
    const existing = this.get(id);
    if (!existing) {
      return null;
    }
    if (changes.usageLimit !== undefined && changes.usageLimit !== null && existing.usageCount > changes.usageLimit) {
      return null;
    }
    const updated: CouponData = { ...existing, ...changes, updatedAt: new Date() };
    this.set(updated);
    return this.copy(updated);
  }

  async incrementUsageIfBelowLimit(id: number): Promise<CouponData | null> {
    // Read, check and write happen in one synchronous step, so no other call interleaves.
    const existing = this.get(id);
    if (!existing) {
      return null;
    }
    if (existing.usageLimit !== null && existing.usageCount >= existing.usageLimit) {
      return null;
    }
    const updated: CouponData = {
      ...existing,
      usageCount: existing.usageCount + 1,
      updatedAt: new Date(),
    };
    this.set(updated);
    return this.copy(updated);
  }
}
