import { Injectable, Inject, Logger } from '@nestjs/common';
import { asc, desc, eq, inArray } from 'drizzle-orm';
import { PlanRepository, NewPlanData, PlanChanges } from '../plan.repository';
import type { PlanData } from '@/domain/types/plan.types';
import { plans } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type Database } from '@/infrastructure/database/database.module';
import { withRetry } from '@/infrastructure/database/retry';

/**
 * Drizzle implementation of PlanRepository
 */
@Injectable()
export class PlanDrizzleStore extends PlanRepository {
  private readonly logger = new Logger(PlanDrizzleStore.name);

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {
    super();
  }

  /**
   * Map database row to PlanData
   */
  private mapToPlanData(row: typeof plans.$inferSelect): PlanData {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      billingPeriod: row.billingPeriod,
      periodValue: row.periodValue,
      priceInCents: row.priceInCents,
      pdfLimit: row.pdfLimit,
      features: row.features,
      isActive: row.isActive,
      createdBy: row.createdBy,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  async getById(id: number): Promise<PlanData | null> {
    const result = await withRetry('plans.getById', () =>
      this.db.select().from(plans).where(eq(plans.id, id)).limit(1),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToPlanData(result[0]);
  }

  async getByName(name: string): Promise<PlanData | null> {
    const result = await withRetry('plans.getByName', () =>
      this.db.select().from(plans).where(eq(plans.name, name)).limit(1),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToPlanData(result[0]);
  }

  async getByIds(ids: number[]): Promise<PlanData[]> {
    if (ids.length === 0) {
      return [];
    }

    const result = await withRetry('plans.getByIds', () =>
      this.db.select().from(plans).where(inArray(plans.id, ids)),
    );
    return result.map((row) => this.mapToPlanData(row));
  }

  async getActivePlans(): Promise<PlanData[]> {
    const result = await withRetry('plans.getActivePlans', () =>
      this.db
        .select()
        .from(plans)
        .where(eq(plans.isActive, true))
        .orderBy(asc(plans.priceInCents), asc(plans.id)),
    );

    return result.map((row) => this.mapToPlanData(row));
  }

  async getAllPlans(): Promise<PlanData[]> {
    const result = await withRetry('plans.getAllPlans', () =>
      this.db.select().from(plans).orderBy(desc(plans.createdAt), desc(plans.id)),
    );
    return result.map((row) => this.mapToPlanData(row));
  }

  async create(input: NewPlanData): Promise<PlanData> {
    const result = await withRetry('plans.create', () =>
      this.db
        .insert(plans)
        .values({
          name: input.name,
          description: input.description,
          billingPeriod: input.billingPeriod,
          periodValue: input.periodValue,
          priceInCents: input.priceInCents,
          pdfLimit: input.pdfLimit,
          features: input.features,
          isActive: input.isActive,
          createdBy: input.createdBy,
        })
        .returning(),
      { idempotent: false },
    );

    this.logger.log(`Created plan: ${input.name}`);
    return this.mapToPlanData(result[0]);
  }

  async update(id: number, changes: PlanChanges): Promise<PlanData | null> {
    const result = await withRetry('plans.update', () =>
      this.db
        .update(plans)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(plans.id, id))
        .returning(),
    );

    if (result.length === 0) {
      return null;
    }

    this.logger.log(`Updated plan: ${id}`);
    return this.mapToPlanData(result[0]);
  }
}
