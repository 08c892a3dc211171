import type { PlanData } from '@/domain/types/plan.types';

export type NewPlanData = Omit<PlanData, 'id' | 'createdAt' | 'updatedAt'>;

export type PlanChanges = Partial<Omit<PlanData, 'id' | 'createdBy' | 'createdAt' | 'updatedAt'>>;

/**
 * Abstract repository for subscription plans
 */
export abstract class PlanRepository {
  abstract getById(id: number): Promise<PlanData | null>;

  abstract getByName(name: string): Promise<PlanData | null>;

  abstract getByIds(ids: number[]): Promise<PlanData[]>;

  /**
   * Active plans, cheapest first
   */
  abstract getActivePlans(): Promise<PlanData[]>;

  /**
   * Every plan, newest first
   */
  abstract getAllPlans(): Promise<PlanData[]>;

  abstract create(input: NewPlanData): Promise<PlanData>;

  abstract update(id: number, changes: PlanChanges): Promise<PlanData | null>;
}
