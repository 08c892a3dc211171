import { InMemoryStore } from '@/infrastructure/persistence/in-memory/in-memory-store';
import { PlanRepository, NewPlanData, PlanChanges } from '../plan.repository';
import type { PlanData } from '@/domain/types/plan.types';

export class PlanStore extends InMemoryStore<PlanData> implements PlanRepository {
  protected copy(value: PlanData): PlanData {
    return { ...value, features: [...value.features] };
  }

  async getById(id: number): Promise<PlanData | null> {
    return this.get(id) ?? null;
  }

  async getByName(name: string): Promise<PlanData | null> {
    return this.values().find((plan) => plan.name === name) ?? null;
  }

  async getByIds(ids: number[]): Promise<PlanData[]> {
    return this.values().filter((plan) => ids.includes(plan.id));
  }

  async getActivePlans(): Promise<PlanData[]> {
    return this.values()
      .filter((plan) => plan.isActive)
      .sort((a, b) => a.priceInCents - b.priceInCents || a.id - b.id);
  }

  async getAllPlans(): Promise<PlanData[]> {
    return this.values().sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
  }

  async create(input: NewPlanData): Promise<PlanData> {
    const now = new Date();
    const plan: PlanData = { ...input, id: this.nextId(), createdAt: now, updatedAt: now };
    this.set(plan);
    return this.copy(plan);
  }

  async update(id: number, changes: PlanChanges): Promise<PlanData | null> {
    const existing = this.get(id);
    if (!existing) {
      return null;
    }
    const updated: PlanData = { ...existing, ...changes, updatedAt: new Date() };
    this.set(updated);
    return this.copy(updated);
  }
}
