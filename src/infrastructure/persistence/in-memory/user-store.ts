import { InMemoryStore } from '@/infrastructure/persistence/in-memory/in-memory-store';
import { UserRepository, NewUserData, UserChanges, UserListFilter } from '../user.repository';
import type { UserData, UserRole } from '@/domain/types/user.types';

export class UserStore extends InMemoryStore<UserData> implements UserRepository {
  protected copy(value: UserData): UserData {
    return { ...value };
  }

  async findById(id: number): Promise<UserData | null> {
    return this.get(id) ?? null;
  }

  async findByUsernameOrEmail(username: string, email: string): Promise<UserData | null> {
    return this.values().find((user) => user.username === username || user.email === email) ?? null;
  }

  async list(filter: UserListFilter): Promise<UserData[]> {
    return this.values()
      .filter((user) => !filter.role || user.role === filter.role)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
  }

  async countByRole(role: UserRole, onlyActive: boolean): Promise<number> {
    return this.values().filter((user) => user.role === role && (!onlyActive || user.isActive)).length;
  }

  async countByPlanId(planId: number): Promise<number> {
    return this.values().filter((user) => user.planId === planId).length;
  }

  async create(input: NewUserData): Promise<UserData> {
    const now = new Date();
    const user: UserData = {
      ...input,
      id: this.nextId(),
      isActive: true,
      planId: null,
      planStartDate: null,
      planExpiryDate: null,
      pdfGenerated: 0,
      pdfLimit: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.set(user);
    return this.copy(user);
  }

  async update(id: number, changes: UserChanges): Promise<UserData | null> {
    const existing = this.get(id);
    if (!existing) {
      return null;
    }
    const updated: UserData = { ...existing, ...changes, updatedAt: new Date() };
    this.set(updated);
    return this.copy(updated);
  }
}
