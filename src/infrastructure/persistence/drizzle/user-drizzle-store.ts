import { Injectable, Inject, Logger } from '@nestjs/common';
import { and, count, desc, eq, or } from 'drizzle-orm';
import { UserRepository, NewUserData, UserChanges, UserListFilter } from '../user.repository';
import type { UserData, UserRole } from '@/domain/types/user.types';
import { users } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type Database } from '@/infrastructure/database/database.module';
import { withRetry } from '@/infrastructure/database/retry';

@Injectable()
export class UserDrizzleStore extends UserRepository {
  private readonly logger = new Logger(UserDrizzleStore.name);

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {
    super();
  }

  private mapToUserData(row: typeof users.$inferSelect): UserData {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      fullName: row.fullName,
      role: row.role,
      isActive: row.isActive,
      planId: row.planId,
      planStartDate: row.planStartDate,
      planExpiryDate: row.planExpiryDate,
      pdfGenerated: row.pdfGenerated,
      pdfLimit: row.pdfLimit,
      createdBy: row.createdBy,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  async findById(id: number): Promise<UserData | null> {
    const result = await withRetry('users.findById', () =>
      this.db.select().from(users).where(eq(users.id, id)).limit(1),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToUserData(result[0]);
  }

  async findByUsernameOrEmail(username: string, email: string): Promise<UserData | null> {
    const result = await withRetry('users.findByUsernameOrEmail', () =>
      this.db
        .select()
        .from(users)
        .where(or(eq(users.username, username), eq(users.email, email)))
        .limit(1),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToUserData(result[0]);
  }

  async list(filter: UserListFilter): Promise<UserData[]> {
    const where = filter.role ? eq(users.role, filter.role) : undefined;

    const result = await withRetry('users.list', () =>
      this.db.select().from(users).where(where).orderBy(desc(users.createdAt), desc(users.id)),
    );
    return result.map((row) => this.mapToUserData(row));
  }

  async countByRole(role: UserRole, onlyActive: boolean): Promise<number> {
    const where = onlyActive
      ? and(eq(users.role, role), eq(users.isActive, true))
      : eq(users.role, role);

    const result = await withRetry('users.countByRole', () =>
      this.db.select({ value: count() }).from(users).where(where),
    );
    return result[0]?.value ?? 0;
  }

  async countByPlanId(planId: number): Promise<number> {
    const result = await withRetry('users.countByPlanId', () =>
      this.db.select({ value: count() }).from(users).where(eq(users.planId, planId)),
    );
    return result[0]?.value ?? 0;
  }

  async create(input: NewUserData): Promise<UserData> {
    const result = await withRetry('users.create', () =>
      this.db
        .insert(users)
        .values({
          username: input.username,
          email: input.email,
          fullName: input.fullName,
          role: input.role,
          createdBy: input.createdBy,
        })
        .returning(),
      { idempotent: false },
    );

    this.logger.log(`Created ${input.role} user: ${input.username}`);
    return this.mapToUserData(result[0]);
  }

  async update(id: number, changes: UserChanges): Promise<UserData | null> {
    const result = await withRetry('users.update', () =>
      this.db
        .update(users)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning(),
    );

    if (result.length === 0) {
      return null;
    }

    return this.mapToUserData(result[0]);
  }
}
