import { Injectable, Inject } from '@nestjs/common';
import { desc } from 'drizzle-orm';
import { ActivityRepository } from '../activity.repository';
import type { ActivityData, ActivityInput } from '@/domain/types/activity.types';
import { activities } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type Database } from '@/infrastructure/database/database.module';
import { withRetry } from '@/infrastructure/database/retry';

@Injectable()
export class ActivityDrizzleStore extends ActivityRepository {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: Database,
  ) {
    super();
  }

  private mapToActivityData(row: typeof activities.$inferSelect): ActivityData {
    return {
      id: row.id,
      userId: row.userId,
      activityType: row.activityType,
      description: row.description,
      metadata: row.metadata,
      createdAt: row.createdAt,
    };
  }

  async append(input: ActivityInput): Promise<ActivityData> {
    const result = await withRetry('activities.append', () =>
      this.db
        .insert(activities)
        .values({
          userId: input.userId,
          activityType: input.activityType,
          description: input.description,
          metadata: input.metadata ?? {},
        })
        .returning(),
      { idempotent: false },
    );

    return this.mapToActivityData(result[0]);
  }

  async listRecent(limit: number): Promise<ActivityData[]> {
    const result = await withRetry('activities.listRecent', () =>
      this.db
        .select()
        .from(activities)
        .orderBy(desc(activities.createdAt), desc(activities.id))
        .limit(limit),
    );

    return result.map((row) => this.mapToActivityData(row));
  }
}
