import { InMemoryStore } from '@/infrastructure/persistence/in-memory/in-memory-store';
import { ActivityRepository } from '../activity.repository';
import type { ActivityData, ActivityInput } from '@/domain/types/activity.types';

export class ActivityStore extends InMemoryStore<ActivityData> implements ActivityRepository {
  protected copy(value: ActivityData): ActivityData {
    return { ...value, metadata: { ...value.metadata } };
  }

  async append(input: ActivityInput): Promise<ActivityData> {
    const activity: ActivityData = {
      id: this.nextId(),
      userId: input.userId,
      activityType: input.activityType,
      description: input.description,
      metadata: input.metadata ?? {},
      createdAt: new Date(),
    };
    this.set(activity);
    return this.copy(activity);
  }

  async listRecent(limit: number): Promise<ActivityData[]> {
    return this.values()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(0, limit);
  }
}
