import type { ActivityData, ActivityInput } from '@/domain/types/activity.types';

export abstract class ActivityRepository {
  abstract append(input: ActivityInput): Promise<ActivityData>;

  abstract listRecent(limit: number): Promise<ActivityData[]>;
}
