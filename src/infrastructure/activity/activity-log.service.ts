import { Injectable, Logger } from '@nestjs/common';
import { ActivityRepository } from '@/infrastructure/persistence/activity.repository';
import type { ActivityData, ActivityInput } from '@/domain/types/activity.types';

/**
 * Append-only audit trail of administrative actions
 */
@Injectable()
export class ActivityLogService {
  private readonly logger = new Logger(ActivityLogService.name);

  constructor(private readonly activityRepository: ActivityRepository) {}

  /**
   * Records an activity. Failures are logged and never surface to the caller,
   * so the mutation being described is not rolled back by a logging error.
   */
  async record(input: ActivityInput): Promise<void> {
    try {
      await this.activityRepository.append(input);
    } catch (error) {
      this.logger.error(`Failed to record ${input.activityType} activity`, {
        error,
        userId: input.userId,
      });
    }
  }

  async listRecent(limit: number): Promise<ActivityData[]> {
    return this.activityRepository.listRecent(limit);
  }
}
