import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { ActivityLogService } from './activity-log.service';

@Module({
  imports: [PersistenceModule],
  providers: [ActivityLogService],
  exports: [ActivityLogService],
})
export class ActivityModule {}
