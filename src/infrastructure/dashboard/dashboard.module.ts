import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { ActivityModule } from '@/infrastructure/activity/activity.module';
import { DashboardService } from './dashboard.service';

@Module({
  imports: [PersistenceModule, ActivityModule],
  providers: [DashboardService],
  exports: [DashboardService],
})
export class DashboardModule {}
