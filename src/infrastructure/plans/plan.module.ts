import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { ActivityModule } from '@/infrastructure/activity/activity.module';
import { AppConfigService } from '@/config/app.config';
import { PlanService } from './plan.service';

@Module({
  imports: [PersistenceModule, ActivityModule],
  providers: [PlanService, AppConfigService],
  exports: [PlanService],
})
export class PlanModule {}
