import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { ActivityModule } from '@/infrastructure/activity/activity.module';
import { AppConfigService } from '@/config/app.config';
import { UserService } from './user.service';

@Module({
  imports: [PersistenceModule, ActivityModule],
  providers: [UserService, AppConfigService],
  exports: [UserService],
})
export class UserModule {}
