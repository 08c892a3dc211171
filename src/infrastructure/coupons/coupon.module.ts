import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { ActivityModule } from '@/infrastructure/activity/activity.module';
import { DomainModule } from '@/domain/domain.module';
import { AppConfigService } from '@/config/app.config';
import { CouponService } from './coupon.service';

@Module({
  imports: [PersistenceModule, DomainModule, ActivityModule],
  providers: [CouponService, AppConfigService],
  exports: [CouponService],
})
export class CouponModule {}
