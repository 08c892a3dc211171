import { Module } from '@nestjs/common';
import { PersistenceModule } from '@/infrastructure/persistence/persistence.module';
import { CouponModule } from '@/infrastructure/coupons/coupon.module';
import { PlanModule } from '@/infrastructure/plans/plan.module';
import { UserModule } from '@/infrastructure/users/user.module';
import { DashboardModule } from '@/infrastructure/dashboard/dashboard.module';
import { SessionGuard } from './guards/session.guard';
import { ActionGuard } from './guards/action.guard';
import { CouponController } from './coupon.controller';
import { PlanController } from './plan.controller';
import { UserController } from './user.controller';
import { DashboardController } from './dashboard.controller';
import { SessionController } from './session.controller';
import { HealthController } from './health.controller';

@Module({
  imports: [PersistenceModule, CouponModule, PlanModule, UserModule, DashboardModule],
  controllers: [
    CouponController,
    PlanController,
    UserController,
    DashboardController,
    SessionController,
    HealthController,
  ],
  providers: [SessionGuard, ActionGuard],
})
export class HttpModule {}
