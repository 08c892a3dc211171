import { Module } from '@nestjs/common';
import { DatabaseModule } from '@/infrastructure/database/database.module';
import { AppConfigService } from '@/config/app.config';
import { CouponRepository } from '@/infrastructure/persistence/coupon.repository';
import { CouponDrizzleStore } from '@/infrastructure/persistence/drizzle/coupon-drizzle-store';
import { PlanRepository } from '@/infrastructure/persistence/plan.repository';
import { PlanDrizzleStore } from '@/infrastructure/persistence/drizzle/plan-drizzle-store';
import { UserRepository } from '@/infrastructure/persistence/user.repository';
import { UserDrizzleStore } from '@/infrastructure/persistence/drizzle/user-drizzle-store';
import { WebSessionRepository } from '@/infrastructure/persistence/web-session.repository';
import { WebSessionDrizzleStore } from '@/infrastructure/persistence/drizzle/web-session-drizzle-store';
import { ActivityRepository } from '@/infrastructure/persistence/activity.repository';
import { ActivityDrizzleStore } from '@/infrastructure/persistence/drizzle/activity-drizzle-store';

@Module({
  imports: [DatabaseModule],
  providers: [
    AppConfigService,
    {
      provide: CouponRepository,
      useClass: CouponDrizzleStore,
    },
    {
      provide: PlanRepository,
      useClass: PlanDrizzleStore,
    },
    {
      provide: UserRepository,
      useClass: UserDrizzleStore,
    },
    {
      provide: WebSessionRepository,
      useClass: WebSessionDrizzleStore,
    },
    {
      provide: ActivityRepository,
      useClass: ActivityDrizzleStore,
    },
  ],
  exports: [
    CouponRepository,
    PlanRepository,
    UserRepository,
    WebSessionRepository,
    ActivityRepository,
  ],
})
export class PersistenceModule {}
