import { Injectable } from '@nestjs/common';
import { UserRepository } from '@/infrastructure/persistence/user.repository';
import { PlanRepository } from '@/infrastructure/persistence/plan.repository';
import { CouponRepository } from '@/infrastructure/persistence/coupon.repository';
import { ActivityLogService } from '@/infrastructure/activity/activity-log.service';
import type { ActivityData } from '@/domain/types/activity.types';
import type { AuthenticatedUser } from '@/domain/types/user.types';

const RECENT_ACTIVITY_LIMIT = 10;

export interface AdminDashboardStats {
  kind: 'admin';
  totalAgents: number;
  activeAgents: number;
  activePlans: number;
  activeCoupons: number;
  recentActivities: ActivityData[];
}

export interface AgentDashboardStats {
  kind: 'agent';
  planName: string | null;
  planExpiryDate: Date | null;
  /** Days until the plan expires; 0 once it has */
  daysRemaining: number | null;
  pdfGenerated: number;
  pdfLimit: number;
  pdfRemaining: number;
}

export type DashboardStats = AdminDashboardStats | AgentDashboardStats;

@Injectable()
export class DashboardService {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly planRepository: PlanRepository,
    private readonly couponRepository: CouponRepository,
    private readonly activityLog: ActivityLogService,
  ) {}

  async getStats(actor: AuthenticatedUser, at: Date = new Date()): Promise<DashboardStats> {
    if (actor.role === 'AGENT') {
      return this.getAgentStats(actor.userId, at);
    }

    const [totalAgents, activeAgents, activePlans, activeCoupons, recentActivities] = await Promise.all([
      this.userRepository.countByRole('AGENT', false),
      this.userRepository.countByRole('AGENT', true),
      this.planRepository.getActivePlans(),
      this.couponRepository.countActive(),
      this.activityLog.listRecent(RECENT_ACTIVITY_LIMIT),
    ]);

    return {
      kind: 'admin',
      totalAgents,
      activeAgents,
      activePlans: activePlans.length,
      activeCoupons,
      recentActivities,
    };
  }

  private async getAgentStats(userId: number, at: Date): Promise<AgentDashboardStats> {
    const user = await this.userRepository.findById(userId);
    const plan = user?.planId ? await this.planRepository.getById(user.planId) : null;

    const pdfGenerated = user?.pdfGenerated ?? 0;
    const pdfLimit = user?.pdfLimit ?? 0;
    const planExpiryDate = user?.planExpiryDate ?? null;

    return {
      kind: 'agent',
      planName: plan?.name ?? null,
      planExpiryDate,
      daysRemaining: planExpiryDate
        ? Math.max(0, Math.ceil((planExpiryDate.getTime() - at.getTime()) / (24 * 60 * 60 * 1000)))
        : null,
      pdfGenerated,
      pdfLimit,
      pdfRemaining: Math.max(0, pdfLimit - pdfGenerated),
    };
  }
}
