import { Injectable, Logger } from '@nestjs/common';
import { UserRepository, UserChanges } from '@/infrastructure/persistence/user.repository';
import { PlanRepository } from '@/infrastructure/persistence/plan.repository';
import { ActivityLogService } from '@/infrastructure/activity/activity-log.service';
import { AppConfigService } from '@/config/app.config';
import { PermissionsUtil } from '@/domain/utils/permissions.util';
import { PlanPeriodUtil } from '@/domain/utils/plan-period.util';
import { PaginationUtil } from '@/domain/utils/pagination.util';
import type { Page } from '@/domain/types/plan.types';
import type {
  AuthenticatedUser,
  CreateUserInput,
  UserData,
  UserListQuery,
} from '@/domain/types/user.types';

export type UserErrorCode =
  | 'user_not_found'
  | 'user_exists'
  | 'role_not_allowed'
  | 'cannot_deactivate_self'
  | 'plan_not_assignable'
  | 'plan_unavailable';

/**
 * Error types for user administration
 */
export class UserError extends Error {
  constructor(
    message: string,
    public readonly code: UserErrorCode,
  ) {
    super(message);
    this.name = 'UserError';
  }
}

/**
 * Service for administrators and agents
 */
@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    private readonly userRepository: UserRepository,
    private readonly planRepository: PlanRepository,
    private readonly activityLog: ActivityLogService,
    private readonly appConfig: AppConfigService,
  ) {}

  /**
   * @throws UserError('role_not_allowed') when an admin tries to create anything but an agent
   * @throws UserError('user_exists') when the username or email is taken
   */
  async create(input: CreateUserInput, actor: AuthenticatedUser): Promise<UserData> {
    if (!PermissionsUtil.canManageRole(actor.role, input.role)) {
      throw new UserError(`A ${actor.role} cannot create ${input.role} users`, 'role_not_allowed');
    }

    const existing = await this.userRepository.findByUsernameOrEmail(input.username, input.email);
    if (existing) {
      throw new UserError('Username or email already exists', 'user_exists');
    }

    const user = await this.userRepository.create({
      username: input.username,
      email: input.email,
      fullName: input.fullName ?? null,
      role: input.role,
      createdBy: actor.userId,
    });

    this.logger.log(`${user.role} user ${user.username} created by user ${actor.userId}`);
    await this.activityLog.record({
      userId: actor.userId,
      activityType: 'USER_CREATED',
      description: `Created ${user.role} user ${user.username}`,
      metadata: { targetUserId: user.id, role: user.role },
    });

    return user;
  }

  async list(query: UserListQuery): Promise<Page<UserData>> {
    const users = await this.userRepository.list({ role: query.role });
    return PaginationUtil.paginate(users, query.page ?? 1, query.perPage ?? this.appConfig.getItemsPerPage());
  }

  async getById(id: number): Promise<UserData> {
    const user = await this.userRepository.findById(id);
    if (!user) {
      throw new UserError('User not found', 'user_not_found');
    }
    return user;
  }

  async toggleActive(id: number, actor: AuthenticatedUser): Promise<UserData> {
    if (id === actor.userId) {
      throw new UserError('You cannot change your own status', 'cannot_deactivate_self');
    }

    const existing = await this.getById(id);
    if (!PermissionsUtil.canManageRole(actor.role, existing.role)) {
      throw new UserError(`A ${actor.role} cannot change ${existing.role} users`, 'role_not_allowed');
    }

    const user = await this.requireUpdated(id, { isActive: !existing.isActive });

    const statusText = user.isActive ? 'activated' : 'deactivated';
    this.logger.log(`User ${user.username} ${statusText} by user ${actor.userId}`);
    await this.activityLog.record({
      userId: actor.userId,
      activityType: 'USER_STATUS_CHANGE',
      description: `User ${user.username} ${statusText}`,
      metadata: { targetUserId: id, isActive: user.isActive },
    });

    return user;
  }

  /**
   * Starts a fresh plan period for an agent and resets their PDF allowance
   */
  async assignPlan(userId: number, planId: number, actor: AuthenticatedUser, at: Date = new Date()): Promise<UserData> {
    const existing = await this.getById(userId);
    if (existing.role !== 'AGENT') {
      throw new UserError('Plans can only be assigned to agents', 'plan_not_assignable');
    }

    const plan = await this.planRepository.getById(planId);
    if (!plan || !plan.isActive) {
      throw new UserError('Plan not found or inactive', 'plan_unavailable');
    }

    const user = await this.requireUpdated(userId, {
      planId: plan.id,
      planStartDate: at,
      planExpiryDate: PlanPeriodUtil.calculateExpiry(plan, at),
      pdfLimit: plan.pdfLimit,
      pdfGenerated: 0,
    });

    this.logger.log(`Plan ${plan.name} assigned to ${user.username} by user ${actor.userId}`);
    await this.activityLog.record({
      userId: actor.userId,
      activityType: 'PLAN_ASSIGNED',
      description: `Assigned plan ${plan.name} to ${user.username}`,
      metadata: { targetUserId: userId, planId: plan.id },
    });

    return user;
  }

  private async requireUpdated(id: number, changes: UserChanges): Promise<UserData> {
    const user = await this.userRepository.update(id, changes);
    if (!user) {
      throw new UserError('User not found', 'user_not_found');
    }
    return user;
  }
}
