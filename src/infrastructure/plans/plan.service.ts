import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { PlanRepository, NewPlanData, PlanChanges } from '@/infrastructure/persistence/plan.repository';
import { UserRepository } from '@/infrastructure/persistence/user.repository';
import { ActivityLogService } from '@/infrastructure/activity/activity-log.service';
import { AppConfigService } from '@/config/app.config';
import { PlanPeriodUtil } from '@/domain/utils/plan-period.util';
import { PaginationUtil } from '@/domain/utils/pagination.util';
import type {
  CreatePlanInput,
  Page,
  PlanData,
  UpdatePlanInput,
} from '@/domain/types/plan.types';

/**
 * Error types for plan operations
 */
export class PlanError extends Error {
  constructor(
    message: string,
    public readonly code: 'plan_not_found' | 'plan_name_taken' | 'plan_in_use',
  ) {
    super(message);
    this.name = 'PlanError';
  }
}

/**
 * Plan with its human-readable billing period
 */
export interface PlanView extends PlanData {
  periodLabel: string;
}

const DEFAULT_PLANS: Omit<NewPlanData, 'createdBy'>[] = [
  {
    name: 'Basic',
    description: 'For individual agents getting started',
    billingPeriod: 'MONTHLY',
    periodValue: 1,
    priceInCents: 99900,
    pdfLimit: 50,
    features: ['Up to 50 PDFs per month', 'Standard templates', 'Email support'],
    isActive: true,
  },
  {
    name: 'Professional',
    description: 'For growing agencies with several clients',
    billingPeriod: 'MONTHLY',
    periodValue: 1,
    priceInCents: 249900,
    pdfLimit: 200,
    features: ['Up to 200 PDFs per month', 'Advanced planning tools', 'Priority support'],
    isActive: true,
  },
  {
    name: 'Enterprise',
    description: 'For large agencies',
    billingPeriod: 'YEARLY',
    periodValue: 1,
    priceInCents: 4999900,
    pdfLimit: 5000,
    features: ['Up to 5000 PDFs per year', 'All advanced features', 'Dedicated support'],
    isActive: true,
  },
];

/**
 * Service for managing subscription plans
 */
@Injectable()
export class PlanService implements OnModuleInit {
  private readonly logger = new Logger(PlanService.name);

  constructor(
    private readonly planRepository: PlanRepository,
    private readonly userRepository: UserRepository,
    private readonly activityLog: ActivityLogService,
    private readonly appConfig: AppConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    if (this.appConfig.shouldSeedDefaultPlans()) {
      await this.seedDefaultPlans();
    }
  }

  /**
   * Creates the default plans that are missing. Existing plans are left untouched.
   */
  async seedDefaultPlans(): Promise<void> {
    for (const plan of DEFAULT_PLANS) {
      const existing = await this.planRepository.getByName(plan.name);
      if (!existing) {
        await this.planRepository.create({ ...plan, features: [...plan.features], createdBy: null });
        this.logger.log(`Seeded plan: ${plan.name}`);
      }
    }
  }

  /**
   * @throws PlanError when the plan does not exist
   */
  async getById(id: number): Promise<PlanView> {
    return this.toView(await this.requirePlan(id));
  }

  async getActivePlans(): Promise<PlanView[]> {
    const plans = await this.planRepository.getActivePlans();
    return plans.map((plan) => this.toView(plan));
  }

  async list(query: { page?: number; perPage?: number }): Promise<Page<PlanView>> {
    const plans = await this.planRepository.getAllPlans();
    return PaginationUtil.paginate(
      plans.map((plan) => this.toView(plan)),
      query.page ?? 1,
      query.perPage ?? this.appConfig.getItemsPerPage(),
    );
  }

  async create(input: CreatePlanInput, actorId: number): Promise<PlanView> {
    await this.assertNameAvailable(input.name, null);

    const plan = await this.planRepository.create({
      name: input.name,
      description: input.description ?? null,
      billingPeriod: input.billingPeriod,
      periodValue: input.periodValue,
      priceInCents: input.priceInCents,
      pdfLimit: input.pdfLimit,
      features: input.features ?? [],
      isActive: input.isActive ?? true,
      createdBy: actorId,
    });

    this.logger.log(`Plan ${plan.id} (${plan.name}) created by user ${actorId}`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'PLAN_CREATED',
      description: `Created plan ${plan.name}`,
      metadata: { planId: plan.id },
    });

    return this.toView(plan);
  }

  async update(id: number, input: UpdatePlanInput, actorId: number): Promise<PlanView> {
    const existing = await this.requirePlan(id);

    if (input.name !== undefined && input.name !== existing.name) {
      await this.assertNameAvailable(input.name, id);
    }

    const changes: PlanChanges = {};
    if (input.name !== undefined) changes.name = input.name;
    if (input.description !== undefined) changes.description = input.description;
    if (input.billingPeriod !== undefined) changes.billingPeriod = input.billingPeriod;
    if (input.periodValue !== undefined) changes.periodValue = input.periodValue;
    if (input.priceInCents !== undefined) changes.priceInCents = input.priceInCents;
    if (input.pdfLimit !== undefined) changes.pdfLimit = input.pdfLimit;
    if (input.features !== undefined) changes.features = input.features;

    const plan = await this.requireUpdated(id, changes);

    this.logger.log(`Plan ${id} updated by user ${actorId}`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'PLAN_UPDATED',
      description: `Updated plan ${plan.name}`,
      metadata: { planId: id },
    });

    return this.toView(plan);
  }

  async toggleActive(id: number, actorId: number): Promise<PlanView> {
    const existing = await this.requirePlan(id);
    const plan = await this.requireUpdated(id, { isActive: !existing.isActive });

    const statusText = plan.isActive ? 'activated' : 'deactivated';
    this.logger.log(`Plan ${id} ${statusText} by user ${actorId}`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'PLAN_STATUS_CHANGE',
      description: `Plan ${plan.name} ${statusText}`,
      metadata: { planId: id, isActive: plan.isActive },
    });

    return this.toView(plan);
  }

  /**
   * Soft delete: the plan is deactivated, and refused while users are still on it
   * @throws PlanError('plan_in_use') when any user is assigned the plan
   */
  async delete(id: number, actorId: number): Promise<void> {
    const existing = await this.requirePlan(id);

    const assignedUsers = await this.userRepository.countByPlanId(id);
    if (assignedUsers > 0) {
      throw new PlanError(
        `Plan is assigned to ${assignedUsers} user(s) and cannot be deleted`,
        'plan_in_use',
      );
    }

    await this.requireUpdated(id, { isActive: false });

    this.logger.log(`Plan ${id} deleted by user ${actorId}`);
    await this.activityLog.record({
      userId: actorId,
      activityType: 'PLAN_DELETED',
      description: `Deleted plan ${existing.name}`,
      metadata: { planId: id },
    });
  }

  describePeriod(plan: PlanData): string {
    return PlanPeriodUtil.describe(plan);
  }

  calculateExpiry(plan: PlanData, from: Date): Date {
    return PlanPeriodUtil.calculateExpiry(plan, from);
  }

  private toView(plan: PlanData): PlanView {
    return { ...plan, periodLabel: PlanPeriodUtil.describe(plan) };
  }

  private async requirePlan(id: number): Promise<PlanData> {
    const plan = await this.planRepository.getById(id);
    if (!plan) {
      throw new PlanError('Plan not found', 'plan_not_found');
    }
    return plan;
  }

  private async requireUpdated(id: number, changes: PlanChanges): Promise<PlanData> {
    const plan = await this.planRepository.update(id, changes);
    if (!plan) {
      throw new PlanError('Plan not found', 'plan_not_found');
    }
    return plan;
  }

  private async assertNameAvailable(name: string, currentId: number | null): Promise<void> {
    const existing = await this.planRepository.getByName(name);
    if (existing && existing.id !== currentId) {
      throw new PlanError('A plan with this name already exists', 'plan_name_taken');
    }
  }
}
