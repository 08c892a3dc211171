import type { PlanData } from '../types/plan.types';

const DAY_IN_MS = 24 * 60 * 60 * 1000;

type PeriodFields = Pick<PlanData, 'billingPeriod' | 'periodValue'>;

export class PlanPeriodUtil {
  /**
   * "1 Month", "2 Years", "Custom (45 days)"
   */
  static describe(plan: PeriodFields): string {
    const plural = plan.periodValue > 1 ? 's' : '';
    switch (plan.billingPeriod) {
      case 'MONTHLY':
        return `${plan.periodValue} Month${plural}`;
      case 'YEARLY':
        return `${plan.periodValue} Year${plural}`;
      case 'CUSTOM':
        return `Custom (${plan.periodValue} days)`;
    }
  }

  /**
   * Length of one billing period in days. Months count as 30 days, years as 365.
   */
  static periodDays(plan: PeriodFields): number {
    switch (plan.billingPeriod) {
      case 'MONTHLY':
        return 30 * plan.periodValue;
      case 'YEARLY':
        return 365 * plan.periodValue;
      case 'CUSTOM':
        return plan.periodValue;
    }
  }

  static calculateExpiry(plan: PeriodFields, from: Date): Date {
    return new Date(from.getTime() + PlanPeriodUtil.periodDays(plan) * DAY_IN_MS);
  }
}
