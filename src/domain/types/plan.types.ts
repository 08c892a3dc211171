import { z } from 'zod';

export const BILLING_PERIODS = ['MONTHLY', 'YEARLY', 'CUSTOM'] as const;
export type BillingPeriod = (typeof BILLING_PERIODS)[number];

/**
 * Subscription plan assigned to agents
 */
export interface PlanData {
  id: number;
  name: string;
  description: string | null;
  billingPeriod: BillingPeriod;
  /** Months for MONTHLY, years for YEARLY, days for CUSTOM */
  periodValue: number;
  priceInCents: number;
  pdfLimit: number;
  features: string[];
  isActive: boolean;
  createdBy: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export const CreatePlanSchema = z.object({
  name: z.string().trim().min(1).max(120),
  description: z.string().trim().max(500).nullable().optional(),
  billingPeriod: z.enum(BILLING_PERIODS),
  periodValue: z.number().int().positive(),
  priceInCents: z.number().int().nonnegative(),
  pdfLimit: z.number().int().nonnegative(),
  features: z.array(z.string().trim().min(1)).optional(),
  isActive: z.boolean().optional(),
});

export type CreatePlanInput = z.infer<typeof CreatePlanSchema>;

export const UpdatePlanSchema = CreatePlanSchema.omit({ isActive: true }).partial().strict();

export type UpdatePlanInput = z.infer<typeof UpdatePlanSchema>;

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().positive().optional(),
  perPage: z.coerce.number().int().positive().max(100).optional(),
});

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  perPage: number;
  totalPages: number;
}
