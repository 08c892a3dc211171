import { z } from 'zod';

export const USER_ROLES = ['OWNER', 'ADMIN', 'AGENT'] as const;
export type UserRole = (typeof USER_ROLES)[number];

/**
 * Capabilities checked by the HTTP layer before reaching a service
 */
export type Action =
  | 'coupon:manage'
  | 'coupon:validate'
  | 'coupon:redeem'
  | 'plan:manage'
  | 'plan:read'
  | 'user:manage'
  | 'user:read'
  | 'dashboard:read';

/**
 * Identity attached to a request once its session resolves
 */
export interface AuthenticatedUser {
  userId: number;
  role: UserRole;
}

export interface UserData {
  id: number;
  username: string;
  email: string;
  fullName: string | null;
  role: UserRole;
  isActive: boolean;
  planId: number | null;
  planStartDate: Date | null;
  planExpiryDate: Date | null;
  pdfGenerated: number;
  pdfLimit: number;
  createdBy: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export const CreateUserSchema = z.object({
  username: z.string().trim().min(3).max(64),
  email: z.string().trim().toLowerCase().email(),
  fullName: z.string().trim().max(120).nullable().optional(),
  role: z.enum(USER_ROLES),
});

export type CreateUserInput = z.infer<typeof CreateUserSchema>;

export const AssignPlanSchema = z.object({
  planId: z.number().int().positive(),
});

export const UserListQuerySchema = z.object({
  page: z.coerce.number().int().positive().optional(),
  perPage: z.coerce.number().int().positive().max(100).optional(),
  role: z.enum(USER_ROLES).optional(),
});

export type UserListQuery = z.infer<typeof UserListQuerySchema>;
