import { sql } from 'drizzle-orm';
import {
  pgTable,
  pgEnum,
  text,
  integer,
  boolean,
  doublePrecision,
  jsonb,
  timestamp,
  index,
  check,
} from 'drizzle-orm/pg-core';
import type { ActivityMetadata, ActivityType } from '@/domain/types/activity.types';

export const userRoleEnum = pgEnum('user_role', ['OWNER', 'ADMIN', 'AGENT']);
export const billingPeriodEnum = pgEnum('billing_period', ['MONTHLY', 'YEARLY', 'CUSTOM']);
export const discountTypeEnum = pgEnum('discount_type', ['PERCENTAGE', 'FIXED_AMOUNT']);

/**
 * Subscription plans - assigned to agents, referenced by coupons
 */
export const plans = pgTable('plans', {
  id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
  name: text('name').notNull().unique(),
  description: text('description'),
  billingPeriod: billingPeriodEnum('billing_period').notNull(),
  periodValue: integer('period_value').notNull().default(1),
  priceInCents: integer('price_in_cents').notNull(),
  pdfLimit: integer('pdf_limit').notNull().default(0),
  features: jsonb('features').$type<string[]>().notNull().default([]),
  isActive: boolean('is_active').notNull().default(true),
  createdBy: integer('created_by'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

/**
 * Administrators and agents
 */
export const users = pgTable(
  'users',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    username: text('username').notNull().unique(),
    email: text('email').notNull().unique(),
    fullName: text('full_name'),
    role: userRoleEnum('role').notNull().default('AGENT'),
    isActive: boolean('is_active').notNull().default(true),
    planId: integer('plan_id').references(() => plans.id),
    planStartDate: timestamp('plan_start_date', { withTimezone: true }),
    planExpiryDate: timestamp('plan_expiry_date', { withTimezone: true }),
    pdfGenerated: integer('pdf_generated').notNull().default(0),
    pdfLimit: integer('pdf_limit').notNull().default(0),
    createdBy: integer('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    roleIdx: index('users_role_idx').on(table.role),
    planIdIdx: index('users_plan_id_idx').on(table.planId),
  }),
);

/**
 * Discount coupons. usage_count only moves through the conditional increment.
 */
export const coupons = pgTable(
  'coupons',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    code: text('code').notNull().unique(),
    name: text('name').notNull(),
    description: text('description'),
    discountType: discountTypeEnum('discount_type').notNull(),
    discountValue: doublePrecision('discount_value').notNull(),
    minPurchaseInCents: integer('min_purchase_in_cents').notNull().default(0),
    maxDiscountInCents: integer('max_discount_in_cents'),
    validFrom: timestamp('valid_from', { withTimezone: true }).notNull(),
    validUntil: timestamp('valid_until', { withTimezone: true }).notNull(),
    usageLimit: integer('usage_limit'),
    usageCount: integer('usage_count').notNull().default(0),
    applicablePlanIds: integer('applicable_plan_ids')
      .array()
      .notNull()
      .default(sql`'{}'::integer[]`),
    isActive: boolean('is_active').notNull().default(true),
    createdBy: integer('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    isActiveIdx: index('coupons_is_active_idx').on(table.isActive),
    usageWithinLimit: check(
      'coupons_usage_within_limit',
      sql`${table.usageLimit} IS NULL OR ${table.usageCount} <= ${table.usageLimit}`,
    ),
  }),
);

/**
 * Web sessions issued by the authentication service
 */
export const webSessions = pgTable(
  'web_sessions',
  {
    id: text('id').primaryKey(),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id),
    token: text('token').notNull().unique(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    userIdIdx: index('web_sessions_user_id_idx').on(table.userId),
  }),
);

/**
 * Audit trail of administrative actions
 */
export const activities = pgTable(
  'activities',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    userId: integer('user_id'),
    activityType: text('activity_type').$type<ActivityType>().notNull(),
    description: text('description').notNull(),
    metadata: jsonb('metadata').$type<ActivityMetadata>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    createdAtIdx: index('activities_created_at_idx').on(table.createdAt),
  }),
);
