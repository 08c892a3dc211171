export type ActivityType =
  | 'COUPON_CREATED'
  | 'COUPON_UPDATED'
  | 'COUPON_STATUS_CHANGE'
  | 'COUPON_REDEEMED'
  | 'PLAN_CREATED'
  | 'PLAN_UPDATED'
  | 'PLAN_STATUS_CHANGE'
  | 'PLAN_DELETED'
  | 'USER_CREATED'
  | 'USER_STATUS_CHANGE'
  | 'PLAN_ASSIGNED';

export type ActivityMetadata = Record<string, string | number | boolean | null>;

export interface ActivityData {
  id: number;
  userId: number | null;
  activityType: ActivityType;
  description: string;
  metadata: ActivityMetadata;
  createdAt: Date;
}

export interface ActivityInput {
  userId: number | null;
  activityType: ActivityType;
  description: string;
  metadata?: ActivityMetadata;
}
