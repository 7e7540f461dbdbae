// src/types/subscription.ts

/**
 * Subscription status
 *
 * - trial: granted automatically at signup
 * - active: paid at least once
 * - expired: lapsed trial or paid period
 */
export type SubscriptionStatus = 'trial' | 'active' | 'expired';

/**
 * Subscription record for a user (one-to-one)
 */
export interface Subscription {
  userId: string;
  status: SubscriptionStatus;
  startedAt: Date;
  expiresAt: Date;
  paymentAmount: number;
  paymentReference: string | null;
  discountPercentage: number | null;
  discountCode: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Result of a subscription extension
 */
export type ExtendOutcome =
  | { status: 'extended'; expiresAt: Date }
  | { status: 'duplicate'; expiresAt: Date }
  | { status: 'not_found' };

export type PaymentPlanId = 'monthly' | 'seasonal';

/**
 * Payment plan offered by the payment stub
 */
export interface PaymentPlan {
  id: PaymentPlanId;
  displayName: string;
  months: number;
  price: number; // in tomans
}
