// src/config/plans.ts

import type { PaymentPlan, PaymentPlanId } from '../types/subscription.js';

/**
 * Days granted per paid month
 */
export const DAYS_PER_MONTH = 30;

/**
 * Payment plans offered by the payment stub (prices in tomans)
 */
export const PAYMENT_PLANS: Record<PaymentPlanId, PaymentPlan> = {
  monthly: {
    id: 'monthly',
    displayName: 'ماهانه',
    months: 1,
    price: 980_000,
  },
  seasonal: {
    id: 'seasonal',
    displayName: 'فصلی',
    months: 3,
    price: 7_599_000,
  },
};

export const PAYMENT_PLAN_IDS: readonly PaymentPlanId[] = ['monthly', 'seasonal'];

export function isPaymentPlanId(value: string): value is PaymentPlanId {
  return PAYMENT_PLAN_IDS.some((id) => id === value);
}

/**
 * Price after an attached discount fraction (0 < fraction <= 1)
 */
export function applyDiscount(price: number, fraction: number | null): number {
  if (fraction === null || fraction <= 0) return price;
  return Math.round(price * (1 - Math.min(fraction, 1)));
}

/**
 * Stub payment link; no gateway is contacted
 */
export function paymentLink(userId: string, amount: number): string {
  return `https://pay.example.com/start/mock-${encodeURIComponent(userId)}-${amount}`;
}
