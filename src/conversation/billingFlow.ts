// src/conversation/billingFlow.ts
import { PAYMENT_PLANS, PAYMENT_PLAN_IDS, applyDiscount, paymentLink } from '../config/plans.js';
import { clearDiscount, extend, getSubscription } from '../db/subscriptionDb.js';
import { redeemForUser } from '../db/discountDb.js';
import { logger } from '../lib/logger.js';
import type { PaymentPlanId } from '../types/subscription.js';
import { formatDate, formatToman } from './formatting.js';
import {
  DISCOUNT_INVALID,
  DISCOUNT_PROMPT,
  PAYMENT_DUPLICATE,
  PAYMENT_NOT_FOUND,
  PAYMENT_REFERENCE_INVALID,
  SUBSCRIPTION_EXPIRED,
  activeUntil,
  discountApplied,
  discountAttached,
  paymentConfirmed,
  paymentInstructions,
} from './messages.js';
import { isSubscribed, mainMenu } from './screens.js';
import type { BillingState } from './states.js';
import { BACK, PAY_MONTHLY, PAY_SEASONAL, matches, type ActionToken } from './tokens.js';
import { validatePaymentReference } from './validators.js';
import { transition, type FlowDeps, type StepResult, type Transition, type TurnContext } from './types.js';

const log = logger.child({ module: 'billingFlow' });

const PLAN_TOKENS: Record<PaymentPlanId, ActionToken> = {
  monthly: PAY_MONTHLY,
  seasonal: PAY_SEASONAL,
};

function planFor(input: string): PaymentPlanId | null {
  return PAYMENT_PLAN_IDS.find((id) => matches(input, PLAN_TOKENS[id])) ?? null;
}

function toPercent(fraction: number): number {
  return Math.round(fraction * 100);
}

/**
 * Plan list with the attached discount applied, entering plan selection
 */
export function paymentOffer(ctx: TurnContext, deps: FlowDeps, lead?: string): Transition {
  const subscription = ctx.subscription;
  const discount = subscription?.discountPercentage ?? null;

  const lines: string[] = [];
  if (lead) lines.push(lead, '');
  lines.push(
    subscription && isSubscribed(ctx)
      ? activeUntil(formatDate(subscription.expiresAt, deps.timeZone))
      : SUBSCRIPTION_EXPIRED,
    ''
  );
  for (const id of PAYMENT_PLAN_IDS) {
    const plan = PAYMENT_PLANS[id];
    lines.push(`• ${plan.displayName}: ${formatToman(applyDiscount(plan.price, discount))}`);
  }
  if (discount !== null) {
    lines.push('', discountAttached(toPercent(discount)));
  }

  return transition('payment_selection', lines.join('\n'), {
    suggestedReplies: [PAY_MONTHLY.label, PAY_SEASONAL.label, BACK],
  });
}

export function discountPrompt(): Transition {
  return transition('discount_code', DISCOUNT_PROMPT, { suggestedReplies: [BACK] });
}

function refreshed(ctx: TurnContext): TurnContext {
  return { ...ctx, subscription: getSubscription(ctx.user.userId) };
}

function confirmPayment(ctx: TurnContext, deps: FlowDeps, reference: string): StepResult {
  const { planId, amount } = ctx.data;
  if (!planId || amount === undefined) {
    return paymentOffer(ctx, deps);
  }
  const plan = PAYMENT_PLANS[planId];
  const userId = ctx.user.userId;

  return {
    commit: () => {
      const outcome = extend(userId, amount, reference, plan.months, ctx.now);

      switch (outcome.status) {
        case 'extended':
          clearDiscount(userId, ctx.now);
          log.info({ userId, plan: planId, amount, expiresAt: outcome.expiresAt }, 'Subscription extended');
          return mainMenu(refreshed(ctx), paymentConfirmed(formatDate(outcome.expiresAt, deps.timeZone)));
        case 'duplicate':
          log.warn({ userId, plan: planId }, 'Payment reference already recorded');
          return mainMenu(ctx, PAYMENT_DUPLICATE);
        case 'not_found':
          log.error({ userId }, 'Payment for user without subscription');
          return mainMenu(ctx, PAYMENT_NOT_FOUND);
      }
    },
  };
}

function redeem(ctx: TurnContext, code: string): StepResult {
  const userId = ctx.user.userId;
  return {
    commit: () => {
      const discount = redeemForUser(code, userId, ctx.now);
      if (!discount) {
        return transition('discount_code', DISCOUNT_INVALID, { suggestedReplies: [BACK] });
      }
      return mainMenu(refreshed(ctx), discountApplied(toPercent(discount.discountPercentage)));
    },
  };
}

/**
 * Plan selection, payment reference and discount code entry
 */
export async function handleBilling(state: BillingState, ctx: TurnContext, deps: FlowDeps): Promise<StepResult> {
  const { input } = ctx;

  switch (state) {
    case 'payment_selection': {
      if (matches(input, BACK)) return mainMenu(ctx);
      const planId = planFor(input);
      if (!planId) return paymentOffer(ctx, deps);

      const plan = PAYMENT_PLANS[planId];
      const amount = applyDiscount(plan.price, ctx.subscription?.discountPercentage ?? null);
      return transition(
        'payment_reference',
        paymentInstructions(plan.displayName, formatToman(amount), paymentLink(ctx.user.userId, amount)),
        { data: { planId, amount }, suggestedReplies: [BACK] }
      );
    }

    case 'payment_reference': {
      if (matches(input, BACK)) return paymentOffer(ctx, deps);
      const reference = validatePaymentReference(input);
      if (!reference.ok) {
        return transition('payment_reference', PAYMENT_REFERENCE_INVALID, {
          data: ctx.data,
          suggestedReplies: [BACK],
        });
      }
      return confirmPayment(ctx, deps, reference.value);
    }

    case 'discount_code': {
      if (matches(input, BACK)) return mainMenu(ctx);
      if (!input) return discountPrompt();
      return redeem(ctx, input);
    }
  }
}
