// src/conversation/onboardingFlow.ts
import { PAYMENT_PLANS } from '../config/plans.js';
import { setOnboardingStep, completeOnboarding, updateUser } from '../db/userDb.js';
import { approveSummary, saveSummary, updateProfile } from '../db/profileDb.js';
import type { Profile, ProfilePatch, UserPatch } from '../types/user.js';
import { paymentOffer } from './billingFlow.js';
import { formatScenario, formatToman } from './formatting.js';
import {
  BUSINESS_LEAD,
  EMAIL_INVALID,
  ONBOARDING_THEME,
  PHONE_INVALID,
  PROFILE_UPDATED,
  STARTER_SCENARIOS,
  SUBSCRIPTION_LATER,
  SUMMARY_REJECTED,
  YES_NO_INVALID,
  funnelPrompt,
  galleryAck,
  greeting,
  invalidTextMessage,
  subscriptionOffer,
} from './messages.js';
import { mainMenu, profileEditMenu } from './screens.js';
import { FUNNEL_STEP, PREDECESSOR, isFunnelState, type FunnelState, type HandoffState } from './states.js';
import {
  BACK,
  CONFIRM_NO,
  CONFIRM_YES,
  CONTINUE,
  READY,
  SCENARIO_CONTINUE,
  SCENARIO_NEXT,
  SCENARIO_PREV,
  SKIP,
  SUBSCRIBE_LATER,
  SUBSCRIBE_NOW,
  matches,
} from './tokens.js';
import {
  MAX_NAME_LENGTH,
  MAX_TEXT_LENGTH,
  parseYesNo,
  validateEmail,
  validateHandle,
  validatePhone,
  validateRequiredText,
} from './validators.js';
import {
  transition,
  type ConversationData,
  type FlowDeps,
  type StepResult,
  type Transition,
  type TurnContext,
} from './types.js';

interface EnterOptions {
  lead?: string;
  summary?: string | null;
  effects?: Array<() => void>;
  data?: ConversationData;
}

/**
 * Move to a funnel state and show its prompt. The onboarding step follows the
 * funnel only until onboarding is completed.
 */
function enter(ctx: TurnContext, state: FunnelState, options: EnterOptions = {}): Transition {
  const prompt = funnelPrompt(state, options.summary);
  const effects = [...(options.effects ?? [])];

  if (!ctx.user.onboardingCompleted) {
    const { userId } = ctx.user;
    effects.push(() => setOnboardingStep(userId, FUNNEL_STEP[state], ctx.now));
  }

  return transition(state, options.lead ? `${options.lead}\n\n${prompt.text}` : prompt.text, {
    data: options.data ?? ctx.data,
    suggestedReplies: prompt.suggestedReplies,
    effects,
  });
}

/**
 * Re-prompt the current state without changing anything
 */
function retry(ctx: TurnContext, state: FunnelState, message: string): Transition {
  const prompt = funnelPrompt(state, ctx.profile.situationSummary);
  return transition(state, `${message}\n\n${prompt.text}`, {
    data: ctx.data,
    suggestedReplies: prompt.suggestedReplies,
  });
}

function patchUser(ctx: TurnContext, patch: UserPatch): () => void {
  const { userId } = ctx.user;
  return () => {
    updateUser(userId, patch, ctx.now);
  };
}

function patchProfile(ctx: TurnContext, patch: ProfilePatch): () => void {
  const { userId } = ctx.user;
  return () => {
    updateProfile(userId, patch, ctx.now);
  };
}

function back(ctx: TurnContext, state: FunnelState): Transition {
  // Re-running the business questions from the profile editor starts at gallery_name
  if (state === 'gallery_name' && ctx.data.rerun) {
    return profileEditMenu();
  }
  const previous = PREDECESSOR[state];
  if (!isFunnelState(previous)) return mainMenu(ctx);
  return enter(ctx, previous, { summary: ctx.profile.situationSummary });
}

/**
 * Generate the situation summary; without new info the stored field is kept
 */
async function summarize(ctx: TurnContext, deps: FlowDeps, additionalInfo?: string): Promise<Transition> {
  const saveInfo = additionalInfo === undefined ? [] : [patchProfile(ctx, { additionalInfo })];
  const profile: Profile =
    additionalInfo === undefined ? ctx.profile : { ...ctx.profile, additionalInfo };

  const result = await deps.generator.generate('summary', '', profile, {
    userId: ctx.user.userId,
    signal: ctx.signal,
    now: ctx.now,
  });
  const text = result.variants[0] ?? '';

  if (result.status !== 'ok') {
    return retry(ctx, 'additional_info', text);
  }

  const { userId } = ctx.user;
  return enter(ctx, 'summary_confirm', {
    summary: text,
    effects: [...saveInfo, () => saveSummary(userId, text, ctx.now)],
  });
}

function scenarioReplies(page: number, total: number): string[] {
  const replies: string[] = [];
  if (page > 1) replies.push(SCENARIO_PREV.label);
  if (page < total) replies.push(SCENARIO_NEXT.label);
  replies.push(SCENARIO_CONTINUE.label);
  return replies;
}

function scenarioPage(variants: string[], page: number, editsPreviousMessage: boolean, lead?: string): Transition {
  const total = variants.length;
  const current = Math.min(Math.max(page, 1), total);
  const body = formatScenario(variants[current - 1] ?? '', current, total);

  return transition('scenario_browsing', lead ? `${lead}\n\n${body}` : body, {
    data: { variants, page: current },
    suggestedReplies: scenarioReplies(current, total),
    editsPreviousMessage,
  });
}

async function confirmSummary(ctx: TurnContext, deps: FlowDeps): Promise<Transition> {
  const { userId } = ctx.user;
  const effects = [() => approveSummary(userId, ctx.now)];
  if (!ctx.user.onboardingCompleted) {
    effects.push(() => completeOnboarding(userId, ctx.now));
  }

  if (ctx.data.rerun) {
    return mainMenu(ctx, PROFILE_UPDATED, effects);
  }

  const result = await deps.generator.generate('reels', ONBOARDING_THEME, ctx.profile, {
    userId,
    signal: ctx.signal,
    count: STARTER_SCENARIOS.length,
    promptName: 'onboarding_scenarios',
    now: ctx.now,
  });
  const variants = result.status === 'ok' ? result.variants : [...STARTER_SCENARIOS];

  const page = scenarioPage(variants, 1, false);
  return { ...page, effects };
}

/**
 * Onboarding funnel: one question per state, back-navigation to the
 * predecessor, then the situation summary.
 */
export async function handleOnboarding(state: FunnelState, ctx: TurnContext, deps: FlowDeps): Promise<StepResult> {
  const { input } = ctx;

  if (matches(input, BACK)) return back(ctx, state);

  switch (state) {
    case 'ready':
      if (!matches(input, READY)) return enter(ctx, 'ready');
      return enter(ctx, 'name', { lead: 'عالی! 🎉' });

    case 'name': {
      const name = validateRequiredText(input, MAX_NAME_LENGTH);
      if (!name.ok) return retry(ctx, state, invalidTextMessage(name.reason, MAX_NAME_LENGTH));
      return enter(ctx, 'phone', {
        lead: greeting(name.value),
        effects: [patchUser(ctx, { displayName: name.value })],
      });
    }

    case 'phone': {
      if (matches(input, SKIP)) return enter(ctx, 'email');
      const phone = validatePhone(input);
      if (!phone.ok) return retry(ctx, state, PHONE_INVALID);
      return enter(ctx, 'email', { effects: [patchUser(ctx, { phone: phone.value })] });
    }

    case 'email': {
      if (matches(input, SKIP)) return enter(ctx, 'gallery_name', { lead: BUSINESS_LEAD });
      const email = validateEmail(input);
      if (!email.ok) return retry(ctx, state, EMAIL_INVALID);
      return enter(ctx, 'gallery_name', {
        lead: BUSINESS_LEAD,
        effects: [patchUser(ctx, { email: email.value })],
      });
    }

    case 'gallery_name': {
      const galleryName = validateRequiredText(input, MAX_NAME_LENGTH);
      if (!galleryName.ok) return retry(ctx, state, invalidTextMessage(galleryName.reason, MAX_NAME_LENGTH));
      return enter(ctx, 'instagram', {
        lead: galleryAck(galleryName.value),
        effects: [patchProfile(ctx, { galleryName: galleryName.value })],
      });
    }

    case 'instagram': {
      const handle = validateHandle(input);
      if (!handle.ok) return retry(ctx, state, invalidTextMessage(handle.reason, MAX_NAME_LENGTH));
      return enter(ctx, 'telegram_channel', {
        effects: [patchProfile(ctx, { instagramHandle: handle.value })],
      });
    }

    case 'telegram_channel': {
      if (matches(input, SKIP)) return enter(ctx, 'customers');
      const handle = validateHandle(input);
      if (!handle.ok) return retry(ctx, state, invalidTextMessage(handle.reason, MAX_NAME_LENGTH));
      return enter(ctx, 'customers', { effects: [patchProfile(ctx, { telegramChannel: handle.value })] });
    }

    case 'customers': {
      const customers = validateRequiredText(input, MAX_TEXT_LENGTH);
      if (!customers.ok) return retry(ctx, state, invalidTextMessage(customers.reason, MAX_TEXT_LENGTH));
      return enter(ctx, 'constraints', { effects: [patchProfile(ctx, { mainCustomers: customers.value })] });
    }

    case 'constraints': {
      if (matches(input, SKIP)) return enter(ctx, 'help');
      const constraints = validateRequiredText(input, MAX_TEXT_LENGTH);
      if (!constraints.ok) return retry(ctx, state, invalidTextMessage(constraints.reason, MAX_TEXT_LENGTH));
      return enter(ctx, 'help', { effects: [patchProfile(ctx, { constraints: constraints.value })] });
    }

    case 'help': {
      if (matches(input, SKIP)) return enter(ctx, 'physical_store');
      const help = validateRequiredText(input, MAX_TEXT_LENGTH);
      if (!help.ok) return retry(ctx, state, invalidTextMessage(help.reason, MAX_TEXT_LENGTH));
      return enter(ctx, 'physical_store', { effects: [patchProfile(ctx, { contentHelp: help.value })] });
    }

    case 'physical_store': {
      const hasStore = parseYesNo(input);
      if (hasStore === null) return retry(ctx, state, YES_NO_INVALID);
      return enter(ctx, 'additional_info', { effects: [patchProfile(ctx, { hasPhysicalStore: hasStore })] });
    }

    case 'additional_info': {
      if (matches(input, CONTINUE) || matches(input, SKIP)) return summarize(ctx, deps);
      const info = validateRequiredText(input, MAX_TEXT_LENGTH);
      if (!info.ok) return retry(ctx, state, invalidTextMessage(info.reason, MAX_TEXT_LENGTH));
      return summarize(ctx, deps, info.value);
    }

    case 'summary_confirm': {
      if (matches(input, CONFIRM_YES) || parseYesNo(input) === true) {
        return confirmSummary(ctx, deps);
      }
      if (matches(input, CONFIRM_NO) || parseYesNo(input) === false) {
        return enter(ctx, 'additional_info', { lead: SUMMARY_REJECTED });
      }
      return enter(ctx, 'summary_confirm', { summary: ctx.profile.situationSummary });
    }
  }
}

function offer(data: ConversationData): Transition {
  const monthly = formatToman(PAYMENT_PLANS.monthly.price);
  return transition('subscription_decision', subscriptionOffer(monthly), {
    data,
    suggestedReplies: [SUBSCRIBE_NOW.label, SUBSCRIBE_LATER.label],
    editsPreviousMessage: true,
  });
}

/**
 * Sample scenario browser and the subscription decision that follows it
 */
export async function handleHandoff(state: HandoffState, ctx: TurnContext, deps: FlowDeps): Promise<StepResult> {
  const { input } = ctx;
  const variants = ctx.data.variants?.length ? ctx.data.variants : [...STARTER_SCENARIOS];
  const page = ctx.data.page ?? 1;

  if (state === 'scenario_browsing') {
    if (matches(input, SCENARIO_PREV)) return scenarioPage(variants, page - 1, true);
    if (matches(input, SCENARIO_NEXT)) return scenarioPage(variants, page + 1, true);
    if (matches(input, SCENARIO_CONTINUE)) return offer({ variants, page });
    return scenarioPage(variants, page, false);
  }

  if (matches(input, SUBSCRIBE_NOW)) return paymentOffer(ctx, deps);
  if (matches(input, SUBSCRIBE_LATER)) return mainMenu(ctx, SUBSCRIPTION_LATER);
  if (matches(input, BACK)) return scenarioPage(variants, page, true);
  return offer({ variants, page });
}
