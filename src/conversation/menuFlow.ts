// src/conversation/menuFlow.ts
import {
  AUDIENCE_TYPES,
  PAGE_STYLES,
  SALES_GOALS,
  optionByLabel,
  type ProfileOption,
} from '../config/profileOptions.js';
import { countRecentContent } from '../db/contentHistoryDb.js';
import { updateProfile } from '../db/profileDb.js';
import { ensureReferralCode, getReferralCount } from '../db/referralDb.js';
import type { ProfilePatch } from '../types/user.js';
import { discountPrompt, paymentOffer } from './billingFlow.js';
import { startContent } from './contentFlow.js';
import { formatDate } from './formatting.js';
import {
  AUDIENCE_QUESTION,
  GOAL_QUESTION,
  HELP_TEXT,
  OPTION_INVALID,
  STATUS_INACTIVE,
  STYLE_QUESTION,
  funnelPrompt,
  inviteCodeText,
  inviteText,
  preferenceSaved,
  statusActive,
  usageStats,
} from './messages.js';
import { isSubscribed, mainMenu, profileEditMenu, requireOnboarding } from './screens.js';
import type { ProfileState } from './states.js';
import { BACK, mainMenuReplies, matches, profileEditActionFor, type MenuAction } from './tokens.js';
import { transition, type FlowDeps, type StepResult, type Transition, type TurnContext } from './types.js';

type SelectState = Exclude<ProfileState, 'profile_edit'>;

interface Selection {
  question: string;
  options: readonly ProfileOption<string>[];
  patch: (value: string) => ProfilePatch | null;
}

const SELECTIONS: Record<SelectState, Selection> = {
  style_select: {
    question: STYLE_QUESTION,
    options: PAGE_STYLES,
    patch: (label) => {
      const option = optionByLabel(PAGE_STYLES, label);
      return option ? { pageStyle: option.value } : null;
    },
  },
  audience_select: {
    question: AUDIENCE_QUESTION,
    options: AUDIENCE_TYPES,
    patch: (label) => {
      const option = optionByLabel(AUDIENCE_TYPES, label);
      return option ? { audienceType: option.value } : null;
    },
  },
  goal_select: {
    question: GOAL_QUESTION,
    options: SALES_GOALS,
    patch: (label) => {
      const option = optionByLabel(SALES_GOALS, label);
      return option ? { salesGoal: option.value } : null;
    },
  },
};

function selectionPrompt(state: SelectState, lead?: string): Transition {
  const { question, options } = SELECTIONS[state];
  return transition(state, lead ? `${lead}\n\n${question}` : question, {
    suggestedReplies: [...options.map((option) => option.label), BACK],
  });
}

function stats(ctx: TurnContext, deps: FlowDeps): Transition {
  const { subscription } = ctx;
  const statusLine =
    subscription && isSubscribed(ctx)
      ? statusActive(formatDate(subscription.expiresAt, deps.timeZone))
      : STATUS_INACTIVE;

  const text = usageStats({
    generatedLast30Days: countRecentContent(ctx.user.userId, 30, ctx.now),
    statusLine,
    referralCount: getReferralCount(ctx.user.userId),
  });
  return transition('main_menu', text, { suggestedReplies: mainMenuReplies(isSubscribed(ctx)) });
}

function invite(ctx: TurnContext, deps: FlowDeps): StepResult {
  const { userId } = ctx.user;
  return {
    commit: () => {
      const code = ensureReferralCode(userId);
      const count = getReferralCount(userId);
      const text = deps.botUsername
        ? inviteText(`https://t.me/${deps.botUsername}?start=${code}`, count)
        : inviteCodeText(code, count);
      return transition('main_menu', text, { suggestedReplies: mainMenuReplies(isSubscribed(ctx)) });
    },
  };
}

/**
 * Main menu buttons, accepted from any state outside the onboarding funnel
 */
export function handleMenuAction(action: MenuAction, ctx: TurnContext, deps: FlowDeps): StepResult {
  switch (action) {
    case 'generate':
      return startContent(ctx, deps);
    case 'editProfile':
      requireOnboarding(ctx);
      return profileEditMenu();
    case 'stats':
      return stats(ctx, deps);
    case 'renew':
      return paymentOffer(ctx, deps);
    case 'discount':
      return discountPrompt();
    case 'help':
      return transition(ctx.state, HELP_TEXT, { data: ctx.data, suggestedReplies: mainMenuReplies(isSubscribed(ctx)) });
    case 'invite':
      return invite(ctx, deps);
  }
}

/**
 * Profile editor: preference selections and the business-questions rerun
 */
export async function handleProfile(state: ProfileState, ctx: TurnContext): Promise<StepResult> {
  const { input } = ctx;
  requireOnboarding(ctx);

  if (state === 'profile_edit') {
    if (matches(input, BACK)) return mainMenu(ctx);
    switch (profileEditActionFor(input)) {
      case 'style':
        return selectionPrompt('style_select');
      case 'audience':
        return selectionPrompt('audience_select');
      case 'goal':
        return selectionPrompt('goal_select');
      case 'business': {
        const prompt = funnelPrompt('gallery_name');
        return transition('gallery_name', prompt.text, { data: { rerun: true }, suggestedReplies: prompt.suggestedReplies });
      }
      case null:
        return profileEditMenu();
    }
  }

  if (matches(input, BACK)) return profileEditMenu();

  const patch = SELECTIONS[state].patch(input);
  if (!patch) return selectionPrompt(state, OPTION_INVALID);

  const { userId } = ctx.user;
  return profileEditMenu(preferenceSaved(input.trim()), [
    () => {
      updateProfile(userId, patch, ctx.now);
    },
  ]);
}
