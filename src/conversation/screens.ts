// src/conversation/screens.ts
//
// Screens several flows return to.

import { isActive } from '../db/subscriptionDb.js';
import { NotFoundError } from '../lib/errors.js';
import { CONTENT_KIND_QUESTION, MAIN_MENU, PROFILE_EDIT_QUESTION } from './messages.js';
import { CONTENT_KIND_REPLIES, PROFILE_EDIT_REPLIES, mainMenuReplies } from './tokens.js';
import { transition, type Transition, type TurnContext } from './types.js';

export function isSubscribed(ctx: TurnContext): boolean {
  return isActive(ctx.subscription, ctx.now);
}

/**
 * Main menu; `lead` is shown above the menu prompt
 */
export function mainMenu(ctx: TurnContext, lead?: string, effects: Array<() => void> = []): Transition {
  return transition('main_menu', lead ? `${lead}\n\n${MAIN_MENU}` : MAIN_MENU, {
    suggestedReplies: mainMenuReplies(isSubscribed(ctx)),
    effects,
  });
}

export function contentKindMenu(lead?: string): Transition {
  return transition('select_content_kind', lead ?? CONTENT_KIND_QUESTION, {
    suggestedReplies: CONTENT_KIND_REPLIES,
  });
}

export function profileEditMenu(lead?: string, effects: Array<() => void> = []): Transition {
  return transition('profile_edit', lead ? `${lead}\n\n${PROFILE_EDIT_QUESTION}` : PROFILE_EDIT_QUESTION, {
    suggestedReplies: PROFILE_EDIT_REPLIES,
    effects,
  });
}

/**
 * Content features need a finished onboarding
 *
 * @throws NotFoundError when onboarding is incomplete
 */
export function requireOnboarding(ctx: TurnContext): void {
  if (!ctx.user.onboardingCompleted) {
    throw new NotFoundError(`User ${ctx.user.userId} has not completed onboarding`);
  }
}
