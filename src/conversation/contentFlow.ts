// src/conversation/contentFlow.ts
import { paymentOffer } from './billingFlow.js';
import { formatVariants } from './formatting.js';
import {
  CONTENT_INPUT_PROMPTS,
  CONTENT_READY,
  SUBSCRIPTION_REQUIRED,
  invalidTextMessage,
} from './messages.js';
import { contentKindMenu, isSubscribed, mainMenu, requireOnboarding } from './screens.js';
import type { ContentState } from './states.js';
import { BACK, CONTENT_KIND_REPLIES, SKIP, contentKindFor, matches, type RequestableKind } from './tokens.js';
import { MAX_TEXT_LENGTH, validateRequiredText } from './validators.js';
import { transition, type FlowDeps, type StepResult, type Transition, type TurnContext } from './types.js';

const INPUT_STATES: Record<RequestableKind, ContentState> = {
  caption: 'caption_input',
  reels: 'reels_input',
  visual: 'visual_input',
  calendar: 'calendar_request',
};

const KIND_FOR_STATE: Record<Exclude<ContentState, 'select_content_kind'>, RequestableKind> = {
  caption_input: 'caption',
  reels_input: 'reels',
  visual_input: 'visual',
  calendar_request: 'calendar',
};

function inputPrompt(kind: RequestableKind, lead?: string): Transition {
  const prompt = CONTENT_INPUT_PROMPTS[kind];
  return transition(INPUT_STATES[kind], lead ? `${lead}\n\n${prompt}` : prompt, {
    suggestedReplies: kind === 'calendar' ? [SKIP, BACK] : [BACK],
  });
}

/**
 * Entry into content generation from the main menu. Unsubscribed users get
 * the payment offer instead.
 */
export function startContent(ctx: TurnContext, deps: FlowDeps): Transition {
  requireOnboarding(ctx);
  if (!isSubscribed(ctx)) return paymentOffer(ctx, deps, SUBSCRIPTION_REQUIRED);
  return contentKindMenu();
}

async function runGeneration(
  kind: RequestableKind,
  userInput: string,
  ctx: TurnContext,
  deps: FlowDeps
): Promise<StepResult> {
  requireOnboarding(ctx);
  if (!isSubscribed(ctx)) return paymentOffer(ctx, deps, SUBSCRIPTION_REQUIRED);

  const result = await deps.generator.generate(kind, userInput, ctx.profile, {
    userId: ctx.user.userId,
    signal: ctx.signal,
    now: ctx.now,
  });

  if (result.status !== 'ok') {
    return inputPrompt(kind, result.variants[0]);
  }

  return transition('select_content_kind', `${formatVariants(kind, result.variants)}\n\n${CONTENT_READY}`, {
    suggestedReplies: CONTENT_KIND_REPLIES,
  });
}

/**
 * Content kind selection and the per-kind input states
 */
export async function handleContent(state: ContentState, ctx: TurnContext, deps: FlowDeps): Promise<StepResult> {
  const { input } = ctx;

  if (state === 'select_content_kind') {
    if (matches(input, BACK)) return mainMenu(ctx);
    const kind = contentKindFor(input);
    if (!kind) return contentKindMenu();
    requireOnboarding(ctx);
    if (!isSubscribed(ctx)) return paymentOffer(ctx, deps, SUBSCRIPTION_REQUIRED);
    return inputPrompt(kind);
  }

  const kind = KIND_FOR_STATE[state];
  if (matches(input, BACK)) return contentKindMenu();

  if (kind === 'calendar' && matches(input, SKIP)) {
    return runGeneration(kind, '', ctx, deps);
  }

  const text = validateRequiredText(input, MAX_TEXT_LENGTH);
  if (!text.ok) {
    return inputPrompt(kind, invalidTextMessage(text.reason, MAX_TEXT_LENGTH));
  }
  return runGeneration(kind, text.value, ctx, deps);
}
