// src/conversation/types.ts
import { z } from 'zod';
import type { ContentGenerator } from '../services/contentGenerator.js';
import type { Subscription } from '../types/subscription.js';
import type { Profile, User } from '../types/user.js';
import type { ConversationStateName } from './states.js';

/**
 * Event delivered by the chat transport
 */
export interface InboundEvent {
  externalUserId: string;
  text?: string;
  callbackToken?: string;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
}

/**
 * Transport-neutral reply: text plus the tokens the user can send next
 */
export interface OutboundResponse {
  text: string;
  suggestedReplies?: string[];
  editsPreviousMessage?: boolean;
  transcript?: string;
}

export type HandleResult =
  | { status: 'replied'; response: OutboundResponse }
  | { status: 'failed'; response: OutboundResponse }
  | { status: 'superseded' };

export interface ConversationHandler {
  handle(event: InboundEvent): Promise<HandleResult>;
}

/**
 * Per-user data bag stored beside the state name
 */
export const conversationDataSchema = z.object({
  variants: z.array(z.string()).optional(),
  page: z.number().int().positive().optional(),
  planId: z.enum(['monthly', 'seasonal']).optional(),
  amount: z.number().int().nonnegative().optional(),
  rerun: z.boolean().optional(),
});

export type ConversationData = z.infer<typeof conversationDataSchema>;

/**
 * Everything a handler may read for one event
 */
export interface TurnContext {
  user: User;
  profile: Profile;
  subscription: Subscription | null;
  state: ConversationStateName;
  data: ConversationData;
  input: string;
  isNewUser: boolean;
  now: Date;
  signal: AbortSignal;
}

export interface FlowDeps {
  generator: ContentGenerator;
  timeZone: string;
  botUsername?: string;
}

/**
 * Result of a handler: next state, reply, and the synchronous writes to commit
 * with the state save.
 */
export interface Transition {
  state: ConversationStateName;
  data: ConversationData;
  reply: OutboundResponse;
  effects: Array<() => void>;
}

/**
 * Transition whose outcome depends on a write that must run inside the commit
 * (discount redemption, subscription extension).
 */
export interface DeferredTransition {
  commit: () => Transition;
}

export type StepResult = Transition | DeferredTransition;

export function isDeferred(step: StepResult): step is DeferredTransition {
  return 'commit' in step;
}

export interface TransitionOptions {
  data?: ConversationData;
  suggestedReplies?: string[];
  editsPreviousMessage?: boolean;
  effects?: Array<() => void>;
}

/**
 * Shorthand for building a Transition
 */
export function transition(
  state: ConversationStateName,
  text: string,
  options: TransitionOptions = {}
): Transition {
  const reply: OutboundResponse = { text };
  if (options.suggestedReplies) reply.suggestedReplies = options.suggestedReplies;
  if (options.editsPreviousMessage) reply.editsPreviousMessage = true;

  return {
    state,
    data: options.data ?? {},
    reply,
    effects: options.effects ?? [],
  };
}
