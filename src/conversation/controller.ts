// src/conversation/controller.ts
import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import db from '../db/db.js';
import { getOrCreateUser, setOnboardingStep } from '../db/userDb.js';
import { ensureProfile } from '../db/profileDb.js';
import { expireIfLapsed, getSubscription } from '../db/subscriptionDb.js';
import { loadConversation, saveConversation } from '../db/conversationStateDb.js';
import { InFlightRegistry } from '../lib/inFlight.js';
import { NotFoundError, PersistenceError, isAbortError } from '../lib/errors.js';
import { logger as rootLogger } from '../lib/logger.js';
import type { ContentGenerator } from '../services/contentGenerator.js';
import { handleBilling } from './billingFlow.js';
import { handleContent } from './contentFlow.js';
import { handleMenuAction, handleProfile } from './menuFlow.js';
import {
  BACK_TO_MENU,
  CANCELLED,
  GENERIC_FAILURE,
  HELP_TEXT,
  ONBOARDING_REQUIRED,
  REFERRAL_WELCOME,
  UNKNOWN_INPUT,
  WELCOME,
  welcomeBack,
} from './messages.js';
import { handleHandoff, handleOnboarding } from './onboardingFlow.js';
import { isSubscribed, mainMenu } from './screens.js';
import {
  isBillingState,
  isContentState,
  isFunnelState,
  isHandoffState,
  isProfileState,
  stateForStep,
  type ConversationStateName,
} from './states.js';
import { BACK, READY, mainMenuReplies, matches, menuActionFor } from './tokens.js';
import {
  isDeferred,
  transition,
  type ConversationHandler,
  type FlowDeps,
  type HandleResult,
  type InboundEvent,
  type StepResult,
  type Transition,
  type TurnContext,
} from './types.js';

export interface ControllerOptions {
  generator: ContentGenerator;
  trialDays: number;
  timeZone: string;
  botUsername?: string;
  inFlight?: InFlightRegistry;
  logger?: Logger;
  clock?: () => Date;
}

type CommandName = 'start' | 'help' | 'cancel';

interface Command {
  name: CommandName;
  arg: string | null;
}

const COMMAND_PATTERN = /^\/(start|help|cancel)(?:@\w+)?(?:\s+(\S+))?\s*$/;

/**
 * Recognise a global command; anything else is ordinary input
 */
export function parseCommand(input: string): Command | null {
  const match = COMMAND_PATTERN.exec(input);
  if (!match) return null;
  const name = match[1];
  if (name !== 'start' && name !== 'help' && name !== 'cancel') return null;
  return { name, arg: match[2] ?? null };
}

/**
 * Conversation controller.
 *
 * One inbound event is one unit of work: load the user's context, route the
 * input to the handler for the stored state, then commit the handler's writes
 * and the next state in a single transaction. An event superseded by a newer
 * one from the same user commits nothing.
 */
export class ConversationController implements ConversationHandler {
  private readonly deps: FlowDeps;
  private readonly trialDays: number;
  private readonly inFlight: InFlightRegistry;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(options: ControllerOptions) {
    this.deps = {
      generator: options.generator,
      timeZone: options.timeZone,
      botUsername: options.botUsername,
    };
    this.trialDays = options.trialDays;
    this.inFlight = options.inFlight ?? new InFlightRegistry();
    this.log = (options.logger ?? rootLogger).child({ module: 'conversation' });
    this.clock = options.clock ?? (() => new Date());
  }

  async handle(event: InboundEvent): Promise<HandleResult> {
    const userId = event.externalUserId;
    const ticket = this.inFlight.begin(userId);
    const log = this.log.child({ userId });

    try {
      const ctx = this.load(event, ticket.signal);
      const command = parseCommand(ctx.input);
      const step = command ? this.command(command, ctx) : await this.route(ctx);

      if (ticket.signal.aborted) {
        log.info({ state: ctx.state }, 'Event superseded, discarding result');
        return { status: 'superseded' };
      }

      const next = this.commit(userId, step, ctx.now);
      log.debug({ from: ctx.state, to: next.state }, 'Transition committed');
      return { status: 'replied', response: next.reply };
    } catch (err) {
      if (err instanceof NotFoundError) {
        log.info({ err }, 'Feature requested before onboarding');
        return { status: 'replied', response: { text: ONBOARDING_REQUIRED } };
      }
      if (ticket.signal.aborted || isAbortError(err)) {
        return { status: 'superseded' };
      }

      const failure =
        err instanceof Database.SqliteError
          ? new PersistenceError('Conversation storage failed', { cause: err })
          : err;
      log.error({ err: failure }, 'Failed to handle event');
      return { status: 'failed', response: { text: GENERIC_FAILURE } };
    } finally {
      ticket.release();
    }
  }

  /**
   * Build the turn context, creating the user on first contact
   */
  private load(event: InboundEvent, signal: AbortSignal): TurnContext {
    const now = this.clock();
    const userId = event.externalUserId;
    const input = (event.callbackToken ?? event.text ?? '').trim();
    const command = parseCommand(input);

    const { user, created } = getOrCreateUser(
      {
        userId,
        username: event.username ?? null,
        firstName: event.firstName ?? null,
        lastName: event.lastName ?? null,
        referredByCode: command?.name === 'start' ? command.arg : null,
      },
      { trialDays: this.trialDays, now }
    );

    expireIfLapsed(userId, now);
    const stored = loadConversation(userId);
    const fallback: ConversationStateName = user.onboardingCompleted
      ? 'main_menu'
      : stateForStep(user.onboardingStep);

    return {
      user,
      profile: ensureProfile(userId, now),
      subscription: getSubscription(userId),
      state: stored?.state ?? fallback,
      data: stored?.data ?? {},
      input,
      isNewUser: created,
      now,
      signal,
    };
  }

  private command(command: Command, ctx: TurnContext): Transition {
    switch (command.name) {
      case 'start': {
        if (ctx.user.onboardingCompleted) {
          const name = ctx.user.displayName ?? ctx.user.firstName ?? '';
          return transition('main_menu', welcomeBack(name, isSubscribed(ctx)), {
            suggestedReplies: mainMenuReplies(isSubscribed(ctx)),
          });
        }
        const { userId } = ctx.user;
        const referred = ctx.isNewUser && ctx.user.referredBy !== null;
        return transition('ready', referred ? `${REFERRAL_WELCOME}\n\n${WELCOME}` : WELCOME, {
          suggestedReplies: [READY],
          effects: [() => setOnboardingStep(userId, 'start', ctx.now)],
        });
      }
      case 'help':
        return transition(ctx.state, HELP_TEXT, {
          data: ctx.data,
          suggestedReplies: ctx.user.onboardingCompleted ? mainMenuReplies(isSubscribed(ctx)) : undefined,
        });
      case 'cancel':
        return mainMenu(ctx, CANCELLED);
    }
  }

  private async route(ctx: TurnContext): Promise<StepResult> {
    const { state, input } = ctx;

    if (isFunnelState(state)) return handleOnboarding(state, ctx, this.deps);

    const action = menuActionFor(input);
    if (action) return handleMenuAction(action, ctx, this.deps);

    if (isHandoffState(state)) return handleHandoff(state, ctx, this.deps);
    if (isContentState(state)) return handleContent(state, ctx, this.deps);
    if (isBillingState(state)) return handleBilling(state, ctx, this.deps);
    if (isProfileState(state)) return handleProfile(state, ctx);

    if (matches(input, BACK)) return mainMenu(ctx, BACK_TO_MENU);
    return transition('main_menu', UNKNOWN_INPUT, {
      suggestedReplies: mainMenuReplies(isSubscribed(ctx)),
    });
  }

  /**
   * Run deferred writes and effects, then save the next state, atomically
   */
  private commit(userId: string, step: StepResult, now: Date): Transition {
    const run = db.transaction((): Transition => {
      const next = isDeferred(step) ? step.commit() : step;
      for (const effect of next.effects) {
        effect();
      }
      saveConversation(userId, next.state, next.data, now);
      return next;
    });
    return run();
  }
}
