// src/conversation/states.ts
import type { OnboardingStep } from '../types/user.js';

/**
 * Onboarding funnel, in order
 */
export const FUNNEL_STATES = [
  'ready',
  'name',
  'phone',
  'email',
  'gallery_name',
  'instagram',
  'telegram_channel',
  'customers',
  'constraints',
  'help',
  'physical_store',
  'additional_info',
  'summary_confirm',
] as const;

export type FunnelState = (typeof FUNNEL_STATES)[number];

export const CONTENT_STATES = [
  'select_content_kind',
  'caption_input',
  'reels_input',
  'visual_input',
  'calendar_request',
] as const;

export type ContentState = (typeof CONTENT_STATES)[number];

export const BILLING_STATES = ['payment_selection', 'payment_reference', 'discount_code'] as const;

export type BillingState = (typeof BILLING_STATES)[number];

export const PROFILE_STATES = ['profile_edit', 'style_select', 'audience_select', 'goal_select'] as const;

export type ProfileState = (typeof PROFILE_STATES)[number];

export const HANDOFF_STATES = ['scenario_browsing', 'subscription_decision'] as const;

export type HandoffState = (typeof HANDOFF_STATES)[number];

export type ConversationStateName =
  | FunnelState
  | HandoffState
  | ContentState
  | BillingState
  | ProfileState
  | 'main_menu';

export const ALL_STATES: readonly ConversationStateName[] = [
  ...FUNNEL_STATES,
  ...HANDOFF_STATES,
  ...CONTENT_STATES,
  ...BILLING_STATES,
  ...PROFILE_STATES,
  'main_menu',
];

function includes<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((item) => item === value);
}

export function isStateName(value: string): value is ConversationStateName {
  return includes(ALL_STATES, value);
}

export function isFunnelState(state: ConversationStateName): state is FunnelState {
  return includes(FUNNEL_STATES, state);
}

export function isHandoffState(state: ConversationStateName): state is HandoffState {
  return includes(HANDOFF_STATES, state);
}

export function isContentState(state: ConversationStateName): state is ContentState {
  return includes(CONTENT_STATES, state);
}

export function isBillingState(state: ConversationStateName): state is BillingState {
  return includes(BILLING_STATES, state);
}

export function isProfileState(state: ConversationStateName): state is ProfileState {
  return includes(PROFILE_STATES, state);
}

/**
 * Static predecessor for back-navigation. `ready` is its own predecessor,
 * so repeated back presses stop there.
 */
export const PREDECESSOR: Record<ConversationStateName, ConversationStateName> = {
  ready: 'ready',
  name: 'ready',
  phone: 'name',
  email: 'phone',
  gallery_name: 'email',
  instagram: 'gallery_name',
  telegram_channel: 'instagram',
  customers: 'telegram_channel',
  constraints: 'customers',
  help: 'constraints',
  physical_store: 'help',
  additional_info: 'physical_store',
  summary_confirm: 'additional_info',
  scenario_browsing: 'scenario_browsing',
  subscription_decision: 'scenario_browsing',
  main_menu: 'main_menu',
  select_content_kind: 'main_menu',
  caption_input: 'select_content_kind',
  reels_input: 'select_content_kind',
  visual_input: 'select_content_kind',
  calendar_request: 'select_content_kind',
  payment_selection: 'main_menu',
  payment_reference: 'payment_selection',
  discount_code: 'main_menu',
  profile_edit: 'main_menu',
  style_select: 'profile_edit',
  audience_select: 'profile_edit',
  goal_select: 'profile_edit',
};

/**
 * Onboarding step recorded on the user for each funnel state
 */
export const FUNNEL_STEP: Record<FunnelState, OnboardingStep> = {
  ready: 'start',
  name: 'name',
  phone: 'phone',
  email: 'email',
  gallery_name: 'gallery_name',
  instagram: 'instagram',
  telegram_channel: 'telegram',
  customers: 'customers',
  constraints: 'constraints',
  help: 'help',
  physical_store: 'physical_store',
  additional_info: 'additional_info',
  summary_confirm: 'summary_confirm',
};

/**
 * Funnel state to resume from for a stored onboarding step
 */
export function stateForStep(step: OnboardingStep): FunnelState {
  const match = FUNNEL_STATES.find((state) => FUNNEL_STEP[state] === step);
  return match ?? 'ready';
}
