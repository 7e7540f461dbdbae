// src/conversation/tokens.ts

/**
 * Button with a visible label and a transport callback id.
 * Either one selects it.
 */
export interface ActionToken {
  label: string;
  callback: string;
}

export const BACK = '🔙 بازگشت';
export const SKIP = 'رد کردن';
export const READY = 'آماده‌ام';
export const CONTINUE = 'ادامه بدیم';
export const YES = 'آره';
export const NO = 'نه';

export const YES_WORDS: readonly string[] = ['آره', 'بله', 'دارم'];
export const NO_WORDS: readonly string[] = ['نه', 'خیر', 'ندارم'];

export const CONFIRM_YES: ActionToken = { label: '✅ تایید', callback: 'confirm_yes' };
export const CONFIRM_NO: ActionToken = { label: '❌ انصراف', callback: 'confirm_no' };

export const SCENARIO_PREV: ActionToken = { label: '⬅️ قبلی', callback: 'scenario_prev' };
export const SCENARIO_NEXT: ActionToken = { label: 'بعدی ➡️', callback: 'scenario_next' };
export const SCENARIO_CONTINUE: ActionToken = { label: 'ادامه فرآیند', callback: 'scenario_continue' };

export const SUBSCRIBE_NOW: ActionToken = { label: 'چرا که نه 🤗', callback: 'now' };
export const SUBSCRIBE_LATER: ActionToken = { label: 'بعدا 😮‍💨', callback: 'later' };

export const PAY_MONTHLY: ActionToken = { label: '💳 پرداخت ماهانه', callback: 'payment_monthly' };
export const PAY_SEASONAL: ActionToken = { label: '💰 پرداخت فصلی', callback: 'payment_seasonal' };

export const MENU = {
  generate: '🧠 تولید محتوا',
  editProfile: '🎛️ ویرایش پروفایل',
  stats: '📊 آمار استفاده',
  renew: '🔁 تمدید اشتراک',
  discount: '🎁 کد تخفیف',
  help: '❓ راهنما',
  invite: '👥 دعوت از دوستان',
} as const;

export type MenuAction = keyof typeof MENU;

export const CONTENT_KIND_TOKENS = {
  caption: '✍️ کپشن نویسی',
  reels: '🎬 سناریو ریلز',
  visual: '📷 ایده بصری',
  calendar: '📅 تقویم محتوایی',
} as const;

export type RequestableKind = keyof typeof CONTENT_KIND_TOKENS;

export const PROFILE_EDIT = {
  style: '🎨 تغییر سبک',
  audience: '👥 تغییر مخاطب',
  goal: '🎯 تغییر هدف',
  business: '🏪 اطلاعات کسب‌وکار',
} as const;

export type ProfileEditAction = keyof typeof PROFILE_EDIT;

/**
 * Whether the input selects the token
 */
export function matches(input: string, token: ActionToken | string): boolean {
  if (typeof token === 'string') return input === token;
  return input === token.label || input === token.callback;
}

function findKey<K extends string>(table: Record<K, string>, keys: readonly K[], input: string): K | null {
  return keys.find((key) => table[key] === input) ?? null;
}

const MENU_ACTIONS: readonly MenuAction[] = ['generate', 'editProfile', 'stats', 'renew', 'discount', 'help', 'invite'];
const REQUESTABLE_KINDS: readonly RequestableKind[] = ['caption', 'reels', 'visual', 'calendar'];
const PROFILE_EDIT_ACTIONS: readonly ProfileEditAction[] = ['style', 'audience', 'goal', 'business'];

export function menuActionFor(input: string): MenuAction | null {
  return findKey(MENU, MENU_ACTIONS, input);
}

export function contentKindFor(input: string): RequestableKind | null {
  return findKey(CONTENT_KIND_TOKENS, REQUESTABLE_KINDS, input);
}

export function profileEditActionFor(input: string): ProfileEditAction | null {
  return findKey(PROFILE_EDIT, PROFILE_EDIT_ACTIONS, input);
}

export const CONTENT_KIND_REPLIES: string[] = [
  ...REQUESTABLE_KINDS.map((kind) => CONTENT_KIND_TOKENS[kind]),
  BACK,
];

export const PROFILE_EDIT_REPLIES: string[] = [
  ...PROFILE_EDIT_ACTIONS.map((action) => PROFILE_EDIT[action]),
  BACK,
];

/**
 * Main menu buttons; renewal replaces stats when the subscription is inactive
 */
export function mainMenuReplies(subscribed: boolean): string[] {
  return [
    MENU.generate,
    MENU.editProfile,
    subscribed ? MENU.stats : MENU.renew,
    MENU.discount,
    MENU.help,
    MENU.invite,
  ];
}
