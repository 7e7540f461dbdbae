// src/conversation/messages.ts
//
// User-facing copy. Everything the assistant says lives here.

import type { InvalidReason } from './validators.js';
import type { FunnelState } from './states.js';
import {
  BACK,
  CONFIRM_NO,
  CONFIRM_YES,
  CONTINUE,
  NO,
  READY,
  SKIP,
  YES,
} from './tokens.js';

export interface Prompt {
  text: string;
  suggestedReplies: string[];
}

export const WELCOME = `سلام! من دستیار محتوای طلافروش هستم 💎

من سناریوهای ریلز اینستاگرامت رو کلمه به کلمه و تصویر به تصویر بهت میگم.

سناریوهایی که براساس شرایط تو و اصول محتوانویسی و با آنالیز محتوای وایرال نوشته شده.

برای شروع کار لازمه من یه سری اطلاعات از تو و گالری طلات داشته باشم تا در ادامه بتونم تقویم محتوایی و سناریو ریلزهات رو بهت بدم.

اگه آماده‌ای بزن روی "آماده‌ام":`;

export const REFERRAL_WELCOME = '🎁 با کد معرف وارد شدی! ممنون که به خانواده ما پیوستی.';

export const HELP_TEXT = `🤖 راهنمای ربات تولید محتوا

🧠 تولید محتوا:
• کپشن نویسی: کپشن جذاب برای پست‌ها
• سناریو ریلز: ایده برای ویدیوهای کوتاه
• ایده بصری: پیشنهاد برای عکاسی محصولات
• تقویم محتوایی: برنامه انتشار هفته‌های پیش رو

🎛️ ویرایش پروفایل:
• تغییر سبک، مخاطب و هدف
• اطلاعات کسب‌وکار

🔁 تمدید اشتراک:
• پرداخت ماهانه یا فصلی
• مشاهده وضعیت اشتراک

🎁 کد تخفیف و 👥 دعوت از دوستان

دستورها: /start شروع، /help راهنما، /cancel لغو عملیات`;

export const GENERIC_FAILURE = 'خطایی رخ داده است. لطفاً دوباره تلاش کنید.';
export const ONBOARDING_REQUIRED = 'لطفاً ابتدا پروفایل خود را تکمیل کنید. برای شروع /start را بزنید.';
export const UNKNOWN_INPUT = 'متوجه نشدم چی گفتید. 🤔\nاز منو یکی از گزینه‌ها رو انتخاب کنید یا /help بزنید.';
export const BACK_TO_MENU = 'بازگشت به منوی اصلی';
export const CANCELLED = 'عملیات لغو شد.';

export const PHONE_INVALID = 'شماره تلفن معتبر نیست. لطفاً شماره موبایل معتبر وارد کنید یا رد کنید:';
export const EMAIL_INVALID = 'ایمیل معتبر نیست. لطفاً ایمیل معتبر وارد کنید یا رد کنید:';
export const YES_NO_INVALID = 'لطفاً «آره» یا «نه» رو انتخاب کن:';
export const BUSINESS_LEAD = 'خب حالا بریم سراغ چندتا سوال در مورد کسب‌وکارت، تا بتونم سناریو منحصربه‌فرد تو رو بهت بدم.';
export const SUMMARY_QUESTION = 'آیا این خلاصه درست است؟';
export const SUMMARY_REJECTED = 'باشه، هرجایی نیاز بود اصلاح کن و دوباره ادامه بده.';
export const PROFILE_UPDATED = '✅ اطلاعات کسب‌وکار به‌روز شد.';

export const ONBOARDING_THEME = 'معرفی گالری طلا و جواهرات';

/**
 * Shown when the proof-of-value generation fails
 */
export const STARTER_SCENARIOS: readonly string[] = [
  'سناریو 1: معرفی گالری با نمایش محصولات',
  'سناریو 2: آموزش انتخاب طلا',
  'سناریو 3: نمایش کارهای سفارشی',
];

export const SUBSCRIPTION_LATER = 'باشه، هر وقت خواستی می‌تونی از منوی اصلی اشتراک تهیه کنی.';

export const CONTENT_KIND_QUESTION = 'چه نوع محتوایی می‌خواید تولید کنید؟';
export const CONTENT_READY = 'محتوا آماده شد! ✅\nمی‌خواید محتوای دیگری تولید کنید؟';
export const SUBSCRIPTION_REQUIRED = 'برای استفاده از تولید محتوا، ابتدا باید اشتراک داشته باشید.';

export const CONTENT_INPUT_PROMPTS = {
  caption: 'محصول یا موضوعی که می‌خواید کپشن براش بنویسم رو توضیح بدید:\n\nمثال: انگشتر طلا با نگین الماس برای عروس‌خانم‌ها',
  reels: 'موضوع یا مناسبتی که می‌خواید سناریو ریلز براش داشته باشید رو بگید:\n\nمثال: فروش ویژه شب یلدا، معرفی مجموعه جدید، ولنتاین',
  visual: 'نوع محصولی که می‌خواید ایده عکاسی براش داشته باشید رو بگید:\n\nمثال: دستبند طلا، گردنبند مروارید، حلقه نامزدی\nاگر وسایل خاصی در دسترس دارید هم بگید.',
  calendar: 'تمرکز یا مناسبت خاصی برای تقویم محتوایی داری؟ بنویس، یا «رد کردن» رو بزن تا یه تقویم عمومی بدم:',
} as const;

export const DISCOUNT_PROMPT = 'کد تخفیف را ارسال کنید:';
export const DISCOUNT_INVALID = 'کد تخفیف معتبر نیست یا منقضی شده است.';
export const PAYMENT_REFERENCE_INVALID = 'کد پیگیری معتبر نیست. لطفاً کد پیگیری پرداخت را بدون فاصله ارسال کنید:';
export const PAYMENT_DUPLICATE = 'این کد پیگیری قبلاً ثبت شده است.';
export const PAYMENT_NOT_FOUND = 'اشتراکی برای شما پیدا نشد. لطفاً با پشتیبانی تماس بگیرید.';

export const PROFILE_EDIT_QUESTION = 'کدوم بخش پروفایل رو می‌خوای تغییر بدی؟';

/**
 * Prompt for each funnel state, shown on entry and on back-navigation
 */
export function funnelPrompt(state: FunnelState, summary?: string | null): Prompt {
  switch (state) {
    case 'ready':
      return { text: WELCOME, suggestedReplies: [READY] };
    case 'name':
      return { text: 'چی صدات کنم؟', suggestedReplies: [BACK] };
    case 'phone':
      return {
        text: 'اگه مورد مهمی پیش اومد و میخواستم بهت پیام بدم، شمارت چنده؟',
        suggestedReplies: [SKIP, BACK],
      };
    case 'email':
      return {
        text: 'این مورد اختیاریه، اگه دوست داری مقاله‌های به‌روز برای تقویت طلافروشیت دریافت کنی، ایمیلت رو وارد کن:',
        suggestedReplies: [SKIP, BACK],
      };
    case 'gallery_name':
      return { text: 'اسم گالریت چیه؟', suggestedReplies: [BACK] };
    case 'instagram':
      return { text: 'آیدی پیج اینستاگرامت رو بده یه تحلیل بکنم:', suggestedReplies: [BACK] };
    case 'telegram_channel':
      return { text: 'اگر کانال تلگرام هم داری بفرست یه چک بکنم:', suggestedReplies: [SKIP, BACK] };
    case 'customers':
      return {
        text: 'بیشتر مشتریات کیا هستن؟\n\nمثلاً: خانم‌های جوان، آقایان میانسال، عروس‌خانم‌ها و...',
        suggestedReplies: [BACK],
      };
    case 'constraints':
      return {
        text: 'چه باید و نبایدهایی رو باید برای سناریو تو رعایت کنم؟\n\nمثل محدودیت‌های شخصی یا منابع خاص یا لحن منحصربه‌فرد',
        suggestedReplies: [SKIP, BACK],
      };
    case 'help':
      return {
        text: 'کسیو داری که توی تولید محتوا کمکت کنه؟\n\nمثال توی ضبط یا تدوین یا آپلود',
        suggestedReplies: [SKIP, BACK],
      };
    case 'physical_store':
      return { text: 'گالری حضوری هم داری یا نه هنوز؟', suggestedReplies: [YES, NO, BACK] };
    case 'additional_info':
      return {
        text: 'حله، من هر سوالی داشتم پرسیدم، اگه فکر میکنی چیز خاصی هست که من باید بدونم ولی نپرسیدم بگو، وگرنه ادامه بدیم:',
        suggestedReplies: [CONTINUE, BACK],
      };
    case 'summary_confirm':
      return {
        text: summary ? `${summary}\n\n${SUMMARY_QUESTION}` : SUMMARY_QUESTION,
        suggestedReplies: [CONFIRM_YES.label, CONFIRM_NO.label, BACK],
      };
  }
}

/**
 * Re-prompt after invalid free text
 */
export function invalidTextMessage(reason: InvalidReason, max: number): string {
  if (reason === 'too_long') {
    return `متن خیلی طولانیه (حداکثر ${max} کاراکتر). لطفاً کوتاه‌ترش کن:`;
  }
  return 'این مورد لازمه، لطفاً جواب بده:';
}

export function welcomeBack(name: string, subscribed: boolean): string {
  const status = subscribed
    ? '🎯 اشتراک‌ت فعاله و می‌تونی از تمام امکانات استفاده کنی!'
    : '⚠️ دوره آزمایشی‌ت تموم شده. برای ادامه، اشتراک تهیه کن.';
  return `سلام ${name}! 👋\n\nخوش برگشتی! آماده‌ام تا محتوای فوق‌العاده برای گالری‌ت تولید کنم.\n\n${status}`;
}

export function greeting(name: string): string {
  return `خیلی خوشحالم ${name} جان! 😊`;
}

export function galleryAck(name: string): string {
  return `گالری ${name} 👌`;
}

/**
 * Offer shown after the sample scenarios; `monthlyPrice` is already formatted
 */
export function subscriptionOffer(monthlyPrice: string): string {
  return [
    'خب، حالا که نحوه کارم رو دیدی... 🤓',
    'اگر حس کردی اینجور آدمی می‌تونه به گالریت کمک کنه، می‌تونیم با هم همکار بشیم!',
    '',
    `هر ماه فقط ${monthlyPrice} و من:`,
    '✅ تقویم محتوایی آماده می‌دم',
    '✅ ریلزهای حرفه‌ای طراحی می‌کنم',
    '✅ کلی ایده نو برای فروش بیشتر می‌ریزم تو جیبت!',
    '',
    'پس... میخوای استخدامم کنی؟ 😎',
  ].join('\n');
}

export function activeUntil(date: string): string {
  return `اشتراک شما تا ${date} فعال است.\nبرای تمدید زودهنگام، گزینه موردنظر را انتخاب کنید:`;
}

export const SUBSCRIPTION_EXPIRED =
  'اشتراک شما منقضی شده است.\nبرای ادامه استفاده از خدمات، یکی از گزینه‌های زیر را انتخاب کنید:';

export function discountAttached(percent: number): string {
  return `🎁 کد تخفیف ${percent}% روی پرداخت بعدی شما اعمال می‌شود.`;
}

export function discountApplied(percent: number): string {
  return `کد تخفیف با موفقیت اعمال شد: ${percent}%`;
}

/**
 * Payment instructions; `amount` is already formatted
 */
export function paymentInstructions(planName: string, amount: string, link: string): string {
  return [
    `💳 پرداخت ${planName}`,
    '',
    `مبلغ: ${amount}`,
    `لینک پرداخت: ${link}`,
    '',
    '⚠️ پس از پرداخت، لطفاً کد پیگیری را برای ما ارسال کنید تا اشتراک‌تان فعال شود.',
  ].join('\n');
}

export function paymentConfirmed(date: string): string {
  return `✅ پرداخت ثبت شد. اشتراک شما تا ${date} فعال است.`;
}

export interface UsageStats {
  generatedLast30Days: number;
  statusLine: string;
  referralCount: number;
}

export function usageStats(stats: UsageStats): string {
  return [
    '📊 آمار استفاده',
    '',
    `محتوای تولیدشده در ۳۰ روز اخیر: ${stats.generatedLast30Days}`,
    `وضعیت اشتراک: ${stats.statusLine}`,
    `دوستان دعوت‌شده: ${stats.referralCount}`,
  ].join('\n');
}

export function statusActive(date: string): string {
  return `فعال تا ${date}`;
}

export const STATUS_INACTIVE = 'غیرفعال';

export function inviteText(link: string, count: number): string {
  return `👥 لینک دعوت اختصاصی شما:\n${link}\n\nتا حالا ${count} نفر با لینک شما عضو شدن.`;
}

export function inviteCodeText(code: string, count: number): string {
  return `👥 کد معرف اختصاصی شما: ${code}\n\nتا حالا ${count} نفر با کد شما عضو شدن.`;
}

export const MAIN_MENU = 'منوی اصلی 👇';

export const STYLE_QUESTION = 'سبک نوشتن پیجت رو انتخاب کن:';
export const AUDIENCE_QUESTION = 'مخاطب اصلی پیجت کیه؟';
export const GOAL_QUESTION = 'هدف اصلی محتوات چیه؟';
export const OPTION_INVALID = 'لطفاً یکی از گزینه‌ها رو انتخاب کن:';

export function preferenceSaved(label: string): string {
  return `✅ ذخیره شد: ${label}`;
}
