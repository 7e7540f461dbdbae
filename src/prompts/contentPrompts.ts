// src/prompts/contentPrompts.ts
//
// Content generation prompts, one per content kind.
// Edit these prompts to adjust tone and structure of generated content.

import { AUDIENCE_TYPES, PAGE_STYLES, SALES_GOALS, optionByValue } from '../config/profileOptions.js';
import { buildLabelPattern } from '../parsers/variantParser.js';
import type { ContentKind } from '../types/content.js';
import type { Profile } from '../types/user.js';

/**
 * Everything the orchestrator needs for one generator call
 */
export interface PromptSpec {
  name: string;
  systemPrompt: string;
  userPrompt: string;
  labelPattern: RegExp | null;
}

interface KindTemplate {
  name: string;
  labelWords: readonly string[];
  role: string;
  noun: string;
  sections: readonly string[];
  request: (input: string) => string;
}

const TEMPLATES: Record<Exclude<ContentKind, 'summary'>, KindTemplate> = {
  caption: {
    name: 'caption_generation',
    labelWords: ['کپشن', 'caption'],
    role: 'تو یک متخصص بازاریابی طلا و جواهرات هستی که برای صفحات اینستاگرام فارسی کپشن می‌نویسی.',
    noun: 'کپشن',
    sections: [
      'از ایموجی مناسب استفاده کن',
      'CTA (فراخوان عمل) در پایان هر کپشن بیاور',
      'زبان فارسی روان و طبیعی استفاده کن',
    ],
    request: (input) => `محصول: ${input}\n\nکپشن‌ها را برای این محصول بنویس.`,
  },
  reels: {
    name: 'reels_scenario',
    labelWords: ['سناریو', 'scenario'],
    role: 'تو یک کارگردان محتوا برای ریلز اینستاگرام هستی که برای صفحات طلا و جواهرات کار می‌کنی.',
    noun: 'سناریو',
    sections: [
      'هر سناریو شامل این بخش‌ها باشد: 📋 موضوع، 🎬 نحوه فیلم‌برداری، ✍️ متن روی ویدیو، 🎵 موزیک پیشنهادی، ⏱️ مدت زمان، 🎯 هدف',
      'سناریوها باید قابل اجرا و عملی باشند',
      'از ترندهای روز استفاده کن',
    ],
    request: (input) => `موضوع اصلی: ${input}\n\nسناریوهای ریلز را ارائه بده.`,
  },
  visual: {
    name: 'visual_ideas',
    labelWords: ['ایده', 'idea'],
    role: 'تو یک عکاس حرفه‌ای طلا و جواهرات هستی که ایده‌های بصری خلاقانه ارائه می‌دهی.',
    noun: 'ایده بصری',
    sections: [
      'هر ایده شامل این بخش‌ها باشد: 📐 زاویه عکس، 💡 نورپردازی، 🎨 چیدمان، 🖼️ پس‌زمینه، 💎 نکته فنی',
      'ایده‌ها باید با امکانات یک گالری معمولی قابل اجرا باشند',
    ],
    request: (input) => `نوع محصول: ${input}\n\nایده‌های عکاسی را ارائه بده.`,
  },
  calendar: {
    name: 'content_calendar',
    labelWords: ['هفته', 'week'],
    role: 'تو یک برنامه‌ریز محتوای اینستاگرام برای گالری‌های طلا و جواهرات هستی.',
    noun: 'برنامه هفتگی',
    sections: [
      'هر هفته شامل روزهای انتشار، نوع محتوا (پست، ریلز، استوری) و موضوع هر محتوا باشد',
      'مناسبت‌های تقویم ایران را در نظر بگیر',
    ],
    request: (input) =>
      input
        ? `تمرکز یا مناسبت: ${input}\n\nتقویم محتوایی هفته‌های پیش رو را بنویس.`
        : 'تقویم محتوایی هفته‌های پیش رو را بنویس.',
  },
};

const PERSIAN_DIGITS = '۰۱۲۳۴۵۶۷۸۹';

/**
 * Render a number with Persian digits
 */
export function toPersianDigits(value: number | string): string {
  return String(value).replace(/[0-9]/g, (digit) => PERSIAN_DIGITS.charAt(Number(digit)));
}

function describePreferences(profile: Profile): string {
  const style = optionByValue(PAGE_STYLES, profile.pageStyle)?.promptText ?? 'دوستانه و طبیعی';
  const audience = optionByValue(AUDIENCE_TYPES, profile.audienceType)?.promptText ?? 'عموم مردم';
  const goal = optionByValue(SALES_GOALS, profile.salesGoal)?.promptText ?? 'افزایش فروش';

  return [`سبک نوشتن: ${style}`, `نوع مخاطب: ${audience}`, `هدف اصلی: ${goal}`].join('\n');
}

/**
 * Profile facts as a bullet list; empty fields are left out
 */
export function describeBusiness(profile: Profile): string {
  const lines: string[] = [];

  if (profile.galleryName) lines.push(`- نام گالری: ${profile.galleryName}`);
  if (profile.instagramHandle) lines.push(`- اینستاگرام: @${profile.instagramHandle}`);
  if (profile.telegramChannel) lines.push(`- کانال تلگرام: @${profile.telegramChannel}`);
  if (profile.mainCustomers) lines.push(`- مشتریان اصلی: ${profile.mainCustomers}`);
  if (profile.constraints) lines.push(`- باید و نبایدها: ${profile.constraints}`);
  if (profile.contentHelp) lines.push(`- کمک در تولید محتوا: ${profile.contentHelp}`);
  if (profile.hasPhysicalStore !== null) {
    lines.push(`- گالری حضوری: ${profile.hasPhysicalStore ? 'دارد' : 'ندارد'}`);
  }
  if (profile.additionalInfo) lines.push(`- توضیحات بیشتر: ${profile.additionalInfo}`);

  return lines.length > 0 ? `اطلاعات کسب‌وکار:\n${lines.join('\n')}` : '';
}

function numberingRule(template: KindTemplate, count: number): string {
  const word = template.labelWords[0] ?? template.noun;
  return (
    `- دقیقاً ${count} ${template.noun} مختلف بنویس (${toPersianDigits(count)} مورد)\n` +
    `- هر مورد را در خطی جدا با «${word} 1:» تا «${word} ${count}:» ` +
    `(یا «${word} ۱:» تا «${word} ${toPersianDigits(count)}:») شروع کن`
  );
}

function buildSummaryPrompt(profile: Profile): PromptSpec {
  const systemPrompt = [
    'تو یک مشاور بازاریابی برای گالری‌های طلا و جواهرات هستی.',
    'بر اساس اطلاعات زیر، یک خلاصه کوتاه و صمیمی (حداکثر ۸ خط) از وضعیت فعلی کسب‌وکار بنویس:',
    'نقاط قوت، چالش‌های تولید محتوا و فرصت‌های اصلی را بگو.',
    'خلاصه را خطاب به صاحب گالری و به زبان فارسی روان بنویس.',
  ].join('\n');

  const business = describeBusiness(profile);

  return {
    name: 'situation_summary',
    systemPrompt,
    userPrompt: `${business || 'اطلاعات زیادی ثبت نشده است.'}\n\n${describePreferences(profile)}`,
    labelPattern: null,
  };
}

/**
 * Build the system/user prompt pair for a generation request
 */
export function buildPrompt(
  kind: ContentKind,
  userInput: string,
  profile: Profile,
  count: number
): PromptSpec {
  if (kind === 'summary') {
    return buildSummaryPrompt(profile);
  }

  const template = TEMPLATES[kind];
  const business = describeBusiness(profile);

  const systemPrompt = [
    template.role,
    '',
    describePreferences(profile),
    ...(business ? ['', business] : []),
    '',
    'قوانین:',
    numberingRule(template, count),
    ...template.sections.map((section) => `- ${section}`),
  ].join('\n');

  return {
    name: template.name,
    systemPrompt,
    userPrompt: template.request(userInput.trim()),
    labelPattern: buildLabelPattern(template.labelWords),
  };
}
