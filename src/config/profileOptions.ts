// src/config/profileOptions.ts

import type { AudienceType, PageStyle, SalesGoal } from '../types/user.js';

/**
 * Label shown on the choice button, and the phrase interpolated into prompts
 */
export interface ProfileOption<T extends string> {
  value: T;
  label: string;
  promptText: string;
}

export const PAGE_STYLES: readonly ProfileOption<PageStyle>[] = [
  { value: 'serious', label: 'جدی', promptText: 'رسمی، حرفه‌ای و معتبر' },
  { value: 'friendly', label: 'دوستانه', promptText: 'دوستانه، صمیمی و نزدیک به مشتری' },
  { value: 'luxury', label: 'لوکس', promptText: 'لوکس، مجلل و اشرافی' },
  { value: 'traditional', label: 'سنتی', promptText: 'سنتی، اصیل و فرهنگی' },
];

export const AUDIENCE_TYPES: readonly ProfileOption<AudienceType>[] = [
  { value: 'youth', label: 'جوانان', promptText: 'جوانان و نسل جدید' },
  { value: 'luxury', label: 'لاکچری', promptText: 'مشتریان لاکچری و خوش‌سلیقه' },
  { value: 'brides', label: 'عروس‌ها', promptText: 'عروس‌خانم‌ها و زوج‌های جوان' },
  { value: 'general', label: 'عمومی', promptText: 'عموم مردم' },
];

export const SALES_GOALS: readonly ProfileOption<SalesGoal>[] = [
  { value: 'increase_sales', label: 'افزایش فروش', promptText: 'افزایش فروش و تبدیل مخاطب به مشتری' },
  { value: 'brand_awareness', label: 'آگاهی از برند', promptText: 'افزایش آگاهی از برند و شناخت' },
  { value: 'engagement', label: 'تعامل بیشتر', promptText: 'افزایش تعامل و لایک و کامنت' },
];

/**
 * Find the option whose button label matches the input
 */
export function optionByLabel<T extends string>(
  options: readonly ProfileOption<T>[],
  label: string
): ProfileOption<T> | undefined {
  return options.find((option) => option.label === label.trim());
}

/**
 * Find the option for a stored value
 */
export function optionByValue<T extends string>(
  options: readonly ProfileOption<T>[],
  value: T
): ProfileOption<T> | undefined {
  return options.find((option) => option.value === value);
}
