// src/types/user.ts

/**
 * Onboarding step persisted on the user row.
 * Mirrors the funnel states; 'completed' once the summary is approved.
 */
export type OnboardingStep =
  | 'start'
  | 'name'
  | 'phone'
  | 'email'
  | 'gallery_name'
  | 'instagram'
  | 'telegram'
  | 'customers'
  | 'constraints'
  | 'help'
  | 'physical_store'
  | 'additional_info'
  | 'summary_confirm'
  | 'completed';

export const ONBOARDING_STEPS: readonly OnboardingStep[] = [
  'start',
  'name',
  'phone',
  'email',
  'gallery_name',
  'instagram',
  'telegram',
  'customers',
  'constraints',
  'help',
  'physical_store',
  'additional_info',
  'summary_confirm',
  'completed',
];

/**
 * Chat user, keyed by the transport's stable identity
 */
export interface User {
  userId: string;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  displayName: string | null;
  phone: string | null;
  email: string | null;
  referralCode: string | null;
  referredBy: string | null;
  referralCount: number;
  onboardingStep: OnboardingStep;
  onboardingCompleted: boolean;
  isActive: boolean;
  isBlocked: boolean;
  createdAt: Date;
  updatedAt: Date;
  lastActivity: Date;
}

/**
 * Input for user creation (from /start or the first inbound event)
 */
export interface NewUserInput {
  userId: string;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  referredByCode?: string | null;
}

export type PageStyle = 'serious' | 'friendly' | 'luxury' | 'traditional';
export type AudienceType = 'youth' | 'luxury' | 'brides' | 'general';
export type SalesGoal = 'increase_sales' | 'brand_awareness' | 'engagement';

/**
 * Business profile, one-to-one with User
 */
export interface Profile {
  userId: string;
  galleryName: string | null;
  instagramHandle: string | null;
  telegramChannel: string | null;
  mainCustomers: string | null;
  constraints: string | null;
  contentHelp: string | null;
  hasPhysicalStore: boolean | null;
  additionalInfo: string | null;
  pageStyle: PageStyle;
  audienceType: AudienceType;
  salesGoal: SalesGoal;
  situationSummary: string | null;
  summaryApproved: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields the funnel and the profile editor may assign
 */
export type ProfilePatch = Partial<
  Pick<
    Profile,
    | 'galleryName'
    | 'instagramHandle'
    | 'telegramChannel'
    | 'mainCustomers'
    | 'constraints'
    | 'contentHelp'
    | 'hasPhysicalStore'
    | 'additionalInfo'
    | 'pageStyle'
    | 'audienceType'
    | 'salesGoal'
  >
>;

export type UserPatch = Partial<Pick<User, 'displayName' | 'phone' | 'email'>>;
