// src/types/content.ts

/**
 * Kinds of generated content
 * 'summary' is the onboarding situation summary (single variant)
 */
export type ContentKind = 'caption' | 'reels' | 'visual' | 'calendar' | 'summary';

export const CONTENT_KINDS: readonly ContentKind[] = ['caption', 'reels', 'visual', 'calendar', 'summary'];

/**
 * Append-only generation log entry
 */
export interface ContentHistoryEntry {
  id: number;
  userId: string;
  contentType: ContentKind;
  prompt: string;
  generatedContent: string;
  createdAt: Date;
}

/**
 * Per-user, per-named-prompt usage counter
 */
export interface PromptUsage {
  userId: string;
  promptName: string;
  usageCount: number;
  lastSystemPrompt: string;
  lastUserPrompt: string;
  updatedAt: Date;
}

/**
 * Outcome of one orchestrator call. variants always holds at least one item;
 * for 'failed' and 'cancelled' it is the localized error text.
 */
export interface GenerationResult {
  status: 'ok' | 'failed' | 'cancelled';
  variants: string[];
}
