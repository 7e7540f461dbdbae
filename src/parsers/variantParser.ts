// src/parsers/variantParser.ts

/**
 * Latin, Persian and Arabic-Indic digits
 */
const DIGITS = '[0-9۰-۹٠-٩]+';

/**
 * Build the label matcher for a content kind.
 *
 * Matches a line that starts (after optional markdown markers) with either
 * "<word> N" for any of the given words, or a bare "N." / "N)" / "N-" / "N:".
 */
export function buildLabelPattern(words: readonly string[]): RegExp {
  const named = words.length > 0 ? `(?:${words.join('|')})[ \\t]*${DIGITS}|` : '';
  return new RegExp(
    `^[ \\t]*[*#>_]*[ \\t]*(?:${named}${DIGITS}[ \\t]*[.)\\-:٫])`,
    'gimu'
  );
}

/**
 * Items introduced by a label, each running until the next label.
 * Text before the first label is dropped.
 */
function splitOnLabels(text: string, labelPattern: RegExp): string[] {
  const flags = labelPattern.flags.includes('g') ? labelPattern.flags : `${labelPattern.flags}g`;
  const starts = Array.from(text.matchAll(new RegExp(labelPattern.source, flags)), (match) => match.index ?? 0);

  return starts
    .map((start, i) => text.slice(start, starts[i + 1] ?? text.length).trim())
    .filter((item) => item.length > 0);
}

/**
 * Blank-line delimited paragraphs
 */
function splitOnParagraphs(text: string): string[] {
  return text
    .split(/\n[ \t]*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * Split a free-text generator reply into at most `expectedCount` variants.
 *
 * 1. labelled items, when at least `expectedCount` labels are found
 * 2. otherwise blank-line paragraphs
 * 3. otherwise the whole reply as one item
 *
 * Never throws; the result is sliced, never padded.
 */
export function parseVariants(
  text: string,
  expectedCount: number,
  labelPattern: RegExp | null
): string[] {
  const trimmed = text.trim();
  const limit = Math.max(1, expectedCount);

  if (labelPattern) {
    const labelled = splitOnLabels(trimmed, labelPattern);
    if (labelled.length >= limit) {
      return labelled.slice(0, limit);
    }
  }

  const paragraphs = splitOnParagraphs(trimmed);
  if (paragraphs.length > 0) {
    return paragraphs.slice(0, limit);
  }

  return [trimmed];
}
