/**
 * Case-insensitive substring matching against a fixed keyword set.
 */

import { Errors } from './errors.js';

export const DEFAULT_KEYWORDS: readonly string[] = [
  'bug',
  'issue',
  'problem',
  'error',
  'broken',
  'not working',
  'failed',
  'crash',
  'incident',
  'urgent',
  'rattle',
  'deflation',
];

/**
 * Normalize a keyword list: lowercase, trimmed, blanks and repeats dropped,
 * first occurrence keeps its position.
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

export class KeywordMatcher {
  readonly keywords: readonly string[];

  constructor(keywords: readonly string[] = DEFAULT_KEYWORDS) {
    const normalized = normalizeKeywords(keywords);
    if (normalized.length === 0) {
      throw Errors.invalidConfig('keyword set is empty');
    }
    this.keywords = Object.freeze(normalized);
  }

  /**
   * Keywords found in `text`, in keyword-set order. "error" matches "Errors".
   */
  match(text: string): string[] {
    const lower = text.toLowerCase();
    return this.keywords.filter((keyword) => lower.includes(keyword));
  }
}
