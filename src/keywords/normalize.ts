import type { KeywordType } from '../db/types.js';

export interface NormalizedKeyword {
  keyword: string;
  keyword_type: KeywordType;
}

const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;
const EDGE_PUNCTUATION = /^[.,!?;:]+|[.,!?;:]+$/g;

/**
 * Canonical form used for keyword uniqueness: no leading `#`, no control
 * characters, single spaces, lower case, no trailing sentence punctuation.
 * Returns an empty string when nothing is left.
 */
export function normalizeKeyword(raw: string): string {
  return raw
    .replace(CONTROL_CHARS, ' ')
    .trim()
    .replace(/^#+/, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLocaleLowerCase('en-US')
    .replace(EDGE_PUNCTUATION, '')
    .trim();
}

export function classifyKeyword(raw: string): KeywordType {
  return raw.trim().startsWith('#') ? 'hashtag' : 'keyword';
}

/** Normalize and deduplicate, keeping first-seen order. */
export function normalizeCandidates(raw: readonly string[]): NormalizedKeyword[] {
  const seen = new Set<string>();
  const out: NormalizedKeyword[] = [];
  for (const candidate of raw) {
    const keyword = normalizeKeyword(candidate);
    if (!keyword || seen.has(keyword)) continue;
    seen.add(keyword);
    out.push({ keyword, keyword_type: classifyKeyword(candidate) });
  }
  return out;
}
