/* src/ini/quote.ts
 * Quote state machine and the unquoting helper shared by keys and values.
 */
import type { QuoteState } from './types';

const OPENERS: Record<string, QuoteState> = { "'": 'single', '"': 'double' };
const CLOSERS: Record<Exclude<QuoteState, 'normal'>, string> = {
  single: "'",
  double: '"',
};

export const isQuoteChar = (c: string): boolean => c === "'" || c === '"';

export const isCommentChar = (c: string): boolean => c === ';' || c === '#';

/**
 * Advance the quote state by one character.
 * Any quote opens from `normal`; only the matching character closes.
 * A non-matching quote inside an open quote is plain content.
 */
export const nextQuoteState = (state: QuoteState, c: string): QuoteState => {
  if (state === 'normal') return OPENERS[c] ?? 'normal';
  return c === CLOSERS[state] ? 'normal' : state;
};

/** True when `s` has no occurrence of `q` except as doubled pairs (`""`). */
const onlyDoubled = (s: string, q: string): boolean => {
  for (let i = 0; i < s.length; i++) {
    if (s[i] !== q) continue;
    if (s[i + 1] !== q) return false;
    i++;
  }
  return true;
};

/**
 * Trim, then strip one pair of matching boundary quotes when the interior
 * holds no unescaped occurrence of that quote. Doubled quotes count as
 * escaped and are kept verbatim; otherwise the trimmed text is returned as is.
 */
export const unquote = (src: string): string => {
  const s = src.trim();
  if (s.length < 2) return s;
  const q = s[0];
  if (q === undefined || !isQuoteChar(q) || s[s.length - 1] !== q) return s;
  const inner = s.slice(1, -1);
  return onlyDoubled(inner, q) ? inner : s;
};
