/* src/ini/scan.ts
 * Key/value scanner: one left-to-right pass per content line that tracks quote
 * state, finds the first unquoted `=` and the first unquoted comment start,
 * and detects a trailing continuation backslash.
 */
import { IniParseError } from './errors';
import { isCommentChar, nextQuoteState, unquote } from './quote';
import type { ContinuationScan, EntryScan, QuoteState } from './types';

/**
 * Scan value text starting in `quote` state.
 *
 * A `;` or `#` ends the value only outside quotes, so an open quote keeps the
 * rest of the physical line literal. A trailing `\` (after the comment is
 * dropped and trailing blanks ignored) marks the value as continued; blanks
 * before it are trimmed only when it sits outside any quote.
 */
const scanValue = (rest: string, quote: QuoteState): ContinuationScan => {
  let state = quote;
  let end = rest.length;
  for (let i = 0; i < rest.length; i++) {
    const c = rest.charAt(i);
    if (state === 'normal' && isCommentChar(c)) {
      end = i;
      break;
    }
    state = nextQuoteState(state, c);
  }

  const body = rest.slice(0, end);
  const tail = body.trimEnd();
  if (!tail.endsWith('\\')) return { fragment: body, continued: false, quote: state };

  const before = tail.slice(0, -1);
  return {
    fragment: state === 'normal' ? before.trimEnd() : before,
    continued: true,
    quote: state,
  };
};

/**
 * Scan a line that starts a new entry: `key = value [; comment] [\]`.
 *
 * @param text - Content line (untrimmed).
 * @param line - Physical line number, for errors.
 */
export const scanEntryLine = (text: string, line: number): EntryScan => {
  let state: QuoteState = 'normal';
  let eq = -1;
  for (let i = 0; i < text.length; i++) {
    const c = text.charAt(i);
    if (state === 'normal') {
      if (c === '=') {
        eq = i;
        break;
      }
      if (isCommentChar(c)) break;
    }
    state = nextQuoteState(state, c);
  }
  if (eq < 0) throw new IniParseError('ExpectedKeyEquals', line);

  const key = unquote(text.slice(0, eq));
  if (!key) throw new IniParseError('EmptyKey', line);

  // The key ended outside quotes, so the value always starts in normal state.
  const value = scanValue(text.slice(eq + 1), 'normal');
  return { key, ...value, fragment: value.fragment.trimStart() };
};

/**
 * Scan a continuation line, carrying the quote state from the previous line.
 * Leading blanks are insignificant only when no quote is open.
 */
export const scanContinuation = (
  text: string,
  quote: QuoteState,
): ContinuationScan => {
  const value = scanValue(text, quote);
  return quote === 'normal'
    ? { ...value, fragment: value.fragment.trimStart() }
    : value;
};
