/* src/ini/classify.ts
 * Line classifier: blank/comment, [section] header, or content for the scanner.
 */
import { IniParseError } from './errors';
import { isCommentChar, nextQuoteState } from './quote';
import type { LineKind, QuoteState } from './types';

export type ClassifyContext = {
  /** Physical line number, for errors. */
  line: number;
  /** Quote state carried by a pending continuation; undefined when idle. */
  pending: QuoteState | undefined;
  /** True once a [section] header has been seen. */
  hasSection: boolean;
};

/**
 * Parse `[name]` from a trimmed line that starts with `[`. The name runs to
 * the first `]`; quotes in it are plain characters, except that a comment
 * character between quotes does not end the line.
 */
const parseSectionHeader = (trimmed: string, line: number): string => {
  const close = trimmed.indexOf(']');
  if (close < 0) throw new IniParseError('InvalidSectionHeader', line);
  const raw = trimmed.slice(1, close);
  let quote: QuoteState = 'normal';
  for (const c of raw) {
    if (quote === 'normal' && isCommentChar(c))
      throw new IniParseError('InvalidSectionHeader', line);
    quote = nextQuoteState(quote, c);
  }
  const name = raw.trim();
  if (!name) throw new IniParseError('InvalidSectionHeader', line);
  return name;
};

/**
 * Classify one physical line.
 *
 * While a continuation is pending every non-empty line is content: the
 * scanner drops a comment, and a `[` line is value text, not a header.
 */
export const classifyLine = (text: string, ctx: ClassifyContext): LineKind => {
  const trimmed = text.trim();
  if (!trimmed) return { kind: 'blank' };

  const first = trimmed.charAt(0);
  if (ctx.pending === undefined && isCommentChar(first))
    return { kind: 'blank' };

  if (ctx.pending === undefined && first === '[') {
    return { kind: 'section', name: parseSectionHeader(trimmed, ctx.line) };
  }

  if (ctx.pending === undefined && !ctx.hasSection)
    throw new IniParseError('KeyBeforeSection', ctx.line);

  return { kind: 'content', text };
};
