/* src/ini/types.ts
 * Shared types for the INI parser (document lines, quote state, entries, result map).
 */

/** Flat result: `section.key` → value. Keys compare by exact code points. */
export type IniMap = Record<string, string>;

/** One completed `(section, key, value)` triple; `line` is where the key appeared (1-based). */
export type IniEntry = {
  section: string;
  key: string;
  value: string;
  line: number;
};

/**
 * Quote scanner state. Closing a quote requires the character that opened it,
 * so `single` only leaves on `'` and `double` only on `"`.
 */
export type QuoteState = 'normal' | 'single' | 'double';

/** Physical line with its ending removed; `number` is 1-based. */
export type PhysicalLine = {
  number: number;
  text: string;
};

export type LineKind =
  | { kind: 'blank' }
  | { kind: 'section'; name: string }
  | { kind: 'content'; text: string };

/** Scanner output for a line that starts a new key. */
export type EntryScan = {
  key: string;
  fragment: string;
  continued: boolean;
  quote: QuoteState;
};

/** Scanner output for a continuation line. */
export type ContinuationScan = {
  fragment: string;
  continued: boolean;
  quote: QuoteState;
};
