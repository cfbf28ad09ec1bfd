/* src/ini/parse.ts
 * Parse driver and result builder: one synchronous pass over the document,
 * all state local to the call.
 */
import {
  DBG_SCOPE_INI_FLUSH,
  DBG_SCOPE_INI_OVERWRITE,
  DBG_SCOPE_INI_UNBALANCED,
} from '@/util/debug-scopes';
import { debugLog } from '@/util/debug';

import { Accumulator, type Completed } from './accumulate';
import { classifyLine } from './classify';
import { type IniParseError, isIniParseError } from './errors';
import { splitLines } from './lines';
import { scanContinuation, scanEntryLine } from './scan';
import type { IniEntry, IniMap } from './types';

/** Composite key: `section.key`. */
export const iniKey = (section: string, key: string): string =>
  `${section}.${key}`;

/**
 * Parse a document into completed entries, in document order.
 * Duplicates are kept; {@link toIniMap} applies last-write-wins.
 *
 * @throws IniParseError on the first structural error.
 */
export const parseIniEntries = (text: string): IniEntry[] => {
  const entries: IniEntry[] = [];
  const acc = new Accumulator(({ entry, quote }: Completed) => {
    if (quote !== 'normal')
      debugLog(
        DBG_SCOPE_INI_UNBALANCED,
        `line ${String(entry.line)}: ${iniKey(entry.section, entry.key)} kept literal`,
      );
    entries.push(entry);
  });
  let section = '';
  let last = 0;

  const boundary = (line: number): void => {
    if (acc.flush())
      debugLog(DBG_SCOPE_INI_FLUSH, `line ${String(line)}: pending value flushed`);
  };

  for (const { number, text: raw } of splitLines(text)) {
    last = number;
    const pending = acc.pending;
    const kind = classifyLine(raw, {
      line: number,
      pending,
      hasSection: section !== '',
    });

    switch (kind.kind) {
      case 'blank':
        boundary(number);
        break;
      case 'section':
        section = kind.name;
        break;
      case 'content':
        if (pending === undefined)
          acc.start(section, scanEntryLine(kind.text, number), number);
        else acc.append(scanContinuation(kind.text, pending));
        break;
    }
  }
  boundary(last);
  return entries;
};

/** Result builder: `section.key → value`, later entries overwrite earlier ones. */
export const toIniMap = (entries: Iterable<IniEntry>): IniMap => {
  const out: IniMap = {};
  for (const e of entries) {
    const k = iniKey(e.section, e.key);
    if (Object.prototype.hasOwnProperty.call(out, k))
      debugLog(DBG_SCOPE_INI_OVERWRITE, `line ${String(e.line)}: ${k}`);
    out[k] = e.value;
  }
  return out;
};

/**
 * Parse INI text into a flat map of `section.key` to string values.
 *
 * @example
 * parseIni('[a]\nk = hello world ; note\n'); // { 'a.k': 'hello world' }
 * @throws IniParseError with the offending line number; no partial result.
 */
export const parseIni = (text: string): IniMap => toIniMap(parseIniEntries(text));

export type SafeParseResult =
  | { success: true; data: IniMap }
  | { success: false; error: IniParseError };

/** Non-throwing variant of {@link parseIni}. */
export const safeParseIni = (text: string): SafeParseResult => {
  try {
    return { success: true, data: parseIni(text) };
  } catch (e) {
    if (isIniParseError(e)) return { success: false, error: e };
    throw e;
  }
};
