/* src/ini/format.ts
 * Write entries back as INI text that parses to the same map.
 */
import { IniFormatError } from './errors';
import { isCommentChar, unquote } from './quote';
import type { IniEntry, IniMap } from './types';

const hasLineBreak = (s: string): boolean => /[\r\n]/.test(s);

const hasOuterSpace = (s: string): boolean => s !== s.trim();

/** Pick a wrapper the text does not contain, or fail. */
const quoteWith = (s: string, what: string): string => {
  if (!s.includes('"')) return `"${s}"`;
  if (!s.includes("'")) return `'${s}'`;
  throw new IniFormatError(`${what} needs quoting but contains both quote characters: ${s}`);
};

const keyNeedsQuotes = (k: string): boolean =>
  hasOuterSpace(k) || k.startsWith('[') || /[=;#'"]/.test(k);

const valueNeedsQuotes = (v: string): boolean =>
  hasOuterSpace(v) ||
  [...v].some(isCommentChar) ||
  v.endsWith('\\') ||
  (v.length > 1 && unquote(v) !== v);

const formatKey = (key: string): string => {
  if (!key) throw new IniFormatError('empty key');
  if (hasLineBreak(key)) throw new IniFormatError(`line break in key: ${key}`);
  return keyNeedsQuotes(key) ? quoteWith(key, 'key') : key;
};

const formatValue = (value: string): string => {
  if (hasLineBreak(value))
    throw new IniFormatError(`line break in value: ${value}`);
  return valueNeedsQuotes(value) ? quoteWith(value, 'value') : value;
};

const formatSection = (name: string): string => {
  if (!name || hasOuterSpace(name) || hasLineBreak(name) || /[\];#]/.test(name))
    throw new IniFormatError(`invalid section name: ${name}`);
  return `[${name}]`;
};

/**
 * Format entries grouped by section (first-appearance order), one
 * `key = value` line each and a blank line between sections.
 */
export const formatIni = (
  entries: Iterable<Pick<IniEntry, 'section' | 'key' | 'value'>>,
): string => {
  const sections = new Map<string, string[]>();
  for (const { section, key, value } of entries) {
    const lines = sections.get(section) ?? [];
    lines.push(value ? `${formatKey(key)} = ${formatValue(value)}` : `${formatKey(key)} =`);
    sections.set(section, lines);
  }
  return [...sections]
    .map(([name, lines]) => [formatSection(name), ...lines].join('\n'))
    .join('\n\n')
    .concat(sections.size ? '\n' : '');
};

/** Format a flat map; each composite key is split at its first `.`. */
export const formatIniMap = (map: IniMap): string =>
  formatIni(
    Object.entries(map).map(([composite, value]) => {
      const dot = composite.indexOf('.');
      if (dot < 0)
        throw new IniFormatError(`not a section.key name: ${composite}`);
      return {
        section: composite.slice(0, dot),
        key: composite.slice(dot + 1),
        value,
      };
    }),
  );
