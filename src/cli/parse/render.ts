/* src/cli/parse/render.ts
 * Render a flat map in one of the output formats (no trailing newline).
 */
import YAML from 'yaml';

import { formatIniMap } from '@/ini/format';
import type { IniMap } from '@/ini/types';

import type { OutputFormat } from '../options';

/** Copy with keys in code-unit order. */
export const sortMap = (map: IniMap): IniMap => {
  const out: IniMap = {};
  for (const k of Object.keys(map).sort()) out[k] = map[k] ?? '';
  return out;
};

export const renderMap = (map: IniMap, format: OutputFormat): string => {
  const sorted = sortMap(map);
  switch (format) {
    case 'json':
      return JSON.stringify(sorted, null, 2);
    case 'yaml':
      return YAML.stringify(sorted).trimEnd();
    case 'ini':
      return formatIniMap(sorted).trimEnd();
    case 'kv':
      return Object.entries(sorted)
        .map(([k, v]) => `${k}=${v}`)
        .join('\n');
  }
};
