/** src/cli/parse/index.ts
 * `inikv parse <file>`: print (or write) the flattened map.
 */
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { ensureDir } from 'fs-extra/esm';

import { readIniFile } from '@/common/ini/read';
import { mergeRunOptions } from '@/options/run-options';
import { DBG_SCOPE_CLI_OUT } from '@/util/debug-scopes';
import { debugLog } from '@/util/debug';

import { applyCliSafety, collect, guarded } from '../cli-utils';
import { outputFormats, parseOptionsSchema } from '../options';
import { renderMap } from './render';

export function registerParse(cli: Command): Command {
  const sub = cli
    .command('parse')
    .description('Parse an INI file and print section.key values')
    .argument('<file>', 'path to the INI file')
    .option('-e, --encoding <label>', 'source encoding, e.g. windows-1252')
    .option(
      '-f, --format <format>',
      `output format (${outputFormats.join('|')})`,
      'json',
    )
    .option(
      '-s, --set <section.key=value>',
      'override a value (repeatable; command line wins)',
      collect,
      [],
    )
    .option('-o, --out <path>', 'write output to a file instead of stdout');

  applyCliSafety(sub);

  sub.action(
    guarded(async (file: string, raw: unknown) => {
      const opts = parseOptionsSchema.parse(raw);
      const ini = await readIniFile(file, { encoding: opts.encoding });
      const merged = mergeRunOptions({ ini, overrides: opts.set });
      const text = renderMap({ ...merged.keyValue }, opts.format);

      if (!opts.out) {
        console.log(text);
        return;
      }
      const out = path.resolve(opts.out);
      await ensureDir(path.dirname(out));
      await writeFile(out, `${text}\n`, 'utf8');
      debugLog(DBG_SCOPE_CLI_OUT, out);
    }),
  );
  return sub;
}
