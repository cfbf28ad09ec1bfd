/** src/cli/check.ts
 * `inikv check <file>`: validate a file and report key counts.
 */
import type { Command } from 'commander';

import { readIniText, withIniPath } from '@/common/ini/read';
import { parseIniEntries, toIniMap } from '@/ini/parse';
import { ok, warn } from '@/util/color';

import { applyCliSafety, guarded } from './cli-utils';
import { checkOptionsSchema } from './options';

export function registerCheck(cli: Command): Command {
  const sub = cli
    .command('check')
    .description('Validate an INI file')
    .argument('<file>', 'path to the INI file')
    .option('-e, --encoding <label>', 'source encoding, e.g. windows-1252');

  applyCliSafety(sub);

  sub.action(
    guarded(async (file: string, raw: unknown) => {
      const opts = checkOptionsSchema.parse(raw);
      const text = await readIniText(file, { encoding: opts.encoding });
      const entries = withIniPath(file, () => parseIniEntries(text));
      const keys = Object.keys(toIniMap(entries)).length;
      console.log(ok(`ok: ${String(keys)} keys`));
      const dup = entries.length - keys;
      if (dup > 0)
        console.log(warn(`warn: ${String(dup)} duplicate keys overwritten`));
    }),
  );
  return sub;
}
