/** src/cli/get.ts
 * `inikv get <file> <key>`: print one value (command-line overrides win).
 */
import type { Command } from 'commander';

import { readIniFile } from '@/common/ini/read';
import { mergeRunOptions } from '@/options/run-options';

import { applyCliSafety, collect, guarded } from './cli-utils';
import { getOptionsSchema } from './options';

export function registerGet(cli: Command): Command {
  const sub = cli
    .command('get')
    .description('Print the value of one section.key')
    .argument('<file>', 'path to the INI file')
    .argument('<key>', 'composite key, e.g. General.Cases')
    .option('-e, --encoding <label>', 'source encoding, e.g. windows-1252')
    .option(
      '-s, --set <section.key=value>',
      'override a value (repeatable; command line wins)',
      collect,
      [],
    )
    .option('--default <value>', 'value to print when the key is not set');

  applyCliSafety(sub);

  sub.action(
    guarded(async (file: string, key: string, raw: unknown) => {
      const opts = getOptionsSchema.parse(raw);
      const ini = await readIniFile(file, { encoding: opts.encoding });
      const runOpts = mergeRunOptions({
        ini,
        overrides: opts.set,
        defaults:
          opts.default === undefined ? undefined : { [key]: opts.default },
      });
      const found = runOpts.lookup(key);
      if (!found.isExist && !found.isDefault && opts.default === undefined)
        throw new Error(`key not found: ${key}`);
      console.log(found.value);
    }),
  );
  return sub;
}
