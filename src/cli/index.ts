/* Root CLI factory for the "inikv" tool.
 * - Register subcommands: parse, get, check.
 * - Avoid invoking process.exit during tests; exitOverride is installed.
 */
import { Command } from 'commander';

import { registerCheck } from './check';
import { applyCliSafety } from './cli-utils';
import { registerGet } from './get';
import { registerParse } from './parse';
import { installRootEnvPreAction } from './root/env';

/**
 * Build the root CLI (`inikv`) without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (): Command => {
  const cli = new Command('inikv')
    .description('Flatten INI-style configuration into section.key values')
    .option('-d, --debug', 'print parser diagnostics to stderr')
    .option('-b, --boring', 'disable colored output');

  applyCliSafety(cli);
  installRootEnvPreAction(cli);

  registerParse(cli);
  registerGet(cli);
  registerCheck(cli);
  return cli;
};
