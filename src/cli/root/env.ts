// src/cli/root/env.ts
import type { Command } from 'commander';

/** Install root preAction to resolve INIKV_DEBUG/INIKV_BORING from flags. */
export const installRootEnvPreAction = (cli: Command): void => {
  cli.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ debug?: boolean; boring?: boolean }>();
    const fromCli = (name: string): boolean =>
      thisCommand.getOptionValueSource(name) === 'cli';

    if (fromCli('debug') && opts.debug) process.env.INIKV_DEBUG = '1';

    if (fromCli('boring') && opts.boring) {
      process.env.INIKV_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    }
  });
};
