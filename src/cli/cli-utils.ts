/** Shared Commander helpers for the inikv CLI.
 * DRY the repeated exitOverride + error reporting across subcommands.
 */
import type { Command } from 'commander';
import { ZodError } from 'zod';

import { IniFormatError, IniParseError, IniReadError } from '@/ini/errors';
import { dim, error } from '@/util/color';
import { isDebug } from '@/util/debug';

/**
 * Install a Commander exit override so help, version and usage errors throw
 * a CommanderError instead of calling process.exit. The bin maps the error's
 * exitCode (0 for help) onto process.exitCode.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    throw err;
  });
};

/** Apply safety adapters to a command. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
}

export const formatZodError = (e: ZodError): string =>
  e.issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('\n');

/** Collector for repeatable options (`-s a.b=1 -s c.d=2`). */
export const collect = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

/**
 * Report an action failure on stderr and flag a non-zero exit code.
 * Expected failures print their message only; anything else also prints
 * the stack under INIKV_DEBUG=1.
 */
export const reportError = (e: unknown): void => {
  process.exitCode = 1;
  if (e instanceof ZodError) {
    console.error(error(`inikv: invalid option: ${formatZodError(e)}`));
    return;
  }
  if (
    e instanceof IniParseError ||
    e instanceof IniReadError ||
    e instanceof IniFormatError
  ) {
    console.error(error(`inikv: ${e.message}`));
    return;
  }
  const msg = e instanceof Error ? e.message : String(e);
  console.error(error(`inikv: ${msg}`));
  if (isDebug() && e instanceof Error && e.stack) console.error(dim(e.stack));
};

/** Wrap an async action so failures are reported instead of thrown. */
export const guarded =
  <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
  async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (e) {
      reportError(e);
    }
  };
