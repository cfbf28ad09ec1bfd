/* src/util/color.ts
 * Meaning-based color helpers that respect INIKV_BORING/NO_COLOR/FORCE_COLOR.
 * BORING or non-TTY => return unstyled strings.
 */
import chalk from 'chalk';

export function isBoring(): boolean {
  // Compute TTY dynamically so tests and callers can toggle isTTY/env reliably.
  const tty = Boolean(process.stdout.isTTY);
  return (
    process.env.INIKV_BORING === '1' ||
    process.env.NO_COLOR === '1' ||
    process.env.FORCE_COLOR === '0' ||
    !tty
  );
}

/** Semantic aliases (unstyled in BORING/non-TTY) */
export function ok(s: string): string {
  return isBoring() ? s : chalk.green(s);
}
export function error(s: string): string {
  return isBoring() ? s : chalk.red(s);
}
export function warn(s: string): string {
  return isBoring() ? s : chalk.hex('#FFA500')(s);
} // orange

/** Text style (unstyled in BORING/non-TTY) */
export function dim(s: string): string {
  return isBoring() ? s : chalk.dim(s);
}
