/* src/util/debug.ts
 * Centralized, opt-in debug logger.
 * Emits only when INIKV_DEBUG=1 to avoid noisy output in normal mode.
 */

export const isDebug = (): boolean => process.env.INIKV_DEBUG === '1';

/** Log a concise diagnostic under INIKV_DEBUG=1 (scope: module:function). */
export const debugLog = (scope: string, message: string): void => {
  if (!isDebug()) return;
  // stderr to keep separation from normal output
  console.error(`inikv: debug: ${scope}: ${message}`);
};
