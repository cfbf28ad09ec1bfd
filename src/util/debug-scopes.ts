/* src/util/debug-scopes.ts
 * Centralized labels for debugLog.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** parser: pending continuation flushed by a blank line or the end of the document */
export const DBG_SCOPE_INI_FLUSH = 'ini.parse:flush';

/** parser: value left an open quote at the end of its last line */
export const DBG_SCOPE_INI_UNBALANCED = 'ini.parse:unbalanced-quote';

/** result builder: later entry replaced an earlier one */
export const DBG_SCOPE_INI_OVERWRITE = 'ini.parse:overwrite';

/** file reader: encoding picked from a byte-order mark */
export const DBG_SCOPE_READ_BOM = 'ini.read:bom';

/** run options: command-line override replaced an ini value */
export const DBG_SCOPE_OPTIONS_OVERRIDE = 'options.merge:override';

/** cli: output written to file */
export const DBG_SCOPE_CLI_OUT = 'cli.parse:out';
