/** Library entry point.
 * Parser core, file reader, run-options merge and the CLI factory.
 */
export * from './ini';
export * from './common/ini/read';
export * from './options/run-options';
export { makeCli } from './cli';
