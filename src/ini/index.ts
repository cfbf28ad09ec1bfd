/**
 * Barrel exports for the INI parser core.
 */
export * from './errors';
export * from './format';
export * from './lines';
export * from './parse';
export { unquote } from './quote';
export type * from './types';
