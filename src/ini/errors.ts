/* src/ini/errors.ts
 * Typed failures for parsing, formatting and reading INI documents.
 */

export type IniParseErrorCode =
  | 'KeyBeforeSection'
  | 'InvalidSectionHeader'
  | 'ExpectedKeyEquals'
  | 'EmptyKey';

const DESCRIPTIONS: Record<IniParseErrorCode, string> = {
  KeyBeforeSection:
    'only comments or empty lines can be before first section',
  InvalidSectionHeader: 'invalid section name',
  ExpectedKeyEquals: 'expected key=...',
  EmptyKey: 'empty key',
};

/** Structural parse failure at a specific physical line (1-based). */
export class IniParseError extends Error {
  readonly code: IniParseErrorCode;
  readonly line: number;

  constructor(code: IniParseErrorCode, line: number, message?: string) {
    super(message ?? `line ${String(line)}: ${DESCRIPTIONS[code]}`);
    this.name = 'IniParseError';
    this.code = code;
    this.line = line;
  }
}

/** A key, value or section name that cannot be written back as INI text. */
export class IniFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IniFormatError';
  }
}

/** Reading or decoding an INI file failed before parsing started. */
export class IniReadError extends Error {
  readonly path: string;
  readonly code: string | undefined;

  constructor(path: string, message: string, code?: string) {
    super(message);
    this.name = 'IniReadError';
    this.path = path;
    this.code = code;
  }
}

export const isIniParseError = (e: unknown): e is IniParseError =>
  e instanceof IniParseError;
