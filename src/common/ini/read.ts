/* src/common/ini/read.ts
 * Read an INI file from disk: decode bytes to text (BOM or named encoding),
 * then parse. Encoding handling stays outside the parser core.
 */
import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { IniParseError, IniReadError, isIniParseError } from '@/ini/errors';
import { parseIni } from '@/ini/parse';
import type { IniMap } from '@/ini/types';
import { DBG_SCOPE_READ_BOM } from '@/util/debug-scopes';
import { debugLog } from '@/util/debug';

export type ReadIniOptions = {
  /** WHATWG encoding label, e.g. "windows-1252". A byte-order mark wins. */
  encoding?: string;
};

const BOMS: ReadonlyArray<{ label: string; bytes: readonly number[] }> = [
  { label: 'utf-8', bytes: [0xef, 0xbb, 0xbf] },
  { label: 'utf-16le', bytes: [0xff, 0xfe] },
  { label: 'utf-16be', bytes: [0xfe, 0xff] },
];

const detectBom = (bytes: Uint8Array): string | undefined =>
  BOMS.find(({ bytes: bom }) => bom.every((b, i) => bytes[i] === b))?.label;

/**
 * Decode raw file bytes. A UTF-8/UTF-16 byte-order mark selects the encoding
 * and is dropped; otherwise `encoding` (default utf-8) is used.
 *
 * @throws IniReadError when the encoding label is unknown.
 */
export const decodeIniBytes = (
  bytes: Uint8Array,
  encoding?: string,
  path = '',
): string => {
  const bom = detectBom(bytes);
  if (bom) debugLog(DBG_SCOPE_READ_BOM, `${path || '(bytes)'}: ${bom}`);
  const label = bom ?? (encoding?.trim() || 'utf-8');
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label);
  } catch {
    throw new IniReadError(path, `unknown encoding: ${label}`, 'EENCODING');
  }
  // TextDecoder strips a BOM matching its own encoding.
  return decoder.decode(bytes);
};

const readFailed = (path: string, e: unknown): IniReadError => {
  const code =
    e instanceof Error && 'code' in e && typeof e.code === 'string'
      ? e.code
      : undefined;
  if (code === 'ENOENT')
    return new IniReadError(path, `ini file not found: ${path}`, code);
  const reason = e instanceof Error ? e.message : String(e);
  return new IniReadError(path, `reading ini file failed: ${path}: ${reason}`, code);
};

/** Run `fn` over file text; parse errors get the path prepended. */
export const withIniPath = <T>(path: string, fn: () => T): T => {
  try {
    return fn();
  } catch (e) {
    if (isIniParseError(e))
      throw new IniParseError(e.code, e.line, `${path}: ${e.message}`);
    throw e;
  }
};

const parseWithPath = (path: string, text: string): IniMap =>
  withIniPath(path, () => parseIni(text));

/** Read and decode an INI file without parsing it. */
export const readIniText = async (
  path: string,
  options: ReadIniOptions = {},
): Promise<string> => {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (e) {
    throw readFailed(path, e);
  }
  return decodeIniBytes(bytes, options.encoding, path);
};

/**
 * Read and parse an INI file.
 *
 * @returns Parsed map, or undefined when `path` is empty (no ini file given).
 */
export const readIniFile = async (
  path: string,
  options: ReadIniOptions = {},
): Promise<IniMap | undefined> => {
  if (!path) return undefined;
  return parseWithPath(path, await readIniText(path, options));
};

/** Synchronous variant of {@link readIniFile}. */
export const readIniFileSync = (
  path: string,
  options: ReadIniOptions = {},
): IniMap | undefined => {
  if (!path) return undefined;
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (e) {
    throw readFailed(path, e);
  }
  return parseWithPath(path, decodeIniBytes(bytes, options.encoding, path));
};
