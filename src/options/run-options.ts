/* src/options/run-options.ts
 * Run options: ini-file values overlaid by command-line overrides, plus
 * defaults, with typed accessors. The parser core never merges; this layer does.
 */
import { z } from 'zod';

import type { IniMap } from '@/ini/types';
import { DBG_SCOPE_OPTIONS_OVERRIDE } from '@/util/debug-scopes';
import { debugLog } from '@/util/debug';

/** `section.key=value` as given on the command line. */
export const overrideSchema = z.string().transform((s, ctx) => {
  const eq = s.indexOf('=');
  const key = eq < 0 ? '' : s.slice(0, eq).trim();
  if (!key) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: eq < 0 ? 'expected section.key=value' : 'empty key',
    });
    return z.NEVER;
  }
  return { key, value: s.slice(eq + 1) };
});

export type Override = z.infer<typeof overrideSchema>;

// Anything else (0, f, false, garbage) reads as false.
const TRUE_WORDS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);

const hasOwn = (o: object, k: string): boolean =>
  Object.prototype.hasOwnProperty.call(o, k);

const intSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.number().safe());

const floatSchema = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number)
  .pipe(z.number().finite());

export type Lookup = {
  value: string;
  /** Defined by the ini file or the command line. */
  isExist: boolean;
  /** Not defined, but a non-empty default exists. */
  isDefault: boolean;
};

export class RunOptions {
  constructor(
    readonly keyValue: Readonly<Record<string, string>>,
    readonly defaultKeyValue: Readonly<Record<string, string>> = {},
  ) {}

  has(key: string): boolean {
    return hasOwn(this.keyValue, key);
  }

  lookup(key: string): Lookup {
    const v = hasOwn(this.keyValue, key) ? this.keyValue[key] : undefined;
    if (v !== undefined) return { value: v, isExist: true, isDefault: false };
    const d = hasOwn(this.defaultKeyValue, key)
      ? this.defaultKeyValue[key]
      : undefined;
    if (d !== undefined) return { value: d, isExist: false, isDefault: true };
    return { value: '', isExist: false, isDefault: false };
  }

  /** Value, default, or empty string. */
  string(key: string): string {
    return this.lookup(key).value;
  }

  /** True only for an explicitly set boolean word such as `true` or `1`. */
  bool(key: string): boolean {
    const { value, isExist } = this.lookup(key);
    return isExist && TRUE_WORDS.has(value);
  }

  int(key: string, fallback: number): number {
    return this.numeric(key, intSchema, fallback);
  }

  float(key: string, fallback: number): number {
    return this.numeric(key, floatSchema, fallback);
  }

  private numeric(
    key: string,
    schema: z.ZodType<number, z.ZodTypeDef, string>,
    fallback: number,
  ): number {
    const { value, isExist } = this.lookup(key);
    if (!isExist || !value) return fallback;
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : fallback;
  }
}

/**
 * Build run options: ini values first, then command-line overrides
 * (command line wins), and non-empty defaults kept apart.
 *
 * @throws ZodError when an override is not `section.key=value`.
 */
export const mergeRunOptions = (args: {
  ini?: IniMap;
  overrides?: readonly string[];
  defaults?: Readonly<Record<string, string>>;
}): RunOptions => {
  const keyValue: Record<string, string> = { ...(args.ini ?? {}) };
  for (const raw of args.overrides ?? []) {
    const { key, value } = overrideSchema.parse(raw);
    if (hasOwn(keyValue, key) && keyValue[key] !== value)
      debugLog(DBG_SCOPE_OPTIONS_OVERRIDE, key);
    keyValue[key] = value;
  }
  const defaults: Record<string, string> = {};
  for (const [k, v] of Object.entries(args.defaults ?? {}))
    if (v !== '') defaults[k] = v;
  return new RunOptions(keyValue, defaults);
};
