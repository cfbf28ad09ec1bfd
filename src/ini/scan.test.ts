import { describe, expect, it } from 'vitest';

import { IniParseError } from './errors';
import { scanContinuation, scanEntryLine } from './scan';

const codeOf = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (e) {
    if (e instanceof IniParseError) return e.code;
    throw e;
  }
  return undefined;
};

describe('scanEntryLine', () => {
  it('splits at the first unquoted = and drops an unquoted comment', () => {
    expect(scanEntryLine('k = hello world ; note', 2)).toEqual({
      key: 'k',
      fragment: 'hello world ',
      continued: false,
      quote: 'normal',
    });
  });

  it('keeps comment characters inside a closed quote', () => {
    expect(scanEntryLine('k = "semi;colon # hash"', 2).fragment).toBe(
      '"semi;colon # hash"',
    );
  });

  it('accepts a quoted key holding = ; and #', () => {
    expect(scanEntryLine(`"a=b;#" = v`, 1).key).toBe('a=b;#');
  });

  it('keeps the rest of the line after an unclosed quote', () => {
    expect(scanEntryLine(`k = " allow ' open ; here`, 1)).toEqual({
      key: 'k',
      fragment: `" allow ' open ; here`,
      continued: false,
      quote: 'double',
    });
  });

  it('marks a trailing backslash as continued and trims before it outside quotes', () => {
    expect(scanEntryLine('k = line1 \\', 1)).toEqual({
      key: 'k',
      fragment: 'line1',
      continued: true,
      quote: 'normal',
    });
  });

  it('keeps blanks before the backslash inside an open quote', () => {
    expect(scanEntryLine('k = "open \\', 1)).toEqual({
      key: 'k',
      fragment: '"open ',
      continued: true,
      quote: 'double',
    });
  });

  it('detects the backslash after the comment is removed', () => {
    expect(scanEntryLine('k = "a" \\ ; note', 1)).toEqual({
      key: 'k',
      fragment: '"a"',
      continued: true,
      quote: 'normal',
    });
  });

  it('treats an inner backslash as content', () => {
    expect(scanEntryLine('dir = C:\\Temp\\x', 1)).toEqual({
      key: 'dir',
      fragment: 'C:\\Temp\\x',
      continued: false,
      quote: 'normal',
    });
  });

  it('returns an empty fragment for an empty value', () => {
    expect(scanEntryLine('k=', 1).fragment).toBe('');
  });

  it('fails without an unquoted =', () => {
    expect(codeOf(() => scanEntryLine('no equals here', 1))).toBe(
      'ExpectedKeyEquals',
    );
    expect(codeOf(() => scanEntryLine('a ; = b', 1))).toBe('ExpectedKeyEquals');
    expect(codeOf(() => scanEntryLine('"a = b', 1))).toBe('ExpectedKeyEquals');
  });

  it('fails on an empty key', () => {
    expect(codeOf(() => scanEntryLine(' = v', 1))).toBe('EmptyKey');
    expect(codeOf(() => scanEntryLine('"" = v', 1))).toBe('EmptyKey');
  });
});

describe('scanContinuation', () => {
  it('trims leading blanks outside quotes', () => {
    expect(scanContinuation('   line2', 'normal')).toEqual({
      fragment: 'line2',
      continued: false,
      quote: 'normal',
    });
  });

  it('keeps text verbatim while the carried quote is open, then honors comments after it closes', () => {
    expect(scanContinuation('  more" ; note', 'double')).toEqual({
      fragment: '  more" ',
      continued: false,
      quote: 'normal',
    });
  });

  it('treats = as value content', () => {
    expect(scanContinuation('b = c', 'normal').fragment).toBe('b = c');
  });
});
