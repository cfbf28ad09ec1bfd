import { ZodError } from 'zod';
import { describe, expect, it } from 'vitest';

import { mergeRunOptions, RunOptions } from './run-options';

describe('mergeRunOptions', () => {
  it('overlays command-line overrides on ini values', () => {
    const opts = mergeRunOptions({
      ini: { 'a.k': '1', 'a.b': 'x' },
      overrides: ['a.k=2', 'new.key=v=w', 'a.empty='],
    });
    expect(opts.keyValue).toEqual({
      'a.k': '2',
      'a.b': 'x',
      'new.key': 'v=w',
      'a.empty': '',
    });
  });

  it('rejects malformed overrides', () => {
    expect(() => mergeRunOptions({ overrides: ['nokey'] })).toThrow(ZodError);
    expect(() => mergeRunOptions({ overrides: [' =v'] })).toThrow(ZodError);
  });

  it('keeps only non-empty defaults, apart from values', () => {
    const opts = mergeRunOptions({
      ini: { 'a.k': '1' },
      defaults: { 'a.d': '5', 'a.e': '' },
    });
    expect(opts.lookup('a.k')).toEqual({
      value: '1',
      isExist: true,
      isDefault: false,
    });
    expect(opts.lookup('a.d')).toEqual({
      value: '5',
      isExist: false,
      isDefault: true,
    });
    expect(opts.lookup('a.e')).toEqual({
      value: '',
      isExist: false,
      isDefault: false,
    });
    expect(opts.string('a.d')).toBe('5');
    expect(opts.has('a.d')).toBe(false);
  });
});

describe('RunOptions accessors', () => {
  const opts = new RunOptions(
    {
      yes: 'true',
      one: '1',
      cap: 'T',
      no: 'no',
      n: '42',
      padded: ' 7 ',
      frac: '1.5',
      exp: '2e3',
      dot: '.5',
      word: 'abc',
      blank: '',
    },
    { dflt: 'true', dnum: '9' },
  );

  it('reads booleans only from set values', () => {
    expect(opts.bool('yes')).toBe(true);
    expect(opts.bool('one')).toBe(true);
    expect(opts.bool('cap')).toBe(true);
    expect(opts.bool('no')).toBe(false);
    expect(opts.bool('blank')).toBe(false);
    expect(opts.bool('missing')).toBe(false);
    expect(opts.bool('dflt')).toBe(false);
  });

  it('reads integers with a fallback', () => {
    expect(opts.int('n', 0)).toBe(42);
    expect(opts.int('padded', 0)).toBe(7);
    expect(opts.int('frac', -1)).toBe(-1);
    expect(opts.int('word', -1)).toBe(-1);
    expect(opts.int('blank', -1)).toBe(-1);
    expect(opts.int('dnum', -1)).toBe(-1);
  });

  it('reads floats with a fallback', () => {
    expect(opts.float('frac', 0)).toBe(1.5);
    expect(opts.float('exp', 0)).toBe(2000);
    expect(opts.float('dot', 0)).toBe(0.5);
    expect(opts.float('n', 0)).toBe(42);
    expect(opts.float('word', -1)).toBe(-1);
  });

  it('ignores inherited object properties', () => {
    expect(opts.has('constructor')).toBe(false);
    expect(opts.lookup('toString').isExist).toBe(false);
  });
});
