import { describe, expect, it } from 'vitest';

import { splitLines } from './lines';

const texts = (s: string) => [...splitLines(s)].map((l) => l.text);

describe('splitLines', () => {
  it('yields nothing for an empty document', () => {
    expect(texts('')).toEqual([]);
  });

  it('accepts LF, CR and CRLF, counting CRLF as one ending', () => {
    expect([...splitLines('a\r\nb\rc\nd')]).toEqual([
      { number: 1, text: 'a' },
      { number: 2, text: 'b' },
      { number: 3, text: 'c' },
      { number: 4, text: 'd' },
    ]);
  });

  it('does not add a line after a trailing line ending', () => {
    expect(texts('a\r\n')).toEqual(['a']);
    expect(texts('\n\n')).toEqual(['', '']);
  });

  it('keeps leading and trailing blanks (only the ending is removed)', () => {
    expect(texts('  k = v  \n')).toEqual(['  k = v  ']);
  });

  it('is restartable', () => {
    const lines = splitLines('x\ny');
    expect([...lines].map((l) => l.text)).toEqual(['x', 'y']);
    expect([...lines].map((l) => l.text)).toEqual(['x', 'y']);
  });
});
