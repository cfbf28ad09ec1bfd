/* src/ini/lines.ts
 * Physical line splitter: CR, LF and CRLF all end a line; CRLF counts once.
 */
import type { PhysicalLine } from './types';

/**
 * Split a document into physical lines, lazily.
 *
 * The returned iterable is restartable: every `for…of` walks the document
 * from the start. A trailing line ending does not produce an extra empty
 * line, and an empty document yields nothing.
 */
export const splitLines = (text: string): Iterable<PhysicalLine> => ({
  *[Symbol.iterator]() {
    let start = 0;
    let number = 0;
    while (start < text.length) {
      let end = start;
      while (end < text.length && text[end] !== '\r' && text[end] !== '\n')
        end++;
      number++;
      yield { number, text: text.slice(start, end) };
      if (end >= text.length) return;
      start = text[end] === '\r' && text[end + 1] === '\n' ? end + 2 : end + 1;
    }
  },
});
