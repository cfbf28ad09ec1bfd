/* src/ini/accumulate.ts
 * Continuation accumulator: holds one in-progress entry across physical lines
 * until a line is not continued, or a blank line or the end of the document
 * flushes it.
 */
import { unquote } from './quote';
import type {
  ContinuationScan,
  EntryScan,
  IniEntry,
  QuoteState,
} from './types';

type AccumulatorState =
  | { kind: 'idle' }
  | {
      kind: 'accumulating';
      section: string;
      key: string;
      value: string;
      quote: QuoteState;
      line: number;
    };

/** Completed entry plus the quote state its last line ended in. */
export type Completed = { entry: IniEntry; quote: QuoteState };

/**
 * Join a continuation fragment. Inside an open quote the text is kept
 * verbatim; outside, non-empty pieces are separated by a single space.
 */
const join = (partial: string, fragment: string, quoted: boolean): string => {
  if (quoted) return partial + fragment;
  if (!partial) return fragment;
  if (!fragment) return partial;
  return `${partial} ${fragment}`;
};

export class Accumulator {
  private state: AccumulatorState = { kind: 'idle' };

  constructor(private readonly emit: (done: Completed) => void) {}

  /** Quote state of the pending entry; undefined when idle. */
  get pending(): QuoteState | undefined {
    return this.state.kind === 'accumulating' ? this.state.quote : undefined;
  }

  /** Idle + new key: emit at once, or start accumulating when continued. */
  start(section: string, scan: EntryScan, line: number): void {
    this.state = {
      kind: 'accumulating',
      section,
      key: scan.key,
      value: scan.fragment,
      quote: scan.quote,
      line,
    };
    if (!scan.continued) this.complete();
  }

  /** Accumulating + continuation line: append, and complete unless still continued. */
  append(scan: ContinuationScan): void {
    if (this.state.kind !== 'accumulating') return;
    this.state = {
      ...this.state,
      value: join(this.state.value, scan.fragment, this.state.quote !== 'normal'),
      quote: scan.quote,
    };
    if (!scan.continued) this.complete();
  }

  /**
   * Boundary (blank line, end of document): emit whatever has been
   * accumulated. Returns false when nothing was pending.
   */
  flush(): boolean {
    if (this.state.kind !== 'accumulating') return false;
    this.complete();
    return true;
  }

  private complete(): void {
    if (this.state.kind !== 'accumulating') return;
    const { section, key, value, quote, line } = this.state;
    this.state = { kind: 'idle' };
    this.emit({
      entry: { section, key, value: unquote(value), line },
      quote,
    });
  }
}
