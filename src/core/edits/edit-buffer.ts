/**
 * Ordered collection of source edits, applied in one pass.
 *
 * Edits always refer to offsets in the original source, never to positions
 * in partially patched text. Overlapping replacements are a caller error;
 * an edit that starts inside an already replaced region is dropped.
 */
import type { Span } from '../ast/types.js';

export type EditMode = 'insert-before' | 'insert-after' | 'replace';

export interface Edit {
  span: Span;
  mode: EditMode;
  text: string;
  /** Ordering among insertions of the same mode at the same offset */
  rank: number;
  /** Insertion order, the final tie-break */
  seq: number;
}

/** Opening brace of a synthetic block */
export const RANK_OPEN = 0;
/** Hoisted statements and other insertions */
export const RANK_DEFAULT = 1;
/** Closing brace of a synthetic block */
export const RANK_CLOSE = 2;

// Text inserted after the preceding offset belongs to the text before it,
// so it is emitted ahead of insertions meant for the text that follows.
const MODE_ORDER: Record<EditMode, number> = {
  'insert-after': 0,
  'insert-before': 1,
  replace: 2,
};

function compareEdits(a: Edit, b: Edit): number {
  return (
    a.span.start - b.span.start ||
    MODE_ORDER[a.mode] - MODE_ORDER[b.mode] ||
    a.rank - b.rank ||
    a.seq - b.seq
  );
}

export class EditBuffer {
  private readonly entries: Edit[] = [];
  private seq = 0;

  /**
   * Insert text at an offset, ahead of the text that starts there.
   */
  insertBefore(offset: number, text: string, rank: number = RANK_DEFAULT): void {
    this.push({ start: offset, end: offset }, 'insert-before', text, rank);
  }

  /**
   * Insert text at an offset, behind the text that ends there.
   */
  insertAfter(offset: number, text: string, rank: number = RANK_DEFAULT): void {
    this.push({ start: offset, end: offset }, 'insert-after', text, rank);
  }

  replace(span: Span, text: string): void {
    this.push({ start: span.start, end: span.end }, 'replace', text, RANK_DEFAULT);
  }

  /**
   * Surround a span with text, outside every other insertion at its edges.
   */
  wrap(span: Span, open: string, close: string): void {
    this.insertBefore(span.start, open, RANK_OPEN);
    this.insertAfter(span.end, close, RANK_CLOSE);
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Snapshot of the edits in application order.
   */
  edits(): Edit[] {
    return [...this.entries].sort(compareEdits);
  }

  /**
   * Produce the patched text of `source`, or of the `range` of it.
   * Only edits lying entirely inside the range take part.
   */
  apply(source: string, range: Span = { start: 0, end: source.length }): string {
    let out = '';
    let cursor = range.start;
    for (const edit of this.edits()) {
      if (edit.span.start < range.start || edit.span.end > range.end) continue;
      if (edit.span.start < cursor) continue;
      out += source.slice(cursor, edit.span.start) + edit.text;
      cursor = edit.mode === 'replace' ? edit.span.end : edit.span.start;
    }
    return out + source.slice(cursor, range.end);
  }

  private push(span: Span, mode: EditMode, text: string, rank: number): void {
    this.entries.push({ span, mode, text, rank, seq: this.seq++ });
  }
}
