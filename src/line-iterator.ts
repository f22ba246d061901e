/**
 * @fileoverview Bidirectional line cursor
 * @description Walks whole lines forwards and backwards from any byte offset.
 * `next()` reads the line at the cursor and moves past it; `prev()` reads the
 * line before the cursor and moves onto its start, so `next()` followed by
 * `prev()` returns the same line twice.
 */

import type { ChunkTreeView } from './chunk-store';

/** Bytes searched per step when looking backwards for a line start */
const BACKWARD_STEP = 4096;

export interface LineText {
  /** Byte offset of the first byte of the line */
  start: number;
  /** Line content, including its newline when it has one */
  text: string;
}

class LineIterator {
  private readonly view: ChunkTreeView;
  private position: number;

  /**
   * Place the cursor at the start of the line containing offset
   */
  constructor(view: ChunkTreeView, offset: number) {
    this.view = view;
    this.position = this._lineStart(Math.min(Math.max(0, offset), view.byteLength()));
  }

  get currentPosition(): number {
    return this.position;
  }

  /**
   * Line at the cursor, or null at the end of the buffer
   */
  next(): LineText | null {
    const start = this.position;
    if (start >= this.view.byteLength()) return null;

    const end = this._lineEnd(start);
    this.position = end;
    return { start, text: this.view.slice(start, end).toString('utf8') };
  }

  /**
   * Line before the cursor, or null at the start of the buffer
   */
  prev(): LineText | null {
    if (this.position === 0) return null;

    const start = this._lineStart(this.position - 1);
    const end = this._lineEnd(start);
    this.position = start;
    return { start, text: this.view.slice(start, end).toString('utf8') };
  }

  private _lineStart(offset: number): number {
    let pos = offset;
    while (pos > 0) {
      const step = Math.min(pos, BACKWARD_STEP);
      const newline = this.view.findNewlineBackward(pos, step);
      if (newline !== -1) return newline + 1;
      pos -= step;
    }
    return 0;
  }

  private _lineEnd(start: number): number {
    const length = this.view.byteLength();
    const newline = this.view.findNewline(start, length - start);
    return newline === -1 ? length : newline + 1;
  }
}

export { LineIterator };
