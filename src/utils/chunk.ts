/**
 * Immutable run of buffer bytes with lazily counted newlines
 */

import { LF, countNewlines, isContinuationByte } from './encoding';

/**
 * A leaf of the chunk store. Content is never changed after construction,
 * so the newline count can be memoized on first request.
 */
class Chunk {
  public readonly data: Buffer;
  private _newlineCount: number | null;

  constructor(data: Buffer, newlineCount: number | null = null) {
    this.data = data;
    this._newlineCount = newlineCount;
  }

  static readonly EMPTY: Chunk = new Chunk(Buffer.alloc(0), 0);

  get length(): number {
    return this.data.length;
  }

  /**
   * Newline count, scanning the bytes on first access
   */
  get newlineCount(): number {
    if (this._newlineCount === null) {
      this._newlineCount = countNewlines(this.data);
    }
    return this._newlineCount;
  }

  get isCounted(): boolean {
    return this._newlineCount !== null;
  }

  /**
   * Byte offset just past the n-th newline (1-based) in this chunk, or -1
   */
  offsetAfterNewline(n: number): number {
    let pos = -1;
    for (let i = 0; i < n; i++) {
      pos = this.data.indexOf(LF, pos + 1);
      if (pos === -1) return -1;
    }
    return pos + 1;
  }

  /**
   * Split into two chunks at a local offset
   */
  splitAt(offset: number): [Chunk, Chunk] {
    return [new Chunk(this.data.subarray(0, offset)), new Chunk(this.data.subarray(offset))];
  }

  /**
   * Copy of this chunk without [start, end)
   */
  without(start: number, end: number): Chunk {
    if (start === 0) return new Chunk(this.data.subarray(end));
    if (end === this.length) return new Chunk(this.data.subarray(0, start));
    return new Chunk(Buffer.concat([this.data.subarray(0, start), this.data.subarray(end)]));
  }

  /**
   * Concatenate two chunks into a fresh one
   */
  static join(first: Chunk, second: Chunk): Chunk {
    const newlines = first.isCounted && second.isCounted
      ? first.newlineCount + second.newlineCount
      : null;
    return new Chunk(Buffer.concat([first.data, second.data]), newlines);
  }
}

/**
 * Split bytes into chunks near the target size, breaking after a newline
 * when one is close to the boundary and never inside a UTF-8 character.
 * The input is copied so callers may reuse their buffer.
 */
function bytesToChunks(bytes: Buffer, targetSize: number, copy: boolean = true): Chunk[] {
  if (bytes.length === 0) return [];
  const data = copy ? Buffer.from(bytes) : bytes;
  if (data.length <= targetSize) return [new Chunk(data)];

  const chunks: Chunk[] = [];
  const minBreak = Math.floor(targetSize / 2);
  let pos = 0;
  while (pos < data.length) {
    let end = Math.min(pos + targetSize, data.length);
    if (end < data.length) {
      const newlinePos = data.lastIndexOf(LF, end - 1);
      if (newlinePos >= pos + minBreak) {
        end = newlinePos + 1;
      } else {
        while (end > pos + 1 && isContinuationByte(data[end])) end--;
      }
    }
    chunks.push(new Chunk(data.subarray(pos, end)));
    pos = end;
  }
  return chunks;
}

export { Chunk, bytesToChunks };
