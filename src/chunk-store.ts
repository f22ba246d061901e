/**
 * @fileoverview Persistent chunk tree holding the bytes of one buffer
 * @description Chunks are immutable leaves of a B-tree whose branches aggregate
 * byte length and (lazily) newline count. Edits rebuild only the path from the
 * touched leaves to the root; every other subtree is shared with the previous
 * version, so snapshots cost nothing and stay readable while editing goes on.
 */

import { Chunk, bytesToChunks } from './utils/chunk';
import { LF, isContinuationByte, sequenceLength } from './utils/encoding';
import { BufferError, BufferErrorKind } from './utils/errors';
import { logger } from './utils/logger';
import { type ChunkStoreStats, type LineSource } from './types/common';

export type Version = number;

/**
 * Leaf node wrapping one chunk
 */
class ChunkLeaf {
  public readonly kind = 'leaf' as const;
  public readonly height: number = 0;
  public readonly chunk: Chunk;

  constructor(chunk: Chunk) {
    this.chunk = chunk;
  }

  get length(): number {
    return this.chunk.length;
  }

  get newlineCount(): number {
    return this.chunk.newlineCount;
  }

  get isCounted(): boolean {
    return this.chunk.isCounted;
  }
}

/**
 * Internal node aggregating the length and newline count of its children
 */
class ChunkBranch {
  public readonly kind = 'branch' as const;
  public readonly height: number;
  public readonly length: number;
  public readonly children: readonly ChunkNode[];
  private _newlineCount: number | null = null;

  constructor(children: readonly ChunkNode[], height: number) {
    this.children = children;
    this.height = height;
    let length = 0;
    for (const child of children) {
      length += child.length;
    }
    this.length = length;
  }

  /**
   * Newline count of the subtree, memoized on first request
   */
  get newlineCount(): number {
    if (this._newlineCount === null) {
      let count = 0;
      for (const child of this.children) {
        count += child.newlineCount;
      }
      this._newlineCount = count;
    }
    return this._newlineCount;
  }

  get isCounted(): boolean {
    return this._newlineCount !== null;
  }
}

type ChunkNode = ChunkLeaf | ChunkBranch;

/**
 * Result of translating a global offset into chunk coordinates
 */
export interface ChunkLocation {
  chunk: Chunk;
  chunkStart: number;
  localOffset: number;
}

type ChunkVisitor = (chunk: Chunk, chunkStart: number) => boolean | void;

// =================== READ-ONLY VIEW ===================

/**
 * Read operations over one immutable root
 */
class ChunkTreeView implements LineSource {
  protected _root: ChunkNode;

  constructor(root: ChunkNode) {
    this._root = root;
  }

  /**
   * Hook for views that can become unreadable
   */
  protected _checkReadable(): void {}

  byteLength(): number {
    this._checkReadable();
    return this._root.length;
  }

  /**
   * Total line count (newlines + 1). Counts unscanned chunks on first use.
   */
  lineCount(): number {
    this._checkReadable();
    return this._root.newlineCount + 1;
  }

  /**
   * Whether lineCount() can answer from memoized aggregates
   */
  isLineCountKnown(): boolean {
    return this._root.isCounted;
  }

  get height(): number {
    return this._root.height;
  }

  /**
   * Translate a global offset into a chunk and local offset.
   * The end of the buffer maps to the end of the last chunk.
   */
  offsetToChunk(offset: number): ChunkLocation {
    this._checkReadable();
    this._checkOffset('Offset', offset);

    let node: ChunkNode = this._root;
    let base = 0;
    while (node.kind === 'branch') {
      const children: readonly ChunkNode[] = node.children;
      let index = 0;
      for (; index < children.length - 1; index++) {
        const childLength = children[index].length;
        if (offset < base + childLength) break;
        base += childLength;
      }
      node = children[index];
    }

    return { chunk: node.chunk, chunkStart: base, localOffset: offset - base };
  }

  byteAt(offset: number): number {
    if (offset < 0 || offset >= this.byteLength()) {
      throw BufferError.outOfBounds('Offset', offset, this.byteLength());
    }
    const { chunk, localOffset } = this.offsetToChunk(offset);
    return chunk.data[localOffset];
  }

  /**
   * Copy of the bytes in [start, end)
   */
  slice(start: number, end: number): Buffer {
    this._checkReadable();
    this._checkRange(start, end);
    if (start === end) return Buffer.alloc(0);

    const parts: Buffer[] = [];
    this._visitRange(start, end, (chunk, chunkStart) => {
      const localStart = Math.max(start - chunkStart, 0);
      const localEnd = Math.min(end - chunkStart, chunk.length);
      parts.push(chunk.data.subarray(localStart, localEnd));
    });
    return Buffer.concat(parts, end - start);
  }

  /**
   * Full content. O(n), meant for tests and saving.
   */
  toBuffer(): Buffer {
    return this.slice(0, this.byteLength());
  }

  /**
   * Visit the chunks overlapping [start, end) in order
   */
  forEachChunk(start: number, end: number, visitor: ChunkVisitor): void {
    this._checkReadable();
    this._checkRange(start, end);
    if (start < end) this._visitRange(start, end, visitor);
  }

  // =================== LINE ACCESS ===================

  /**
   * Line number (0-based) containing offset
   */
  offsetToLine(offset: number): number {
    this._checkReadable();
    this._checkOffset('Offset', offset);

    let line = 0;
    let node: ChunkNode = this._root;
    let base = 0;
    while (node.kind === 'branch') {
      const children: readonly ChunkNode[] = node.children;
      let index = 0;
      for (; index < children.length - 1; index++) {
        const child = children[index];
        if (offset < base + child.length) break;
        base += child.length;
        line += child.newlineCount;
      }
      node = children[index];
    }

    return line + this._countInChunk(node.chunk, 0, offset - base);
  }

  /**
   * Start offset of a line (0-based), or -1 past the last line
   */
  lineToOffset(line: number): number {
    this._checkReadable();
    if (line < 0) return -1;
    if (line === 0) return 0;
    if (line > this._root.newlineCount) return -1;

    let remaining = line;
    let node: ChunkNode = this._root;
    let base = 0;
    while (node.kind === 'branch') {
      const children: readonly ChunkNode[] = node.children;
      let index = 0;
      for (; index < children.length - 1; index++) {
        const child = children[index];
        if (child.newlineCount >= remaining) break;
        remaining -= child.newlineCount;
        base += child.length;
      }
      node = children[index];
    }

    const local = node.chunk.offsetAfterNewline(remaining);
    return local === -1 ? -1 : base + local;
  }

  findNewline(from: number, limit: number): number {
    this._checkReadable();
    const end = Math.min(from + limit, this._root.length);
    if (from < 0 || from >= end) return -1;

    let found = -1;
    this._visitRange(from, end, (chunk, chunkStart) => {
      const localStart = Math.max(from - chunkStart, 0);
      const localEnd = Math.min(end - chunkStart, chunk.length);
      const index = chunk.data.subarray(localStart, localEnd).indexOf(LF);
      if (index !== -1) {
        found = chunkStart + localStart + index;
        return false;
      }
      return true;
    });
    return found;
  }

  findNewlineBackward(before: number, limit: number): number {
    this._checkReadable();
    const end = Math.min(before, this._root.length);
    const start = Math.max(0, end - limit);
    if (start >= end) return -1;

    let found = -1;
    this._visitRangeReverse(start, end, (chunk, chunkStart) => {
      const localStart = Math.max(start - chunkStart, 0);
      const localEnd = Math.min(end - chunkStart, chunk.length);
      const index = chunk.data.subarray(localStart, localEnd).lastIndexOf(LF);
      if (index !== -1) {
        found = chunkStart + localStart + index;
        return false;
      }
      return true;
    });
    return found;
  }

  /**
   * Newlines in [start, end), using memoized aggregates for covered subtrees
   */
  countNewlines(start: number, end: number): number {
    this._checkReadable();
    this._checkRange(start, end);
    if (start === end) return 0;
    return this._countNode(this._root, 0, start, end);
  }

  /**
   * First occurrence of pattern in [from, end), matching across chunk boundaries
   */
  indexOf(pattern: Buffer, from: number = 0, end: number = this.byteLength()): number {
    this._checkReadable();
    this._checkRange(from, end);
    if (pattern.length === 0 || end - from < pattern.length) return -1;

    let found = -1;
    let carry: Buffer = Buffer.alloc(0);
    this._visitRange(from, end, (chunk, chunkStart) => {
      const localStart = Math.max(from - chunkStart, 0);
      const localEnd = Math.min(end - chunkStart, chunk.length);
      const piece = chunk.data.subarray(localStart, localEnd);
      const window = carry.length > 0 ? Buffer.concat([carry, piece]) : piece;
      const windowStart = chunkStart + localStart - carry.length;

      const index = window.indexOf(pattern);
      if (index !== -1) {
        found = windowStart + index;
        return false;
      }

      const keep = Math.min(pattern.length - 1, window.length);
      carry = Buffer.from(window.subarray(window.length - keep));
      return true;
    });
    return found;
  }

  // =================== INTERNALS ===================

  protected _checkOffset(what: string, offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this._root.length) {
      throw BufferError.outOfBounds(what, offset, this._root.length);
    }
  }

  protected _checkRange(start: number, end: number): void {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > this._root.length) {
      throw BufferError.invalidRange(start, end, this._root.length);
    }
  }

  private _countInChunk(chunk: Chunk, start: number, end: number): number {
    if (start === 0 && end === chunk.length) return chunk.newlineCount;
    const data = chunk.data.subarray(start, end);
    let count = 0;
    let pos = data.indexOf(LF);
    while (pos !== -1) {
      count++;
      pos = data.indexOf(LF, pos + 1);
    }
    return count;
  }

  private _countNode(node: ChunkNode, base: number, start: number, end: number): number {
    if (start <= base && base + node.length <= end) {
      return node.newlineCount;
    }
    if (node.kind === 'leaf') {
      return this._countInChunk(node.chunk, Math.max(start - base, 0), Math.min(end - base, node.length));
    }

    let count = 0;
    let childBase = base;
    for (const child of node.children) {
      if (childBase >= end) break;
      const childEnd = childBase + child.length;
      if (childEnd > start) {
        count += this._countNode(child, childBase, start, end);
      }
      childBase = childEnd;
    }
    return count;
  }

  private _visitRange(start: number, end: number, visitor: ChunkVisitor): void {
    const visit = (node: ChunkNode, base: number): boolean => {
      if (node.kind === 'leaf') {
        return visitor(node.chunk, base) !== false;
      }
      let childBase = base;
      for (const child of node.children) {
        if (childBase >= end) break;
        const childEnd = childBase + child.length;
        if (childEnd > start && !visit(child, childBase)) return false;
        childBase = childEnd;
      }
      return true;
    };
    visit(this._root, 0);
  }

  private _visitRangeReverse(start: number, end: number, visitor: ChunkVisitor): void {
    const visit = (node: ChunkNode, base: number): boolean => {
      if (node.kind === 'leaf') {
        return visitor(node.chunk, base) !== false;
      }
      let childEnd = base + node.length;
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        const childBase = childEnd - child.length;
        if (childEnd <= start) break;
        if (childBase < end && !visit(child, childBase)) return false;
        childEnd = childBase;
      }
      return true;
    };
    visit(this._root, 0);
  }
}

// =================== SNAPSHOTS ===================

/**
 * Reference-counted handle on one version of the store
 */
class ChunkStoreSnapshot extends ChunkTreeView {
  public readonly version: Version;
  private refCount: number = 1;
  private readonly onRelease: () => void;

  constructor(root: ChunkNode, version: Version, onRelease: () => void) {
    super(root);
    this.version = version;
    this.onRelease = onRelease;
  }

  get isReleased(): boolean {
    return this.refCount <= 0;
  }

  retain(): this {
    this._checkReadable();
    this.refCount++;
    return this;
  }

  release(): void {
    if (this.refCount <= 0) return;
    this.refCount--;
    if (this.refCount === 0) {
      this.onRelease();
    }
  }

  protected _checkReadable(): void {
    if (this.refCount <= 0) {
      throw new BufferError(
        BufferErrorKind.RELEASED_SNAPSHOT,
        `Snapshot of version ${this.version} has been released`,
        { version: this.version }
      );
    }
  }
}

// =================== STORE ===================

export interface ChunkStoreOptions {
  chunkSize: number;
  branchFactor: number;
}

/**
 * Mutable handle on the latest version of a buffer's bytes
 */
class ChunkStore extends ChunkTreeView {
  private readonly chunkSize: number;
  private readonly branchFactor: number;
  private _version: Version = 0;
  private liveSnapshots: number = 0;

  constructor(options: ChunkStoreOptions) {
    super(new ChunkLeaf(Chunk.EMPTY));
    this.chunkSize = options.chunkSize;
    this.branchFactor = options.branchFactor;
  }

  /**
   * Build a store over bytes. With copy=false the store takes ownership of
   * the buffer and must be its only writer.
   */
  static fromBytes(bytes: Buffer, options: ChunkStoreOptions, copy: boolean = true): ChunkStore {
    const store = new ChunkStore(options);
    const leaves = bytesToChunks(bytes, options.chunkSize, copy).map(chunk => new ChunkLeaf(chunk));
    if (leaves.length > 0) {
      store._root = store._buildUp(leaves);
    }
    logger.debug(`[DEBUG] ChunkStore.fromBytes: ${bytes.length} bytes, ${leaves.length} chunks, height ${store.height}`);
    return store;
  }

  get version(): Version {
    return this._version;
  }

  /**
   * Insert bytes at offset; returns the new version
   */
  insert(offset: number, bytes: Buffer): Version {
    this._checkOffset('Insert offset', offset);
    if (this._insideCharacter(offset)) {
      throw BufferError.invalidBoundary(offset);
    }
    if (bytes.length === 0) return this._version;

    const leaves = bytesToChunks(bytes, this.chunkSize).map(chunk => new ChunkLeaf(chunk));
    const nodes = this._insertInto(this._root, offset, leaves);
    this._root = this._buildUp(nodes);
    this._version++;

    logger.debug(`[DEBUG] ChunkStore.insert: offset=${offset}, len=${bytes.length}, version=${this._version}`);
    return this._version;
  }

  /**
   * Delete [start, end); an empty range is a no-op returning the current version
   */
  delete(start: number, end: number): Version {
    this._checkRange(start, end);
    if (start === end) return this._version;

    const result = this._deleteFrom(this._root, start, end);
    let root: ChunkNode = result ?? new ChunkLeaf(Chunk.EMPTY);
    while (root.kind === 'branch' && root.children.length === 1) {
      root = root.children[0];
    }
    this._root = root;
    this._version++;

    logger.debug(`[DEBUG] ChunkStore.delete: [${start}, ${end}), version=${this._version}`);
    return this._version;
  }

  /**
   * O(1) handle on the current version; release it when done
   */
  snapshot(): ChunkStoreSnapshot {
    this.liveSnapshots++;
    return new ChunkStoreSnapshot(this._root, this._version, () => {
      this.liveSnapshots--;
    });
  }

  getStats(): ChunkStoreStats {
    let chunkCount = 0;
    const count = (node: ChunkNode): void => {
      if (node.kind === 'leaf') {
        if (node.length > 0) chunkCount++;
        return;
      }
      for (const child of node.children) count(child);
    };
    count(this._root);

    return {
      version: this._version,
      byteLength: this._root.length,
      chunkCount,
      height: this._root.height,
      liveSnapshots: this.liveSnapshots
    };
  }

  /**
   * Check tree consistency (for debugging)
   */
  validate(): void {
    const leafDepth = this._root.height;
    const check = (node: ChunkNode, depth: number): number => {
      if (node.kind === 'leaf') {
        if (depth !== leafDepth) {
          throw BufferError.invariantViolation(`leaf at depth ${depth}, expected ${leafDepth}`);
        }
        if (node.length === 0 && node !== this._root) {
          throw BufferError.invariantViolation('empty chunk below the root');
        }
        return node.length;
      }
      if (node.children.length === 0 || node.children.length > this.branchFactor) {
        throw BufferError.invariantViolation(`branch with ${node.children.length} children`);
      }
      let total = 0;
      for (const child of node.children) {
        if (child.height !== node.height - 1) {
          throw BufferError.invariantViolation(`child height ${child.height} under branch height ${node.height}`);
        }
        total += check(child, depth + 1);
      }
      if (total !== node.length) {
        throw BufferError.invariantViolation(`branch length ${node.length}, children sum ${total}`);
      }
      return total;
    };
    check(this._root, 0);
  }

  // =================== TREE EDITING ===================

  /**
   * True when a lead byte in the three bytes before offset starts a sequence
   * that runs past it
   */
  private _insideCharacter(offset: number): boolean {
    if (offset >= this._root.length || !isContinuationByte(this.byteAt(offset))) return false;
    for (let lead = offset - 1; lead >= Math.max(0, offset - 3); lead--) {
      const byte = this.byteAt(lead);
      if (!isContinuationByte(byte)) return lead + sequenceLength(byte) > offset;
    }
    return false;
  }

  /**
   * Insert leaves at a relative offset; returns replacement nodes of the same height
   */
  private _insertInto(node: ChunkNode, offset: number, leaves: ChunkLeaf[]): ChunkNode[] {
    if (node.kind === 'leaf') {
      let items: ChunkLeaf[];
      if (node.length === 0) {
        items = leaves;
      } else if (offset === 0) {
        items = [...leaves, node];
      } else if (offset === node.length) {
        items = [node, ...leaves];
      } else {
        const [left, right] = node.chunk.splitAt(offset);
        items = [new ChunkLeaf(left), ...leaves, new ChunkLeaf(right)];
      }
      return this._coalesceLeaves(items);
    }

    const children = node.children;
    let index = 0;
    let base = 0;
    for (; index < children.length - 1; index++) {
      const childLength = children[index].length;
      if (offset <= base + childLength) break;
      base += childLength;
    }

    const replaced = this._insertInto(children[index], offset - base, leaves);
    const updated = [...children.slice(0, index), ...replaced, ...children.slice(index + 1)];
    return this._groupChildren(updated, node.height);
  }

  /**
   * Delete a relative range; returns a node of the same height or null when emptied
   */
  private _deleteFrom(node: ChunkNode, start: number, end: number): ChunkNode | null {
    if (node.kind === 'leaf') {
      const localStart = Math.max(start, 0);
      const localEnd = Math.min(end, node.length);
      if (localStart === 0 && localEnd === node.length) return null;
      return new ChunkLeaf(node.chunk.without(localStart, localEnd));
    }

    const kept: ChunkNode[] = [];
    let base = 0;
    for (const child of node.children) {
      const childEnd = base + child.length;
      if (childEnd <= start || base >= end) {
        kept.push(child);
      } else {
        const result = this._deleteFrom(child, start - base, end - base);
        if (result) kept.push(result);
      }
      base = childEnd;
    }

    if (kept.length === 0) return null;
    return new ChunkBranch(this._mergeUndersized(kept), node.height);
  }

  /**
   * Merge adjacent leaves whose combined size fits one chunk
   */
  private _coalesceLeaves(items: ChunkLeaf[]): ChunkLeaf[] {
    const merged: ChunkLeaf[] = [];
    for (const item of items) {
      const last = merged[merged.length - 1];
      if (last && last.length + item.length <= this.chunkSize) {
        merged[merged.length - 1] = new ChunkLeaf(Chunk.join(last.chunk, item.chunk));
      } else {
        merged.push(item);
      }
    }
    return merged;
  }

  /**
   * Opportunistically merge undersized siblings left by a deletion
   */
  private _mergeUndersized(children: ChunkNode[]): ChunkNode[] {
    if (children.every(child => child.kind === 'leaf')) {
      return this._coalesceLeaves(children.filter((child): child is ChunkLeaf => child.kind === 'leaf'));
    }

    const minChildren = Math.floor(this.branchFactor / 2);
    const merged: ChunkNode[] = [];
    for (const child of children) {
      const last = merged[merged.length - 1];
      if (
        last && last.kind === 'branch' && child.kind === 'branch' &&
        (last.children.length < minChildren || child.children.length < minChildren) &&
        last.children.length + child.children.length <= this.branchFactor
      ) {
        merged[merged.length - 1] = new ChunkBranch([...last.children, ...child.children], last.height);
      } else {
        merged.push(child);
      }
    }
    return merged;
  }

  /**
   * Wrap children into one or more branches of at most branchFactor children
   */
  private _groupChildren(children: ChunkNode[], height: number): ChunkBranch[] {
    if (children.length <= this.branchFactor) {
      return [new ChunkBranch(children, height)];
    }

    const groupCount = Math.ceil(children.length / this.branchFactor);
    const groups: ChunkBranch[] = [];
    let start = 0;
    for (let i = 0; i < groupCount; i++) {
      const size = Math.ceil((children.length - start) / (groupCount - i));
      groups.push(new ChunkBranch(children.slice(start, start + size), height));
      start += size;
    }
    return groups;
  }

  /**
   * Stack levels of branches over sibling nodes until one root remains
   */
  private _buildUp(nodes: ChunkNode[]): ChunkNode {
    let level = nodes;
    while (level.length > 1) {
      level = this._groupChildren(level, level[0].height + 1);
    }
    return level[0];
  }
}

export { ChunkStore, ChunkStoreSnapshot, ChunkTreeView };
