/**
 * @fileoverview Interval tree of cursors, overlays and line boundaries
 * @description A treap ordered by start offset. Every node carries a pending
 * byte delta (and a pending line delta for line markers) that applies to the
 * node and its whole subtree; an edit tags O(log n) subtree roots instead of
 * rewriting every marker after the edit point. Deltas are pushed down only
 * when a query or restructuring walks through a node.
 */

import { BufferError } from './utils/errors';
import { logger } from './utils/logger';
import {
  Affinity,
  type ByteRange,
  type LinePayload,
  type MarkerId,
  type MarkerPayload,
  type MarkerTreeStats,
  type PositionPayload,
  type ResolvedMarker
} from './types/common';

/**
 * One marker and its treap bookkeeping. Stored coordinates exclude the
 * pending deltas of this node and of its ancestors.
 */
class MarkerNode {
  public readonly id: MarkerId;
  public readonly priority: number;
  public readonly affinity: Affinity;
  public readonly position: PositionPayload | null;
  public start: number;
  public end: number;
  /** Line number for line markers, -1 for position markers */
  public line: number;

  public pending: number = 0;
  public pendingLines: number = 0;
  public maxEnd: number;
  public minLine: number;
  public maxLine: number;

  public left: MarkerNode | null = null;
  public right: MarkerNode | null = null;
  public parent: MarkerNode | null = null;

  constructor(id: MarkerId, priority: number, start: number, end: number, payload: MarkerPayload, affinity: Affinity) {
    this.id = id;
    this.priority = priority;
    this.start = start;
    this.end = end;
    this.affinity = affinity;
    this.position = payload.kind === 'position' ? { ...payload } : null;
    this.line = payload.kind === 'line' ? payload.line : -1;
    this.maxEnd = end;
    this.minLine = this.isLine ? this.line : Infinity;
    this.maxLine = this.isLine ? this.line : -Infinity;
  }

  get isLine(): boolean {
    return this.position === null;
  }
}

export interface MarkerTreeOptions {
  /** Throw on overlapping line markers instead of logging and skipping */
  strictInvariants?: boolean;
  /** Called with every invariant violation, strict or not */
  onInvariantViolation?: (error: BufferError) => void;
}

/**
 * Whether marker [start, end) overlaps query [a, b). Zero-width markers
 * overlap a range that contains their position; a zero-width query is a
 * point query.
 */
function overlaps(start: number, end: number, a: number, b: number): boolean {
  if (a === b) {
    return (start <= a && a < end) || (start === end && start === a);
  }
  if (start === end) {
    return a <= start && start < b;
  }
  return start < b && end > a;
}

/**
 * Lazy-delta interval tree over one buffer's byte space
 */
class MarkerTree {
  private root: MarkerNode | null = null;
  private readonly nodes: Map<MarkerId, MarkerNode> = new Map();
  private nextId: MarkerId = 1;
  private seed: number = 0x9e3779b9;
  private lineMarkerCount: number = 0;
  private _bufferLength: number;
  private readonly strictInvariants: boolean;
  private readonly onInvariantViolation: ((error: BufferError) => void) | null;

  constructor(bufferLength: number = 0, options: MarkerTreeOptions = {}) {
    this._bufferLength = bufferLength;
    this.strictInvariants = options.strictInvariants ?? true;
    this.onInvariantViolation = options.onInvariantViolation ?? null;
  }

  get bufferLength(): number {
    return this._bufferLength;
  }

  get size(): number {
    return this.nodes.size;
  }

  // =================== MARKER LIFECYCLE ===================

  /**
   * Add a marker. Position markers always succeed; a line marker that would
   * overlap another line marker is an invariant violation and, when
   * invariants are not strict, is skipped and null is returned.
   */
  insertMarker(interval: ByteRange, payload: PositionPayload, affinity?: Affinity): MarkerId;
  insertMarker(interval: ByteRange, payload: LinePayload, affinity?: Affinity): MarkerId | null;
  insertMarker(interval: ByteRange, payload: MarkerPayload, affinity?: Affinity): MarkerId | null;
  insertMarker(interval: ByteRange, payload: MarkerPayload, affinity: Affinity = Affinity.AFTER): MarkerId | null {
    const { start, end } = interval;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start > end) {
      throw BufferError.invalidInterval(start, end);
    }
    if (end > this._bufferLength) {
      throw BufferError.outOfBounds('Marker end', end, this._bufferLength);
    }

    if (payload.kind === 'line') {
      const clash = this._collect(start, end).find(marker =>
        marker.payload.kind === 'line' && overlaps(marker.start, marker.end, start, end)
      );
      if (clash) {
        const violation = BufferError.invariantViolation(
          `line marker [${start}, ${end}) overlaps line marker ${clash.id} [${clash.start}, ${clash.end})`,
          { start, end, existingId: clash.id }
        );
        if (!this._reportViolation(violation)) return null;
      }
    }

    const node = new MarkerNode(this.nextId++, this._nextPriority(), start, end, payload, affinity);
    const [left, right] = this._split(this.root, start);
    this.root = this._merge(this._merge(left, node), right);
    this.nodes.set(node.id, node);
    if (node.isLine) this.lineMarkerCount++;
    return node.id;
  }

  removeMarker(id: MarkerId): boolean {
    const node = this.nodes.get(id);
    if (!node) return false;

    this._pushDownPath(node);
    const replacement = this._merge(node.left, node.right);
    const parent = node.parent;
    if (replacement) replacement.parent = parent;
    if (!parent) {
      this.root = replacement;
    } else if (parent.left === node) {
      parent.left = replacement;
    } else {
      parent.right = replacement;
    }

    for (let ancestor = parent; ancestor; ancestor = ancestor.parent) {
      this._update(ancestor);
    }

    node.left = node.right = node.parent = null;
    this.nodes.delete(id);
    if (node.isLine) this.lineMarkerCount--;
    return true;
  }

  /**
   * Current interval of a marker, applying pending deltas along its path
   */
  resolve(id: MarkerId): ResolvedMarker | null {
    const node = this.nodes.get(id);
    if (!node) return null;

    let delta = 0;
    let lineDelta = 0;
    for (let current: MarkerNode | null = node; current; current = current.parent) {
      delta += current.pending;
      lineDelta += current.pendingLines;
    }
    return this._toResolved(node, delta, lineDelta);
  }

  has(id: MarkerId): boolean {
    return this.nodes.has(id);
  }

  clear(): void {
    this.root = null;
    this.nodes.clear();
    this.lineMarkerCount = 0;
  }

  // =================== EDIT ADJUSTMENT ===================

  /**
   * Shift markers for an edit at offset. A positive lengthDelta inserts that
   * many bytes; a negative one deletes -lengthDelta bytes starting at
   * offset. lineDelta is the change in newline count, applied to line
   * markers after the edit.
   */
  adjustForEdit(offset: number, lengthDelta: number, lineDelta: number = 0): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this._bufferLength) {
      throw BufferError.outOfBounds('Edit offset', offset, this._bufferLength);
    }
    if (lengthDelta < 0 && offset - lengthDelta > this._bufferLength) {
      throw BufferError.invalidRange(offset, offset - lengthDelta, this._bufferLength);
    }

    if (lengthDelta > 0) {
      this._adjustForInsert(offset, lengthDelta, lineDelta);
    } else if (lengthDelta < 0) {
      this._adjustForDelete(offset, offset - lengthDelta, lineDelta);
    } else if (lineDelta !== 0) {
      const [left, right] = this._split(this.root, offset + 1);
      if (right) right.pendingLines += lineDelta;
      this.root = this._merge(left, right);
    }
    this._bufferLength += lengthDelta;
  }

  private _adjustForInsert(offset: number, length: number, lineDelta: number): void {
    const [before, rest] = this._split(this.root, offset);
    const [atOffset, after] = this._split(rest, offset + 1);

    if (after) {
      after.pending += length;
      after.pendingLines += lineDelta;
    }

    const sticking: MarkerNode[] = [];
    const moving: MarkerNode[] = [];
    for (const node of this._drain(atOffset)) {
      if (node.affinity === Affinity.AFTER) {
        node.start += length;
        node.end += length;
        if (node.isLine) node.line += lineDelta;
        moving.push(node);
      } else {
        if (node.end > offset) node.end += length;
        sticking.push(node);
      }
    }

    this._extendEnds(before, offset, length);
    const middle = this._build([...sticking, ...moving]);
    this.root = this._merge(this._merge(before, middle), after);
  }

  private _adjustForDelete(start: number, end: number, lineDelta: number): void {
    const length = end - start;
    const [before, rest] = this._split(this.root, start);
    const [inside, after] = this._split(rest, end);

    if (after) {
      after.pending -= length;
      after.pendingLines += lineDelta;
    }

    const collapsed = this._drain(inside);
    for (const node of collapsed) {
      node.end = node.end >= end ? node.end - length : start;
      node.start = start;
    }
    collapsed.sort((x, y) => x.end - y.end);

    this._clipEnds(before, start, end);
    this.root = this._merge(this._merge(before, this._build(collapsed)), after);
  }

  /**
   * Extend the ends of markers that start before an insertion point and
   * end after it. A marker ending exactly at the point keeps its end.
   */
  private _extendEnds(node: MarkerNode | null, offset: number, length: number): void {
    if (!node) return;
    this._pushDown(node);
    if (node.maxEnd <= offset) return;

    this._extendEnds(node.left, offset, length);
    this._extendEnds(node.right, offset, length);
    if (node.end > offset) {
      node.end += length;
    }
    this._update(node);
  }

  /**
   * Clip the ends of markers that start before a deleted range and reach into it
   */
  private _clipEnds(node: MarkerNode | null, start: number, end: number): void {
    if (!node) return;
    this._pushDown(node);
    if (node.maxEnd <= start) return;

    this._clipEnds(node.left, start, end);
    this._clipEnds(node.right, start, end);
    if (node.end > start) {
      node.end = node.end >= end ? node.end - (end - start) : start;
    }
    this._update(node);
  }

  // =================== QUERIES ===================

  /**
   * Markers overlapping [a, b), sorted by start
   */
  queryRange(a: number, b: number): ResolvedMarker[] {
    if (a > b) throw BufferError.invalidInterval(a, b);
    return this._collect(a, b).filter(marker => overlaps(marker.start, marker.end, a, b));
  }

  /**
   * Markers containing a position, including zero-width markers at it
   */
  queryPoint(offset: number): ResolvedMarker[] {
    return this.queryRange(offset, offset);
  }

  /**
   * Line marker for a line number, or null when that line is not cached
   */
  queryLine(line: number): ResolvedMarker | null {
    let node = this.root;
    while (node) {
      this._pushDown(node);
      const left: MarkerNode | null = node.left;
      if (left && this._lineRangeContains(left, line)) {
        node = left;
        continue;
      }
      if (node.isLine && node.line === line) {
        return this._toResolved(node, 0, 0);
      }
      const right: MarkerNode | null = node.right;
      node = right && this._lineRangeContains(right, line) ? right : null;
    }
    return null;
  }

  /**
   * Line markers overlapping or touching [a, b], sorted by start
   */
  lineMarkersTouching(a: number, b: number): ResolvedMarker[] {
    return this._collect(a, b).filter(marker => marker.payload.kind === 'line');
  }

  /**
   * Remove line markers lying entirely inside [a, b]; returns how many were removed
   */
  invalidateLines(a: number, b: number): number {
    const doomed = this.lineMarkersTouching(a, b).filter(marker => marker.start >= a && marker.end <= b);
    for (const marker of doomed) {
      this.removeMarker(marker.id);
    }
    if (doomed.length > 0) {
      logger.debug(`[DEBUG] invalidateLines: removed ${doomed.length} line markers in [${a}, ${b}]`);
    }
    return doomed.length;
  }

  /**
   * All markers in start order
   */
  getAllMarkers(): ResolvedMarker[] {
    const out: ResolvedMarker[] = [];
    const walk = (node: MarkerNode | null): void => {
      if (!node) return;
      this._pushDown(node);
      walk(node.left);
      out.push(this._toResolved(node, 0, 0));
      walk(node.right);
    };
    walk(this.root);
    return out;
  }

  getStats(): MarkerTreeStats {
    return {
      markerCount: this.nodes.size,
      lineMarkerCount: this.lineMarkerCount,
      positionMarkerCount: this.nodes.size - this.lineMarkerCount
    };
  }

  /**
   * Check ordering, augmentation and parent links (for debugging)
   */
  validate(): void {
    let previousStart = -Infinity;
    let previousLineEnd = -Infinity;
    let count = 0;
    const check = (node: MarkerNode | null, parent: MarkerNode | null): void => {
      if (!node) return;
      if (node.parent !== parent) {
        throw BufferError.invariantViolation(`marker ${node.id} has a stale parent link`, { id: node.id });
      }
      this._pushDown(node);
      check(node.left, node);

      count++;
      if (node.start < previousStart) {
        throw BufferError.invariantViolation(`marker ${node.id} out of start order`, { id: node.id });
      }
      if (node.end > this._bufferLength || node.start > node.end) {
        throw BufferError.invariantViolation(`marker ${node.id} has invalid interval`, { id: node.id });
      }
      if (node.isLine) {
        if (node.start < previousLineEnd && node.start !== node.end) {
          throw BufferError.invariantViolation(`line marker ${node.id} overlaps its predecessor`, { id: node.id });
        }
        previousLineEnd = node.end;
      }
      previousStart = node.start;

      check(node.right, node);
      const expectedMaxEnd = Math.max(node.end, this._subtreeMaxEnd(node.left), this._subtreeMaxEnd(node.right));
      if (node.maxEnd !== expectedMaxEnd) {
        throw BufferError.invariantViolation(`marker ${node.id} has stale max end`, { id: node.id });
      }
    };
    check(this.root, null);

    if (count !== this.nodes.size) {
      throw BufferError.invariantViolation(`tree holds ${count} markers, index holds ${this.nodes.size}`);
    }
  }

  // =================== TREAP INTERNALS ===================

  private _nextPriority(): number {
    // xorshift32
    let x = this.seed;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.seed = x >>> 0;
    return this.seed;
  }

  private _pushDown(node: MarkerNode): void {
    if (node.pending !== 0) {
      const delta = node.pending;
      node.start += delta;
      node.end += delta;
      node.maxEnd += delta;
      if (node.left) node.left.pending += delta;
      if (node.right) node.right.pending += delta;
      node.pending = 0;
    }
    if (node.pendingLines !== 0) {
      const delta = node.pendingLines;
      if (node.isLine) node.line += delta;
      node.minLine += delta;
      node.maxLine += delta;
      if (node.left) node.left.pendingLines += delta;
      if (node.right) node.right.pendingLines += delta;
      node.pendingLines = 0;
    }
  }

  /**
   * Push pending deltas down from the root to node inclusive
   */
  private _pushDownPath(node: MarkerNode): void {
    const path: MarkerNode[] = [];
    for (let current: MarkerNode | null = node; current; current = current.parent) {
      path.push(current);
    }
    for (let i = path.length - 1; i >= 0; i--) {
      this._pushDown(path[i]);
    }
  }

  private _subtreeMaxEnd(node: MarkerNode | null): number {
    return node ? node.maxEnd + node.pending : -Infinity;
  }

  private _lineRangeContains(node: MarkerNode, line: number): boolean {
    return node.minLine + node.pendingLines <= line && line <= node.maxLine + node.pendingLines;
  }

  /**
   * Recompute augmentation of a node whose own deltas are already pushed down
   */
  private _update(node: MarkerNode): void {
    node.maxEnd = Math.max(node.end, this._subtreeMaxEnd(node.left), this._subtreeMaxEnd(node.right));

    let minLine = node.isLine ? node.line : Infinity;
    let maxLine = node.isLine ? node.line : -Infinity;
    for (const child of [node.left, node.right]) {
      if (child) {
        minLine = Math.min(minLine, child.minLine + child.pendingLines);
        maxLine = Math.max(maxLine, child.maxLine + child.pendingLines);
      }
    }
    node.minLine = minLine;
    node.maxLine = maxLine;
  }

  /**
   * Split into markers starting before key and markers starting at or after it
   */
  private _split(node: MarkerNode | null, key: number): [MarkerNode | null, MarkerNode | null] {
    if (!node) return [null, null];
    this._pushDown(node);
    node.parent = null;

    if (node.start < key) {
      const [left, right] = this._split(node.right, key);
      node.right = left;
      if (left) left.parent = node;
      this._update(node);
      return [node, right];
    }

    const [left, right] = this._split(node.left, key);
    node.left = right;
    if (right) right.parent = node;
    this._update(node);
    return [left, node];
  }

  /**
   * Join two treaps where every start in a precedes every start in b
   */
  private _merge(a: MarkerNode | null, b: MarkerNode | null): MarkerNode | null {
    if (!a) return b;
    if (!b) return a;

    if (a.priority > b.priority) {
      this._pushDown(a);
      const right = this._merge(a.right, b);
      a.right = right;
      if (right) right.parent = a;
      a.parent = null;
      this._update(a);
      return a;
    }

    this._pushDown(b);
    const left = this._merge(a, b.left);
    b.left = left;
    if (left) left.parent = b;
    b.parent = null;
    this._update(b);
    return b;
  }

  /**
   * Detach every node of a subtree in order, with deltas applied and links cleared
   */
  private _drain(node: MarkerNode | null): MarkerNode[] {
    const out: MarkerNode[] = [];
    const walk = (current: MarkerNode | null): void => {
      if (!current) return;
      this._pushDown(current);
      const { left, right } = current;
      walk(left);
      current.left = current.right = current.parent = null;
      out.push(current);
      walk(right);
    };
    walk(node);
    return out;
  }

  /**
   * Treap over detached nodes already sorted by start
   */
  private _build(nodes: MarkerNode[]): MarkerNode | null {
    let root: MarkerNode | null = null;
    for (const node of nodes) {
      this._update(node);
      root = this._merge(root, node);
    }
    return root;
  }

  /**
   * Resolved markers with start <= b and end >= a, in start order
   */
  private _collect(a: number, b: number): ResolvedMarker[] {
    const out: ResolvedMarker[] = [];
    const walk = (node: MarkerNode | null): void => {
      if (!node) return;
      this._pushDown(node);
      if (node.maxEnd < a) return;
      walk(node.left);
      if (node.start > b) return;
      if (node.end >= a) out.push(this._toResolved(node, 0, 0));
      walk(node.right);
    };
    walk(this.root);
    return out;
  }

  private _toResolved(node: MarkerNode, delta: number, lineDelta: number): ResolvedMarker {
    const payload: MarkerPayload = node.position
      ? { ...node.position }
      : { kind: 'line', line: node.line + lineDelta };
    return {
      id: node.id,
      start: node.start + delta,
      end: node.end + delta,
      affinity: node.affinity,
      payload
    };
  }

  /**
   * Throw in strict mode, otherwise log; returns true when the caller may continue
   */
  private _reportViolation(violation: BufferError): boolean {
    this.onInvariantViolation?.(violation);
    if (this.strictInvariants) {
      throw violation;
    }
    logger.error(violation.message);
    return false;
  }
}

export { MarkerTree, overlaps };
