/**
 * @fileoverview Line number estimation for files too large to count
 * @description Keeps a sparse set of byte/line correspondences (anchors).
 * Line queries count newlines from the nearest anchor while a per-call scan
 * budget lasts and fall back to extrapolating with the average line length.
 * Every answer says how it was obtained; refining one anchor corrects every
 * anchor that was counted relative to it.
 */

import { BufferError } from './utils/errors';
import { logger } from './utils/logger';
import {
  Confidence,
  type AnchorConfidence,
  type AnchorId,
  type LineAnchor,
  type LineAnchorStats,
  type LineLookup,
  type LineSource
} from './types/common';

export interface LineAnchorIndexOptions {
  maxScanLines: number;
  maxScanBytes: number;
  /**
   * Bytes sampled from the start of the buffer when no average is configured,
   * never more than half of maxScanBytes. The first call to need the average
   * pays for the sample out of its own budget.
   */
  lineSampleBytes: number;
  averageLineLength: number | null;
  /** Called after an anchor is corrected, with the line error that was removed */
  onRefine?: (anchor: LineAnchor, error: number) => void;
}

interface AnchorRecord {
  id: AnchorId;
  byteOffset: number;
  line: number;
  confidence: Confidence;
  /** Anchor this one was counted from, for relative anchors */
  parentId: AnchorId | null;
}

type WalkResult =
  | { kind: 'found'; offset: number }
  | { kind: 'eof' }
  | { kind: 'exhausted' };

/**
 * Raw bytes one public call may still scan
 */
class ScanBudget {
  public used: number = 0;

  constructor(private readonly limit: number) {}

  get remaining(): number {
    return Math.max(0, this.limit - this.used);
  }

  spend(bytes: number): void {
    this.used += bytes;
  }
}

/**
 * Non-exact anchors that a forward count from an exact base steps onto, with
 * the line each one really starts
 */
class PassedAnchors {
  public readonly lines: Array<{ id: AnchorId; line: number }> = [];
  private next: number;

  constructor(
    private readonly anchors: readonly AnchorRecord[],
    first: number,
    private readonly baseLine: number
  ) {
    this.next = first;
  }

  visit(lineStart: number, walked: number): void {
    while (this.next < this.anchors.length && this.anchors[this.next].byteOffset < lineStart) {
      this.next++;
    }
    if (this.next === this.anchors.length) return;
    const anchor = this.anchors[this.next];
    if (anchor.byteOffset === lineStart && anchor.confidence !== Confidence.EXACT) {
      this.lines.push({ id: anchor.id, line: this.baseLine + walked });
    }
  }
}

/**
 * Sparse byte/line anchors over one buffer
 */
class LineAnchorIndex {
  private readonly source: LineSource;
  private readonly options: LineAnchorIndexOptions;
  /** Sorted by byte offset; line numbers are non-decreasing in the same order */
  private anchors: AnchorRecord[] = [];
  private readonly byId: Map<AnchorId, AnchorRecord> = new Map();
  private readonly children: Map<AnchorId, Set<AnchorId>> = new Map();
  private nextId: AnchorId = 1;
  private _averageLineLength: number | null;
  private _lastScanBytes: number = 0;

  constructor(source: LineSource, options: LineAnchorIndexOptions) {
    this.source = source;
    this.options = options;
    this._averageLineLength = options.averageLineLength;

    const origin: AnchorRecord = { id: 0, byteOffset: 0, line: 0, confidence: Confidence.EXACT, parentId: null };
    this.anchors.push(origin);
    this.byId.set(origin.id, origin);
  }

  /**
   * Configured average line length, or one sampled on first use. Sampling
   * counts as the scan of the call that triggered it.
   */
  get averageLineLength(): number {
    if (this._averageLineLength === null) {
      const budget = new ScanBudget(Math.floor(this.options.maxScanBytes / 2));
      this._averageLineLength = this._sampleAverageLineLength(budget);
      this._lastScanBytes = budget.used;
    }
    return this._averageLineLength;
  }

  /**
   * Raw bytes scanned by the most recent lineToByte or byteToLine call
   */
  get lastScanBytes(): number {
    return this._lastScanBytes;
  }

  /**
   * Per-call byte budget: the larger of maxScanLines average lines and maxScanBytes
   */
  get scanBudgetBytes(): number {
    return Math.max(Math.ceil(this.options.maxScanLines * this.averageLineLength), this.options.maxScanBytes);
  }

  private _sampleAverageLineLength(budget: ScanBudget): number {
    const sampleLength = Math.min(this.options.lineSampleBytes, budget.remaining, this.source.byteLength());
    if (sampleLength === 0) return 1;
    budget.spend(sampleLength);
    const newlines = this.source.countNewlines(0, sampleLength);
    const average = newlines > 0 ? sampleLength / newlines : sampleLength;
    logger.debug(`[DEBUG] Sampled average line length ${average.toFixed(1)} from ${sampleLength} bytes`);
    return Math.max(1, average);
  }

  /**
   * Budget for one public call, already charged with the line-length sample
   * when this call is the first to need it
   */
  private _openBudget(): ScanBudget {
    const sampling = this._averageLineLength === null;
    const budget = new ScanBudget(this.scanBudgetBytes);
    if (sampling) budget.spend(this._lastScanBytes);
    return budget;
  }

  // =================== QUERIES ===================

  /**
   * Start byte of a line
   */
  lineToByte(line: number): LineLookup {
    if (!Number.isInteger(line) || line < 0) {
      throw BufferError.outOfBounds('Line', line, this.source.byteLength());
    }
    const budget = this._openBudget();
    try {
      return this._lineToByte(line, budget);
    } finally {
      this._lastScanBytes = budget.used;
    }
  }

  private _lineToByte(line: number, budget: ScanBudget): LineLookup {
    const anchorIndex = this._lastIndexAtOrBeforeLine(line);
    const anchor = this.anchors[anchorIndex];
    if (anchor.line === line) {
      if (anchor.confidence === Confidence.EXACT) return this._lookup(anchor);
      return this._tryCount(this._lastExactAtOrBeforeLine(line), line, budget) ?? this._lookup(anchor);
    }

    const counted = this._tryCount(anchor, line, budget);
    if (counted) return counted;

    // Extrapolate between the neighbouring anchors and snap to a line start
    const length = this.source.byteLength();
    const next = anchorIndex + 1 < this.anchors.length ? this.anchors[anchorIndex + 1] : null;
    const projected = anchor.byteOffset + Math.round((line - anchor.line) * this.averageLineLength);
    if (!next && projected > length) {
      logger.debug(`[DEBUG] lineToByte(${line}): estimate ${projected} is past the end`);
      return { line, byteOffset: length, confidence: Confidence.ESTIMATED, anchorId: null };
    }

    const upper = next ? next.byteOffset - 1 : length;
    const estimate = Math.max(anchor.byteOffset + 1, Math.min(upper, projected));
    const snapped = this._snapToLineStart(estimate, anchor.byteOffset, next ? next.byteOffset : null, budget);
    if (snapped !== null) {
      logger.debug(`[DEBUG] lineToByte(${line}): estimated ${snapped} from anchor ${anchor.id}`);
      return this._registerLookup(snapped, line, Confidence.ESTIMATED, null);
    }

    const exact = this._lastExactAtOrBeforeLine(line);
    if (exact.id !== anchor.id) {
      const recounted = this._tryCount(exact, line, budget);
      if (recounted) return recounted;
    }

    logger.debug(`[DEBUG] lineToByte(${line}): could not snap estimate ${estimate}`);
    return { line, byteOffset: estimate, confidence: Confidence.ESTIMATED, anchorId: null };
  }

  /**
   * Count lines forward from base when the expected distance fits the
   * remaining budget. Running off the end from an exact base means the line
   * does not exist.
   */
  private _tryCount(base: AnchorRecord, line: number, budget: ScanBudget): LineLookup | null {
    const lines = line - base.line;
    if (lines < 0 || lines * this.averageLineLength > budget.remaining) return null;

    const passed = base.confidence === Confidence.EXACT ? this._passedAnchors(base) : null;
    const walked = this._walkLines(base.byteOffset, lines, budget, passed);
    if (walked.kind === 'found') {
      return this._registerCounted(walked.offset, line, base, passed);
    }
    if (walked.kind === 'eof' && base.confidence === Confidence.EXACT) {
      throw BufferError.outOfBounds('Line', line, this.source.byteLength());
    }
    return null;
  }

  /**
   * Line containing a byte offset
   */
  byteToLine(offset: number): LineLookup {
    const length = this.source.byteLength();
    if (!Number.isInteger(offset) || offset < 0 || offset > length) {
      throw BufferError.outOfBounds('Offset', offset, length);
    }
    const budget = this._openBudget();
    try {
      return this._byteToLine(offset, budget);
    } finally {
      this._lastScanBytes = budget.used;
    }
  }

  private _byteToLine(offset: number, budget: ScanBudget): LineLookup {
    const beforeIndex = this._lastIndexAtOrBeforeByte(offset);
    const before = this.anchors[beforeIndex];
    const after = beforeIndex + 1 < this.anchors.length ? this.anchors[beforeIndex + 1] : null;
    if (before.byteOffset === offset) {
      return this._lookup(before);
    }

    const forwardDistance = offset - before.byteOffset;
    const backwardDistance = after ? after.byteOffset - offset : Infinity;

    if (forwardDistance <= backwardDistance && forwardDistance <= budget.remaining) {
      budget.spend(forwardDistance);
      const { count, lastLineStart } = this._countForward(before.byteOffset, offset);
      if (count === 0) {
        return this._lookup(before);
      }
      return this._registerCounted(lastLineStart, before.line + count, before);
    }

    if (after && backwardDistance <= budget.remaining) {
      budget.spend(backwardDistance);
      const line = after.line - this.source.countNewlines(offset, after.byteOffset);
      const confidence = after.confidence === Confidence.EXACT ? Confidence.EXACT : Confidence.RELATIVE;
      const lineStart = this._findLineStart(offset, before.byteOffset, budget);
      if (lineStart === null) {
        return { line, byteOffset: offset, confidence, anchorId: null };
      }
      if (lineStart === before.byteOffset) {
        return this._lookup(before);
      }
      return this._registerCounted(lineStart, line, after);
    }

    // Extrapolate from the nearer anchor, keeping line order between the neighbours
    let line = forwardDistance <= backwardDistance || !after
      ? before.line + Math.round(forwardDistance / this.averageLineLength)
      : after.line - Math.round(backwardDistance / this.averageLineLength);

    const lineStart = this._findLineStart(offset, before.byteOffset, budget);
    if (lineStart === before.byteOffset) {
      return this._lookup(before);
    }
    if (lineStart === null) {
      line = Math.max(before.line, after ? Math.min(line, after.line) : line);
      return { line, byteOffset: offset, confidence: Confidence.ESTIMATED, anchorId: null };
    }

    line = Math.max(before.line + 1, line);
    if (after) line = Math.min(after.line - 1, line);
    if (line <= before.line) {
      return { line: before.line, byteOffset: lineStart, confidence: Confidence.ESTIMATED, anchorId: null };
    }

    logger.debug(`[DEBUG] byteToLine(${offset}): estimated line ${line}`);
    return this._registerLookup(lineStart, line, Confidence.ESTIMATED, null);
  }

  // =================== REFINEMENT ===================

  /**
   * Record the exact line of an anchor. The correction is applied to every
   * anchor counted relative to it, which become exact as well.
   */
  refine(anchorId: AnchorId, exactLine: number): boolean {
    const record = this.byId.get(anchorId);
    if (!record) return false;
    if (record.confidence === Confidence.EXACT) {
      if (record.line !== exactLine) {
        logger.warn(`Ignoring refinement of exact anchor ${anchorId}: line ${record.line} vs ${exactLine}`);
      }
      return false;
    }

    const error = exactLine - record.line;
    this._detachFromParent(record);
    record.line = exactLine;
    record.confidence = Confidence.EXACT;
    const corrected = [record];
    this._propagateRefinement(record, error, corrected);
    for (const exact of corrected) {
      if (this.byId.has(exact.id)) this._dropContradicting(exact);
    }

    logger.debug(`[DEBUG] refine: anchor ${anchorId} corrected by ${error} lines`);
    this.options.onRefine?.(this._toAnchor(record), error);
    return true;
  }

  private _propagateRefinement(record: AnchorRecord, error: number, corrected: AnchorRecord[]): void {
    const childIds = this.children.get(record.id);
    if (!childIds) return;
    this.children.delete(record.id);

    for (const childId of childIds) {
      const child = this.byId.get(childId);
      if (!child) continue;
      child.line += error;
      child.confidence = Confidence.EXACT;
      child.parentId = null;
      corrected.push(child);
      this._propagateRefinement(child, error, corrected);
    }
  }

  // =================== EDIT ADJUSTMENT ===================

  /**
   * Shift anchors for an edit at offset. Anchors strictly inside a deleted
   * range (or at its end) no longer mark a line start and are dropped, along
   * with relative anchors that were counted from nothing else.
   */
  adjustForEdit(offset: number, lengthDelta: number, lineDelta: number): void {
    if (lengthDelta === 0 && lineDelta === 0) return;

    if (lengthDelta < 0) {
      const end = offset - lengthDelta;
      const doomed = this.anchors.filter(anchor => anchor.byteOffset > offset && anchor.byteOffset <= end);
      for (const anchor of doomed) {
        this._drop(anchor);
      }
      if (doomed.length > 0) {
        logger.debug(`[DEBUG] adjustForEdit: dropped ${doomed.length} anchors in deleted range`);
      }
    }

    for (const anchor of this.anchors) {
      if (anchor.byteOffset > offset) {
        anchor.byteOffset += lengthDelta;
        anchor.line += lineDelta;
      }
    }
  }

  /**
   * Remove an anchor. Relative children of a relative anchor move to its
   * parent; children of any other anchor have no base left and go with it.
   */
  private _drop(record: AnchorRecord): void {
    if (!this.byId.has(record.id)) return;
    const heir = record.confidence === Confidence.RELATIVE ? record.parentId : null;
    const childIds = [...(this.children.get(record.id) ?? [])];
    this.children.delete(record.id);
    this._detachFromParent(record);
    this.anchors = this.anchors.filter(anchor => anchor !== record);
    this.byId.delete(record.id);

    for (const childId of childIds) {
      const child = this.byId.get(childId);
      if (!child) continue;
      if (heir !== null) {
        child.parentId = heir;
        this._childSet(heir).add(child.id);
      } else {
        child.parentId = null;
        this._drop(child);
      }
    }
  }

  // =================== ACCESSORS ===================

  getAnchor(anchorId: AnchorId): LineAnchor | null {
    const record = this.byId.get(anchorId);
    return record ? this._toAnchor(record) : null;
  }

  getAnchors(): LineAnchor[] {
    return this.anchors.map(record => this._toAnchor(record));
  }

  getStats(): LineAnchorStats {
    let exactAnchors = 0;
    let estimatedAnchors = 0;
    let relativeAnchors = 0;
    for (const anchor of this.anchors) {
      if (anchor.confidence === Confidence.EXACT) exactAnchors++;
      else if (anchor.confidence === Confidence.ESTIMATED) estimatedAnchors++;
      else relativeAnchors++;
    }
    return {
      anchorCount: this.anchors.length,
      exactAnchors,
      estimatedAnchors,
      relativeAnchors,
      averageLineLength: this.averageLineLength,
      lastScanBytes: this._lastScanBytes
    };
  }

  // =================== SCANNING ===================

  /**
   * Offset just past the count-th newline after start, within the budget
   */
  private _walkLines(start: number, count: number, budget: ScanBudget, passed: PassedAnchors | null): WalkResult {
    const length = this.source.byteLength();
    let pos = start;
    let remaining = count;

    while (remaining > 0) {
      if (pos >= length) return { kind: 'eof' };
      const limit = Math.min(budget.remaining, length - pos);
      if (limit <= 0) return { kind: 'exhausted' };

      const newline = this.source.findNewline(pos, limit);
      if (newline === -1) {
        budget.spend(limit);
        pos += limit;
        continue;
      }
      budget.spend(newline + 1 - pos);
      pos = newline + 1;
      remaining--;
      passed?.visit(pos, count - remaining);
    }
    return { kind: 'found', offset: pos };
  }

  /**
   * Newlines in [start, end) and the start of the line containing end
   */
  private _countForward(start: number, end: number): { count: number; lastLineStart: number } {
    let count = 0;
    let lastLineStart = start;
    let pos = start;
    while (pos < end) {
      const newline = this.source.findNewline(pos, end - pos);
      if (newline === -1) break;
      count++;
      pos = newline + 1;
      lastLineStart = pos;
    }
    return { count, lastLineStart };
  }

  /**
   * Start of the line containing offset, looking back no further than floor
   */
  private _findLineStart(offset: number, floor: number, budget: ScanBudget): number | null {
    const limit = Math.min(budget.remaining, offset - floor);
    if (limit <= 0) return offset === floor ? floor : null;

    const newline = this.source.findNewlineBackward(offset, limit);
    if (newline !== -1) {
      budget.spend(offset - newline);
      return newline + 1;
    }
    budget.spend(limit);
    return offset - limit === floor ? floor : null;
  }

  /**
   * Nearest line start to an estimate strictly between two anchor offsets:
   * backwards first, then forwards
   */
  private _snapToLineStart(estimate: number, lower: number, upper: number | null, budget: ScanBudget): number | null {
    const accepts = (lineStart: number): boolean => lineStart > lower && (upper === null || lineStart < upper);

    const backLimit = Math.min(budget.remaining, estimate - lower);
    const backward = this.source.findNewlineBackward(estimate, backLimit);
    if (backward !== -1) {
      budget.spend(estimate - backward);
      if (accepts(backward + 1)) return backward + 1;
    } else {
      budget.spend(backLimit);
    }

    const forwardLimit = Math.min(budget.remaining, this.source.byteLength() - estimate);
    if (forwardLimit <= 0) return null;
    const forward = this.source.findNewline(estimate, forwardLimit);
    if (forward === -1) {
      budget.spend(forwardLimit);
      return null;
    }
    budget.spend(forward + 1 - estimate);
    return accepts(forward + 1) ? forward + 1 : null;
  }

  // =================== ANCHOR BOOKKEEPING ===================

  /**
   * Register an anchor whose line was counted from base, refining the
   * non-exact anchors the count stepped onto when base is exact
   */
  private _registerCounted(
    byteOffset: number,
    line: number,
    base: AnchorRecord,
    passed: PassedAnchors | null = null
  ): LineLookup {
    if (base.confidence === Confidence.EXACT) {
      for (const { id, line: exactLine } of passed?.lines ?? []) {
        this.refine(id, exactLine);
      }
      return this._registerLookup(byteOffset, line, Confidence.EXACT, null);
    }
    return this._registerLookup(byteOffset, line, Confidence.RELATIVE, base.id);
  }

  private _passedAnchors(base: AnchorRecord): PassedAnchors {
    const first = this._findBoundary(anchor => anchor.byteOffset > base.byteOffset, true);
    return new PassedAnchors(this.anchors, first === -1 ? this.anchors.length : first, base.line);
  }

  private _registerLookup(byteOffset: number, line: number, confidence: Confidence, parentId: AnchorId | null): LineLookup {
    const record = this._register(byteOffset, line, confidence, parentId);
    return record ? this._lookup(record) : { line, byteOffset, confidence, anchorId: null };
  }

  /**
   * Add an anchor, or reuse the one already at byteOffset. An existing
   * anchor is only ever upgraded to exact. A non-exact anchor whose line
   * does not fit between its neighbours is not added (null); an exact one
   * evicts the non-exact anchors it contradicts.
   */
  private _register(byteOffset: number, line: number, confidence: Confidence, parentId: AnchorId | null): AnchorRecord | null {
    const found = this._findBoundary(anchor => anchor.byteOffset >= byteOffset, true);
    if (found !== -1 && this.anchors[found].byteOffset === byteOffset) {
      const existing = this.anchors[found];
      if (confidence === Confidence.EXACT && existing.confidence !== Confidence.EXACT) {
        this.refine(existing.id, line);
      }
      return existing;
    }

    const record: AnchorRecord = { id: this.nextId, byteOffset, line, confidence, parentId };
    if (confidence === Confidence.EXACT) {
      this._dropContradicting(record);
    }
    const next = this._findBoundary(anchor => anchor.byteOffset > byteOffset, true);
    const index = next === -1 ? this.anchors.length : next;
    const prev = index > 0 ? this.anchors[index - 1] : null;
    const after = index < this.anchors.length ? this.anchors[index] : null;
    if ((prev && prev.line >= line) || (after && after.line <= line)) {
      logger.debug(`[DEBUG] Skipping anchor at ${byteOffset}: line ${line} is out of order with its neighbours`);
      return null;
    }

    this.nextId++;
    this.anchors.splice(index, 0, record);
    this.byId.set(record.id, record);
    if (parentId !== null) {
      this._childSet(parentId).add(record.id);
    }
    return record;
  }

  /**
   * Drop non-exact anchors whose line is out of order with an exact one
   */
  private _dropContradicting(exact: AnchorRecord): void {
    const doomed = this.anchors.filter(anchor =>
      anchor !== exact &&
      anchor.confidence !== Confidence.EXACT &&
      ((anchor.byteOffset < exact.byteOffset && anchor.line >= exact.line) ||
       (anchor.byteOffset > exact.byteOffset && anchor.line <= exact.line))
    );
    for (const anchor of doomed) {
      logger.debug(`[DEBUG] Dropping anchor ${anchor.id}: line ${anchor.line} contradicts exact line ${exact.line}`);
      this._drop(anchor);
    }
  }

  private _detachFromParent(record: AnchorRecord): void {
    if (record.parentId === null) return;
    const siblings = this.children.get(record.parentId);
    if (siblings) {
      siblings.delete(record.id);
      if (siblings.size === 0) this.children.delete(record.parentId);
    }
    record.parentId = null;
  }

  private _childSet(parentId: AnchorId): Set<AnchorId> {
    let set = this.children.get(parentId);
    if (!set) {
      set = new Set();
      this.children.set(parentId, set);
    }
    return set;
  }

  private _lastIndexAtOrBeforeByte(byteOffset: number): number {
    return Math.max(0, this._findBoundary(anchor => anchor.byteOffset <= byteOffset, false));
  }

  private _lastIndexAtOrBeforeLine(line: number): number {
    return Math.max(0, this._findBoundary(anchor => anchor.line <= line, false));
  }

  private _lastExactAtOrBeforeLine(line: number): AnchorRecord {
    for (let i = this._lastIndexAtOrBeforeLine(line); i > 0; i--) {
      if (this.anchors[i].confidence === Confidence.EXACT) return this.anchors[i];
    }
    return this.anchors[0];
  }

  /**
   * Binary search over the anchors for the first (or last) one matching a
   * monotone condition; -1 when none does
   */
  private _findBoundary(condition: (anchor: AnchorRecord) => boolean, findFirst: boolean): number {
    let left = 0;
    let right = this.anchors.length - 1;
    let result = -1;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      if (condition(this.anchors[mid])) {
        result = mid;
        if (findFirst) {
          right = mid - 1;
        } else {
          left = mid + 1;
        }
      } else if (findFirst) {
        left = mid + 1;
      } else {
        right = mid - 1;
      }
    }
    return result;
  }

  private _toConfidence(record: AnchorRecord): AnchorConfidence {
    if (record.confidence === Confidence.RELATIVE && record.parentId !== null) {
      return { kind: Confidence.RELATIVE, parentId: record.parentId };
    }
    return record.confidence === Confidence.EXACT ? { kind: Confidence.EXACT } : { kind: Confidence.ESTIMATED };
  }

  private _toAnchor(record: AnchorRecord): LineAnchor {
    return {
      id: record.id,
      byteOffset: record.byteOffset,
      estimatedLine: record.line,
      confidence: this._toConfidence(record)
    };
  }

  private _lookup(record: AnchorRecord): LineLookup {
    return {
      line: record.line,
      byteOffset: record.byteOffset,
      confidence: record.confidence,
      anchorId: record.id
    };
  }
}

export { LineAnchorIndex, ScanBudget };
