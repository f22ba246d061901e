/**
 * @fileoverview TextBuffer: one open document
 * @description Wires the chunk store, the marker tree and the line anchor
 * index together. Every edit goes to the store first, then shifts markers
 * and anchors, then rescans the cached lines it touched. Queries never
 * modify the store.
 */

import { promises as fs } from 'fs';
import { BufferOperation, type EditTarget } from './buffer-operation';
import { ChunkStore, type ChunkStoreSnapshot, type Version } from './chunk-store';
import { LineAnchorIndex } from './line-anchor-index';
import { LineIterator } from './line-iterator';
import { MarkerTree } from './marker-tree';
import { applyLineEnding, countNewlines, isContinuationByte, normalizeLineEndings, utf16Length } from './utils/encoding';
import { BufferError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import {
  LineEnding,
  NotificationType,
  resolveBufferConfig,
  type BufferConfig,
  type BufferNotification,
  type NotificationSeverity
} from './types/buffer-types';
import {
  Affinity,
  Confidence,
  type ByteRange,
  type ChunkStoreStats,
  type LineAnchorStats,
  type LineCharPosition,
  type LineCount,
  type LineLookup,
  type LinePayload,
  type MarkerId,
  type MarkerPayload,
  type MarkerTreeStats,
  type PositionPayload,
  type ResolvedMarker
} from './types/common';

/** Sent on most edits in view; delivered to callbacks without being kept */
const CALLBACK_ONLY_NOTIFICATIONS: ReadonlySet<NotificationType> = new Set([
  NotificationType.LINES_RESCANNED,
  NotificationType.ANCHOR_REFINED
]);
const MAX_KEPT_NOTIFICATIONS = 1000;

/** Regex search reads the buffer in windows that overlap by REGEX_OVERLAP_BYTES */
const REGEX_WINDOW_BYTES = 64 * 1024;
const REGEX_OVERLAP_BYTES = 4 * 1024;

class BufferNotificationImpl implements BufferNotification {
  public timestamp: Date;

  constructor(
    public type: NotificationType,
    public severity: NotificationSeverity,
    public message: string,
    public metadata: Record<string, unknown> = {}
  ) {
    this.timestamp = new Date();
  }
}

export interface TextBufferStats {
  store: ChunkStoreStats;
  markers: MarkerTreeStats;
  /** Null until a line query bootstraps the anchor index */
  anchors: LineAnchorStats | null;
}

function lineOf(marker: ResolvedMarker): number | null {
  return marker.payload.kind === 'line' ? marker.payload.line : null;
}

function isWordByte(byte: number): boolean {
  return (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    byte === 0x5f ||
    byte >= 0x80;
}

/**
 * Editable text buffer with markers and line numbering
 */
class TextBuffer implements EditTarget {
  public readonly config: BufferConfig;
  public readonly store: ChunkStore;
  public readonly markers: MarkerTree;
  /** Opened above the large-file threshold: line numbers come from anchors */
  public readonly lazyLines: boolean;

  public filename: string | null = null;
  public lineEnding: LineEnding = LineEnding.LF;

  public notifications: BufferNotification[] = [];
  public notificationCallbacks: Array<(notification: BufferNotification) => void> = [];
  private editListeners: Array<(operation: BufferOperation) => void> = [];

  private _anchors: LineAnchorIndex | null = null;
  private _linesCounted: boolean;
  private _modified: boolean = false;
  private _closed: boolean = false;

  constructor(content: Buffer, config: BufferConfig, copy: boolean = true) {
    this.config = config;
    this.store = ChunkStore.fromBytes(content, { chunkSize: config.chunkSize, branchFactor: config.branchFactor }, copy);
    this.lazyLines = content.length > config.largeFileThreshold;
    this._linesCounted = !this.lazyLines;
    this.markers = new MarkerTree(content.length, {
      strictInvariants: config.strictInvariants,
      onInvariantViolation: error => this._notify(
        NotificationType.INVARIANT_VIOLATION,
        'error',
        error.message,
        { ...error.details }
      )
    });
  }

  // =================== OPENING AND SAVING ===================

  /**
   * Open a buffer over text or bytes. A Buffer is adopted without copying;
   * the caller must not modify it afterwards.
   */
  static open(content: Buffer | string, config: Partial<BufferConfig> = {}): TextBuffer {
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    const buffer = new TextBuffer(bytes, resolveBufferConfig(config), false);
    buffer._notify(
      NotificationType.BUFFER_OPENED,
      'info',
      'Opened content',
      { size: bytes.length, lazyLines: buffer.lazyLines }
    );
    return buffer;
  }

  /**
   * Read a file, normalizing CRLF and CR line endings to LF
   */
  static async openFile(filename: string, config: Partial<BufferConfig> = {}): Promise<TextBuffer> {
    const resolved = resolveBufferConfig(config);
    let raw: Buffer;
    try {
      raw = await fs.readFile(filename);
    } catch (error) {
      throw new Error(`Failed to open file: ${errorMessage(error)}`);
    }

    const { data, lineEnding } = normalizeLineEndings(raw);
    const buffer = new TextBuffer(data, resolved, false);
    buffer.filename = filename;
    buffer.lineEnding = lineEnding;

    buffer._notify(
      NotificationType.BUFFER_OPENED,
      'info',
      'Loaded file',
      { filename, size: raw.length, lineEnding, lazyLines: buffer.lazyLines }
    );
    return buffer;
  }

  /**
   * Write the content with the line ending detected on open. The file is
   * written to a temporary sibling and renamed over the target.
   */
  async saveFile(filename: string | null = this.filename): Promise<void> {
    this._checkOpen();
    if (!filename) {
      throw new Error('No filename specified');
    }

    const data = applyLineEnding(this.store.toBuffer(), this.lineEnding);
    const tempPath = `${filename}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filename);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new Error(`Failed to save file: ${errorMessage(error)}`);
    }

    this.filename = filename;
    this._modified = false;
    this._notify(
      NotificationType.FILE_SAVED,
      'info',
      'Saved file',
      { filename, size: data.length, lineEnding: this.lineEnding }
    );
  }

  // =================== NOTIFICATIONS AND EVENTS ===================

  /**
   * Add notification callback
   */
  onNotification(callback: (notification: BufferNotification) => void): void {
    this.notificationCallbacks.push(callback);
  }

  /**
   * Add a listener for every successful edit
   */
  onEdit(listener: (operation: BufferOperation) => void): void {
    this.editListeners.push(listener);
  }

  /**
   * Notifications kept for later inspection. Line rescans and anchor
   * refinements only reach callbacks.
   */
  getNotifications(): BufferNotification[] {
    return [...this.notifications];
  }

  clearNotifications(type: NotificationType | null = null): void {
    this.notifications = type ? this.notifications.filter(n => n.type !== type) : [];
  }

  private _notify(
    type: NotificationType,
    severity: NotificationSeverity,
    message: string,
    metadata: Record<string, unknown> = {}
  ): void {
    const notification = new BufferNotificationImpl(type, severity, message, metadata);
    if (!CALLBACK_ONLY_NOTIFICATIONS.has(type)) {
      this.notifications.push(notification);
      if (this.notifications.length > MAX_KEPT_NOTIFICATIONS) {
        this.notifications.splice(0, this.notifications.length - MAX_KEPT_NOTIFICATIONS);
      }
    }

    for (const callback of this.notificationCallbacks) {
      try {
        callback(notification);
      } catch (error) {
        logger.error('Notification callback error:', error);
      }
    }
  }

  private _emitEdit(operation: BufferOperation): void {
    for (const listener of this.editListeners) {
      try {
        listener(operation);
      } catch (error) {
        logger.error('Edit listener error:', error);
      }
    }
  }

  // =================== CONTENT ===================

  byteLength(): number {
    this._checkOpen();
    return this.store.byteLength();
  }

  slice(start: number, end: number): Buffer {
    this._checkOpen();
    return this.store.slice(start, end);
  }

  sliceText(start: number, end: number): string {
    return this.slice(start, end).toString('utf8');
  }

  getText(): string {
    return this.sliceText(0, this.byteLength());
  }

  /**
   * Whether the content changed since it was opened, last saved or last
   * marked unmodified
   */
  isModified(): boolean {
    return this._modified;
  }

  clearModified(): void {
    this._modified = false;
  }

  /**
   * Insert text or bytes at offset; returns the new version
   */
  insert(offset: number, text: Buffer | string): Version {
    this._checkOpen();
    const data = typeof text === 'string' ? Buffer.from(text, 'utf8') : Buffer.from(text);
    const previous = this.store.version;
    const version = this.store.insert(offset, data);
    if (version === previous) return version;

    this._modified = true;
    const newlines = countNewlines(data);
    this.markers.adjustForEdit(offset, data.length, newlines);
    this._anchors?.adjustForEdit(offset, data.length, newlines);
    this._rescanLines(offset, offset + data.length);

    logger.debug(`[DEBUG] insert: ${data.length} bytes at ${offset}, ${newlines} newlines`);
    this._emitEdit(BufferOperation.insert(offset, data, version));
    return version;
  }

  /**
   * Delete [start, end); returns the new version
   */
  delete(start: number, end: number): Version {
    this._checkOpen();
    const removed = this.store.slice(start, end);
    const previous = this.store.version;
    const version = this.store.delete(start, end);
    if (version === previous) return version;

    this._modified = true;

    // Lines starting inside the deleted range no longer exist
    if (end - start > 1) {
      for (const marker of this.markers.lineMarkersTouching(start + 1, end - 1)) {
        if (marker.start > start && marker.start < end) this.markers.removeMarker(marker.id);
      }
    }

    const newlines = countNewlines(removed);
    this.markers.adjustForEdit(start, -removed.length, -newlines);
    this._anchors?.adjustForEdit(start, -removed.length, -newlines);
    this._rescanLines(start, start);

    logger.debug(`[DEBUG] delete: [${start}, ${end}), ${newlines} newlines`);
    this._emitEdit(BufferOperation.delete(start, removed, version));
    return version;
  }

  /**
   * Replace [start, end) with text, as a delete followed by an insert
   */
  replace(start: number, end: number, text: Buffer | string): Version {
    this.delete(start, end);
    return this.insert(start, text);
  }

  /**
   * O(1) read-only handle on the current version; release it when done
   */
  snapshot(): ChunkStoreSnapshot {
    this._checkOpen();
    return this.store.snapshot();
  }

  // =================== MARKERS ===================

  addMarker(interval: ByteRange, payload: PositionPayload, affinity?: Affinity): MarkerId;
  addMarker(interval: ByteRange, payload: LinePayload, affinity?: Affinity): MarkerId | null;
  addMarker(interval: ByteRange, payload: MarkerPayload, affinity: Affinity = Affinity.AFTER): MarkerId | null {
    this._checkOpen();
    return this.markers.insertMarker(interval, payload, affinity);
  }

  removeMarker(id: MarkerId): boolean {
    this._checkOpen();
    return this.markers.removeMarker(id);
  }

  /**
   * Current interval of a marker, or null when it does not exist
   */
  resolveMarker(id: MarkerId): ByteRange | null {
    this._checkOpen();
    const marker = this.markers.resolve(id);
    return marker ? { start: marker.start, end: marker.end } : null;
  }

  markersInRange(start: number, end: number): ResolvedMarker[] {
    this._checkOpen();
    return this.markers.queryRange(start, end);
  }

  // =================== LINES ===================

  /**
   * Line cursor starting at the line that contains offset. Positions it
   * returns are not adjusted for edits made while iterating.
   */
  lineIterator(offset: number): LineIterator {
    this._checkOffset(offset);
    return new LineIterator(this.store, offset);
  }

  /**
   * Anchor index, bootstrapped on first use
   */
  get anchors(): LineAnchorIndex {
    if (!this._anchors) {
      this._anchors = new LineAnchorIndex(this.store, {
        maxScanLines: this.config.maxScanLines,
        maxScanBytes: this.config.maxScanBytes,
        lineSampleBytes: this.config.lineSampleBytes,
        averageLineLength: this.config.averageLineLength,
        onRefine: (anchor, error) => this._notify(
          NotificationType.ANCHOR_REFINED,
          'info',
          `Anchor ${anchor.id} corrected by ${error} lines`,
          { anchorId: anchor.id, line: anchor.estimatedLine, error }
        )
      });
    }
    return this._anchors;
  }

  /**
   * Whether line queries are answered from exact newline aggregates
   */
  get exactLines(): boolean {
    return this._linesCounted;
  }

  /**
   * Line count; estimated from the average line length until every chunk has
   * been counted on a lazily numbered buffer
   */
  lineCount(): LineCount {
    this._checkOpen();
    if (this._linesCounted) {
      return { value: this.store.lineCount(), exact: true };
    }
    const estimate = Math.floor(this.store.byteLength() / this.anchors.averageLineLength) + 1;
    return { value: estimate, exact: false };
  }

  /**
   * Count every newline so that line queries become exact. O(n) on first call.
   */
  countAllLines(): number {
    this._checkOpen();
    const count = this.store.lineCount();
    this._linesCounted = true;
    return count;
  }

  /**
   * Start byte of a line
   */
  lineToByte(line: number): LineLookup {
    this._checkOpen();
    const cached = this.markers.queryLine(line);
    if (cached) {
      return { line, byteOffset: cached.start, confidence: Confidence.EXACT, anchorId: null };
    }

    if (this._linesCounted) {
      const offset = this.store.lineToOffset(line);
      if (offset === -1) {
        throw BufferError.outOfBounds('Line', line, this.store.lineCount());
      }
      return { line, byteOffset: offset, confidence: Confidence.EXACT, anchorId: null };
    }
    return this.anchors.lineToByte(line);
  }

  /**
   * Line containing a byte offset, with the start of that line
   */
  byteToLine(offset: number): LineLookup {
    this._checkOpen();
    if (this._linesCounted) {
      const line = this.store.offsetToLine(offset);
      return { line, byteOffset: this.store.lineToOffset(line), confidence: Confidence.EXACT, anchorId: null };
    }

    for (const marker of this.markers.queryPoint(offset)) {
      const line = lineOf(marker);
      if (line !== null) {
        return { line, byteOffset: marker.start, confidence: Confidence.EXACT, anchorId: null };
      }
    }
    return this.anchors.byteToLine(offset);
  }

  /**
   * 1-based display form of a line lookup; estimates are prefixed with "~"
   */
  formatLineNumber(lookup: LineLookup): string {
    const prefix = lookup.confidence === Confidence.EXACT ? '' : '~';
    return `${prefix}${lookup.line + 1}`;
  }

  /**
   * Cache line boundaries as line markers, starting from a line whose start
   * is known exactly. Returns the number of markers added.
   */
  cacheLines(startLine: number, count: number): number {
    this._checkOpen();
    const start = this.lineToByte(startLine);
    if (start.confidence !== Confidence.EXACT) {
      logger.debug(`[DEBUG] cacheLines: line ${startLine} is not exact, skipping`);
      return 0;
    }

    const length = this.store.byteLength();
    let pos = start.byteOffset;
    let added = 0;
    for (let line = startLine; line < startLine + count; line++) {
      const existing = this.markers.queryLine(line);
      if (existing) {
        if (existing.end === length && existing.start === existing.end) break;
        pos = existing.end;
        if (pos === length && this.store.byteAt(length - 1) !== 0x0a) break;
        continue;
      }

      const newline = pos < length ? this.store.findNewline(pos, length - pos) : -1;
      const lineEnd = newline === -1 ? length : newline + 1;
      if (this.markers.insertMarker({ start: pos, end: lineEnd }, { kind: 'line', line }, Affinity.BEFORE) !== null) {
        added++;
      }
      if (newline === -1) break;
      pos = lineEnd;
    }
    return added;
  }

  /**
   * Replace cached lines touching an edit, plus one on each side, with
   * freshly scanned ones
   */
  private _rescanLines(start: number, end: number): void {
    if (this.markers.getStats().lineMarkerCount === 0) return;
    const touching = this.markers.lineMarkersTouching(start, end);
    if (touching.length === 0) return;

    const collected = new Map<MarkerId, ResolvedMarker>(touching.map(marker => [marker.id, marker]));
    const first = touching[0];
    const last = touching.reduce((a, b) => (b.end > a.end ? b : a));
    if (first.start > 0) {
      for (const marker of this.markers.queryPoint(first.start - 1)) {
        if (lineOf(marker) !== null) collected.set(marker.id, marker);
      }
    }
    for (const marker of this.markers.queryPoint(last.end)) {
      if (lineOf(marker) !== null) collected.set(marker.id, marker);
    }

    const length = this.store.byteLength();
    const reachesEnd = [...collected.values()].some(marker => marker.end === length);
    if (reachesEnd) {
      // The final empty line is rescanned too
      for (const marker of this.markers.queryPoint(length)) {
        if (lineOf(marker) !== null) collected.set(marker.id, marker);
      }
    }

    const markers = [...collected.values()];
    let base = markers[0];
    for (const marker of markers) {
      const line = lineOf(marker) ?? Infinity;
      if (marker.start < base.start || (marker.start === base.start && line < (lineOf(base) ?? Infinity))) base = marker;
    }
    const baseLine = lineOf(base);
    const rescanEnd = Math.max(end, ...markers.map(marker => marker.end));

    for (const marker of markers) {
      this.markers.removeMarker(marker.id);
    }

    if (baseLine === null || (base.start > 0 && this.store.byteAt(base.start - 1) !== 0x0a)) {
      logger.debug(`[DEBUG] rescan: ${markers.length} line markers dropped, no line start to rescan from`);
      return;
    }

    let pos = base.start;
    let line = baseLine;
    let created = 0;
    for (;;) {
      const newline = pos < length ? this.store.findNewline(pos, length - pos) : -1;
      const lineEnd = newline === -1 ? length : newline + 1;
      if (this.markers.insertMarker({ start: pos, end: lineEnd }, { kind: 'line', line }, Affinity.BEFORE) !== null) {
        created++;
      }
      if (newline === -1) break;
      pos = lineEnd;
      line++;
      if (pos >= rescanEnd && !(pos === length && reachesEnd)) break;
    }

    this._notify(
      NotificationType.LINES_RESCANNED,
      'info',
      `Rescanned ${created} lines from line ${baseLine}`,
      { removed: markers.length, created, fromLine: baseLine }
    );
  }

  // =================== POSITIONS ===================

  /**
   * Start of the character before pos
   */
  prevCharBoundary(pos: number): number {
    this._checkOffset(pos);
    let current = pos;
    for (let i = 0; i < 4 && current > 0; i++) {
      current--;
      if (!isContinuationByte(this.store.byteAt(current))) return current;
    }
    return Math.max(0, pos - 1);
  }

  /**
   * Start of the character after the one at pos
   */
  nextCharBoundary(pos: number): number {
    this._checkOffset(pos);
    const length = this.store.byteLength();
    let current = pos;
    for (let i = 0; i < 4 && current < length; i++) {
      current++;
      if (current >= length || !isContinuationByte(this.store.byteAt(current))) return current;
    }
    return Math.min(length, pos + 1);
  }

  /**
   * Start of the word before pos
   */
  prevWordBoundary(pos: number): number {
    this._checkOffset(pos);
    let current = pos;
    while (current > 0 && !isWordByte(this.store.byteAt(current - 1))) current--;
    while (current > 0 && isWordByte(this.store.byteAt(current - 1))) current--;
    return current;
  }

  /**
   * End of the word at or after pos
   */
  nextWordBoundary(pos: number): number {
    this._checkOffset(pos);
    const length = this.store.byteLength();
    let current = pos;
    while (current < length && !isWordByte(this.store.byteAt(current))) current++;
    while (current < length && isWordByte(this.store.byteAt(current))) current++;
    return current;
  }

  /**
   * Line and byte column of an offset
   */
  positionToLineCol(offset: number): LineCharPosition {
    const lookup = this.byteToLine(offset);
    return { line: lookup.line, character: offset - lookup.byteOffset };
  }

  /**
   * Offset of a line and byte column. Lines past the end map to the end of
   * the buffer; columns past the line end map to the line end.
   */
  lineColToPosition(position: LineCharPosition): number {
    const bounds = this._lineBounds(position.line);
    if (!bounds) return this.byteLength();
    return bounds.start + Math.min(Math.max(0, position.character), bounds.end - bounds.start);
  }

  /**
   * Line and UTF-16 column of an offset
   */
  positionToLspPosition(offset: number): LineCharPosition {
    const lookup = this.byteToLine(offset);
    return { line: lookup.line, character: utf16Length(this.store.slice(lookup.byteOffset, offset)) };
  }

  /**
   * Offset of a line and UTF-16 column, clamped like lineColToPosition
   */
  lspPositionToByte(position: LineCharPosition): number {
    const bounds = this._lineBounds(position.line);
    if (!bounds) return this.byteLength();

    const text = this.store.slice(bounds.start, bounds.end).toString('utf8');
    let units = 0;
    let bytes = 0;
    for (const ch of text) {
      if (units >= position.character) break;
      units += ch.length;
      bytes += Buffer.byteLength(ch, 'utf8');
    }
    return bounds.start + Math.min(bytes, bounds.end - bounds.start);
  }

  /**
   * Start of a line and the end of its content (before the newline), or
   * null when the line does not exist
   */
  private _lineBounds(line: number): ByteRange | null {
    let start: number;
    try {
      start = this.lineToByte(line).byteOffset;
    } catch (error) {
      if (error instanceof BufferError) return null;
      throw error;
    }
    const length = this.store.byteLength();
    const newline = start < length ? this.store.findNewline(start, length - start) : -1;
    return { start, end: newline === -1 ? length : newline };
  }

  // =================== SEARCH ===================

  /**
   * Next occurrence of pattern at or after from. Without a range the search
   * wraps around to the start of the buffer; with a range it stays inside it.
   */
  findNext(pattern: Buffer | string, from: number, range: ByteRange | null = null): number {
    this._checkOpen();
    const needle = typeof pattern === 'string' ? Buffer.from(pattern, 'utf8') : pattern;
    if (needle.length === 0) return -1;
    const length = this.store.byteLength();

    if (range) {
      const searchStart = Math.max(from, range.start);
      const searchEnd = Math.min(range.end, length);
      return searchStart < searchEnd ? this.store.indexOf(needle, searchStart, searchEnd) : -1;
    }

    const start = Math.min(Math.max(0, from), length);
    const found = this.store.indexOf(needle, start, length);
    if (found !== -1 || start === 0) return found;
    return this.store.indexOf(needle, 0, Math.min(length, start + needle.length - 1));
  }

  /**
   * Next match of a regular expression at or after from, with the same
   * wrap-around and range rules as findNext. The buffer is read in
   * overlapping windows, so a match must fit in REGEX_OVERLAP_BYTES to be
   * found across a window edge. Byte offsets assume valid UTF-8.
   */
  findNextRegex(regex: RegExp, from: number, range: ByteRange | null = null): number {
    this._checkOpen();
    const length = this.store.byteLength();

    if (range) {
      const searchStart = Math.max(from, range.start);
      const searchEnd = Math.min(range.end, length);
      return searchStart < searchEnd ? this._findRegex(regex, searchStart, searchEnd) : -1;
    }

    const start = Math.min(Math.max(0, from), length);
    const found = start < length ? this._findRegex(regex, start, length) : -1;
    if (found !== -1 || start === 0) return found;
    return this._findRegex(regex, 0, start);
  }

  /**
   * Replace the next occurrence of pattern at or after from (wrapping
   * around); returns where it was, or -1
   */
  replaceNext(pattern: Buffer | string, replacement: Buffer | string, from: number): number {
    const needle = typeof pattern === 'string' ? Buffer.from(pattern, 'utf8') : pattern;
    const found = this.findNext(needle, from);
    if (found === -1) return -1;
    this.replace(found, found + needle.length, replacement);
    return found;
  }

  /**
   * Replace every non-overlapping occurrence of pattern, scanning left to
   * right; returns the number replaced
   */
  replaceAll(pattern: Buffer | string, replacement: Buffer | string): number {
    this._checkOpen();
    const needle = typeof pattern === 'string' ? Buffer.from(pattern, 'utf8') : pattern;
    if (needle.length === 0) return 0;

    const length = this.store.byteLength();
    const matches: number[] = [];
    let pos = 0;
    while (pos < length) {
      const found = this.store.indexOf(needle, pos, length);
      if (found === -1) break;
      matches.push(found);
      pos = found + needle.length;
    }

    // Back to front, so earlier offsets stay valid
    for (let i = matches.length - 1; i >= 0; i--) {
      this.replace(matches[i], matches[i] + needle.length, replacement);
    }
    logger.debug(`[DEBUG] replaceAll: ${matches.length} replacements`);
    return matches.length;
  }

  /**
   * First regex match that ends inside [start, end). Matches ending in a
   * window's overlap were already seen in the window before it.
   */
  private _findRegex(regex: RegExp, start: number, end: number): number {
    const flags = regex.flags.replace('y', '');
    const pattern = new RegExp(regex.source, flags.includes('g') ? flags : `${flags}g`);

    let windowStart = this._charStartAtOrBefore(start);
    let fresh = start;
    while (windowStart < end) {
      const windowEnd = windowStart + REGEX_WINDOW_BYTES >= end
        ? end
        : this._charStartAtOrBefore(windowStart + REGEX_WINDOW_BYTES);
      const text = this.store.slice(windowStart, windowEnd).toString('utf8');

      pattern.lastIndex = 0;
      let match = pattern.exec(text);
      while (match !== null) {
        const matchStart = windowStart + Buffer.byteLength(text.slice(0, match.index), 'utf8');
        const matchEnd = matchStart + Buffer.byteLength(match[0], 'utf8');
        if (matchStart >= start && matchEnd > fresh && matchEnd <= end) return matchStart;
        if (match[0].length === 0) pattern.lastIndex++;
        match = pattern.exec(text);
      }

      if (windowEnd >= end) break;
      fresh = windowEnd;
      windowStart = Math.max(windowStart + 1, this._charStartAtOrBefore(windowEnd - REGEX_OVERLAP_BYTES));
    }
    return -1;
  }

  private _charStartAtOrBefore(offset: number): number {
    let pos = offset;
    const floor = Math.max(0, offset - 3);
    while (pos > floor && pos < this.store.byteLength() && isContinuationByte(this.store.byteAt(pos))) pos--;
    return pos;
  }

  // =================== LIFECYCLE ===================

  getStats(): TextBufferStats {
    return {
      store: this.store.getStats(),
      markers: this.markers.getStats(),
      anchors: this._anchors ? this._anchors.getStats() : null
    };
  }

  get isClosed(): boolean {
    return this._closed;
  }

  /**
   * Drop markers and anchors. Snapshots taken earlier stay readable until released.
   */
  close(): void {
    if (this._closed) return;
    this.markers.clear();
    this._anchors = null;
    this.editListeners = [];
    this._closed = true;
    logger.debug('[DEBUG] TextBuffer closed');
  }

  private _checkOpen(): void {
    if (this._closed) {
      throw new Error('Buffer is closed');
    }
  }

  private _checkOffset(offset: number): void {
    this._checkOpen();
    const length = this.store.byteLength();
    if (!Number.isInteger(offset) || offset < 0 || offset > length) {
      throw BufferError.outOfBounds('Offset', offset, length);
    }
  }
}

export { TextBuffer };
