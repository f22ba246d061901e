/**
 * @fileoverview Common types shared across the buffer core
 * @description Centralized type definitions for chunk storage, markers and line anchors
 */

// =================== CORE BUFFER TYPES ===================

/**
 * Half-open byte range [start, end)
 */
export interface ByteRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Types of buffer operations
 */
export enum OperationType {
  INSERT = 'insert',
  DELETE = 'delete'
}

/**
 * Read access to the bytes of one buffer version, as used by line scanning
 */
export interface LineSource {
  byteLength(): number;
  /** Position of the first newline in [from, from + limit), or -1 */
  findNewline(from: number, limit: number): number;
  /** Position of the last newline in [before - limit, before), or -1 */
  findNewlineBackward(before: number, limit: number): number;
  countNewlines(start: number, end: number): number;
}

// =================== MARKER TYPES ===================

export type MarkerId = number;

/**
 * Which side of an insertion made exactly at a marker boundary the boundary sticks to
 */
export enum Affinity {
  /** Boundary stays before the inserted bytes */
  BEFORE = 'before',
  /** Boundary moves past the inserted bytes */
  AFTER = 'after'
}

export type PositionRole = 'cursor' | 'selection' | 'overlay';

export interface PositionPayload {
  kind: 'position';
  role: PositionRole;
  tag?: string;
}

export interface LinePayload {
  kind: 'line';
  /** 0-based line number */
  line: number;
}

export type MarkerPayload = PositionPayload | LinePayload;

/**
 * A marker with all pending deltas applied
 */
export interface ResolvedMarker {
  id: MarkerId;
  start: number;
  end: number;
  affinity: Affinity;
  payload: MarkerPayload;
}

// =================== LINE ANCHOR TYPES ===================

export type AnchorId = number;

/**
 * How a line number was derived
 */
export enum Confidence {
  EXACT = 'exact',
  ESTIMATED = 'estimated',
  RELATIVE = 'relative'
}

export type AnchorConfidence =
  | { kind: Confidence.EXACT }
  | { kind: Confidence.ESTIMATED }
  | { kind: Confidence.RELATIVE; parentId: AnchorId };

export interface LineAnchor {
  id: AnchorId;
  byteOffset: number;
  estimatedLine: number;
  confidence: AnchorConfidence;
}

/**
 * Result of a line query: the start byte of a line and its number
 */
export interface LineLookup {
  line: number;
  byteOffset: number;
  confidence: Confidence;
  /** Anchor registered or used for the answer, if any */
  anchorId: AnchorId | null;
}

export interface LineCount {
  value: number;
  exact: boolean;
}

/**
 * Line and character position (character counted in bytes or UTF-16 units
 * depending on the method that produced it)
 */
export interface LineCharPosition {
  line: number;
  character: number;
}

// =================== STATS TYPES ===================

export interface ChunkStoreStats {
  version: number;
  byteLength: number;
  chunkCount: number;
  height: number;
  liveSnapshots: number;
}

export interface MarkerTreeStats {
  markerCount: number;
  lineMarkerCount: number;
  positionMarkerCount: number;
}

export interface LineAnchorStats {
  anchorCount: number;
  exactAnchors: number;
  estimatedAnchors: number;
  relativeAnchors: number;
  averageLineLength: number;
  lastScanBytes: number;
}
