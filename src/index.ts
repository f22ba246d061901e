/**
 * @fileoverview Chunked text buffer with markers and estimated line numbers
 * @description Storage-and-position core for editing very large files: a
 * persistent chunk tree for content, one lazy-delta interval tree for
 * cursors, overlays and cached line boundaries, and anchor-based line
 * estimation that never scans far from a known point.
 *
 * @example
 * import { TextBuffer, Affinity } from 'chunked-text-buffer';
 *
 * const buffer = await TextBuffer.openFile('server.log');
 * const cursor = buffer.addMarker({ start: 10, end: 10 }, { kind: 'position', role: 'cursor' });
 *
 * buffer.insert(0, 'header\n');
 * buffer.resolveMarker(cursor); // { start: 17, end: 17 }
 *
 * const lookup = buffer.lineToByte(8_500_000);
 * buffer.formatLineNumber(lookup); // "~8500001" until the anchor is refined
 */

import { TextBuffer, type TextBufferStats } from './text-buffer';
import { ChunkStore, ChunkStoreSnapshot, ChunkTreeView, type Version } from './chunk-store';
import { MarkerTree, type MarkerTreeOptions } from './marker-tree';
import { LineAnchorIndex, type LineAnchorIndexOptions } from './line-anchor-index';
import { LineIterator, type LineText } from './line-iterator';
import { BufferOperation, resetOperationCounter, getOperationCounter, type EditTarget } from './buffer-operation';
import { Chunk } from './utils/chunk';
import { BufferError, BufferErrorKind, isBufferError } from './utils/errors';
import { logger, type Logger } from './utils/logger';
import {
  DEFAULT_BUFFER_CONFIG,
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
  OperationType,
  type AnchorConfidence,
  type AnchorId,
  type ByteRange,
  type LineAnchor,
  type LineCharPosition,
  type LineCount,
  type LineLookup,
  type LinePayload,
  type MarkerId,
  type MarkerPayload,
  type PositionPayload,
  type PositionRole,
  type ResolvedMarker
} from './types/common';

export {
  // Core classes
  TextBuffer,
  ChunkStore,
  ChunkStoreSnapshot,
  ChunkTreeView,
  MarkerTree,
  LineAnchorIndex,
  LineIterator,
  Chunk,

  // Edit events
  BufferOperation,
  OperationType,
  resetOperationCounter,
  getOperationCounter,

  // Errors and logging
  BufferError,
  BufferErrorKind,
  isBufferError,
  logger,

  // Configuration
  DEFAULT_BUFFER_CONFIG,
  resolveBufferConfig,

  // Enums and constants
  Affinity,
  Confidence,
  LineEnding,
  NotificationType,

  // Types
  type TextBufferStats,
  type Version,
  type MarkerTreeOptions,
  type LineAnchorIndexOptions,
  type LineText,
  type EditTarget,
  type Logger,
  type BufferConfig,
  type BufferNotification,
  type NotificationSeverity,
  type AnchorConfidence,
  type AnchorId,
  type ByteRange,
  type LineAnchor,
  type LineCharPosition,
  type LineCount,
  type LineLookup,
  type LinePayload,
  type MarkerId,
  type MarkerPayload,
  type PositionPayload,
  type PositionRole,
  type ResolvedMarker
};

// Default export for convenience
export default {
  TextBuffer,
  ChunkStore,
  MarkerTree,
  LineAnchorIndex,
  BufferOperation,
  BufferError,
  BufferErrorKind,
  Affinity,
  Confidence,
  LineEnding,
  NotificationType,
  DEFAULT_BUFFER_CONFIG,
  resolveBufferConfig
};
