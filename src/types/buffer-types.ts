/**
 * Line ending detected when a file is opened
 */
export enum LineEnding {
  LF = 'lf',
  CRLF = 'crlf',
  CR = 'cr'
}

/**
 * Notification types emitted by a TextBuffer
 */
export enum NotificationType {
  BUFFER_OPENED = 'buffer_opened',
  FILE_SAVED = 'file_saved',
  LINES_RESCANNED = 'lines_rescanned',
  ANCHOR_REFINED = 'anchor_refined',
  INVARIANT_VIOLATION = 'invariant_violation'
}

export type NotificationSeverity = 'info' | 'warning' | 'error';

export interface BufferNotification {
  type: NotificationType;
  severity: NotificationSeverity;
  message: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Tunables for one buffer
 */
export interface BufferConfig {
  /** Target chunk size in bytes */
  chunkSize: number;
  /** Maximum children per chunk tree branch */
  branchFactor: number;
  /** Buffers above this size use lazy, anchor-based line numbering */
  largeFileThreshold: number;
  /** Line cap of a single bounded scan */
  maxScanLines: number;
  /** Byte cap of a single bounded scan */
  maxScanBytes: number;
  /**
   * Bytes sampled from the start of the buffer to estimate line length;
   * capped at half of maxScanBytes and charged to the first line query
   */
  lineSampleBytes: number;
  /** Fixed average line length; sampled from the content when null */
  averageLineLength: number | null;
  /** Throw on internal consistency failures instead of logging them */
  strictInvariants: boolean;
}

export const DEFAULT_BUFFER_CONFIG: Readonly<BufferConfig> = {
  chunkSize: 4 * 1024,
  branchFactor: 16,
  largeFileThreshold: 16 * 1024 * 1024,
  maxScanLines: 100,
  maxScanBytes: 10 * 1024,
  lineSampleBytes: 4 * 1024,
  averageLineLength: null,
  strictInvariants: process.env.NODE_ENV !== 'production'
};

function requirePositiveInteger(name: string, value: number, minimum: number = 1): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new Error(`Invalid buffer config: ${name} must be an integer >= ${minimum} (got ${value})`);
  }
}

/**
 * Merge a partial config over the defaults and validate the result
 */
export function resolveBufferConfig(overrides: Partial<BufferConfig> = {}): BufferConfig {
  const config: BufferConfig = { ...DEFAULT_BUFFER_CONFIG, ...overrides };

  requirePositiveInteger('chunkSize', config.chunkSize, 4);
  requirePositiveInteger('branchFactor', config.branchFactor, 4);
  requirePositiveInteger('largeFileThreshold', config.largeFileThreshold, 0);
  requirePositiveInteger('maxScanLines', config.maxScanLines);
  requirePositiveInteger('maxScanBytes', config.maxScanBytes);
  requirePositiveInteger('lineSampleBytes', config.lineSampleBytes);
  if (config.averageLineLength !== null && !(config.averageLineLength >= 1)) {
    throw new Error(`Invalid buffer config: averageLineLength must be >= 1 (got ${config.averageLineLength})`);
  }

  return config;
}
