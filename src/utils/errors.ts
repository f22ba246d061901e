/**
 * Error kinds raised by the buffer core
 */
enum BufferErrorKind {
  OUT_OF_BOUNDS = 'out_of_bounds',
  INVALID_BOUNDARY = 'invalid_boundary',
  INVALID_INTERVAL = 'invalid_interval',
  INVARIANT_VIOLATION = 'invariant_violation',
  RELEASED_SNAPSHOT = 'released_snapshot'
}

/**
 * Error carrying a machine-readable kind and the offending values
 */
class BufferError extends Error {
  public readonly kind: BufferErrorKind;
  public readonly details: Record<string, number>;

  constructor(kind: BufferErrorKind, message: string, details: Record<string, number> = {}) {
    super(message);
    this.name = 'BufferError';
    this.kind = kind;
    this.details = details;
  }

  static outOfBounds(what: string, value: number, length: number): BufferError {
    return new BufferError(
      BufferErrorKind.OUT_OF_BOUNDS,
      `${what} ${value} is out of bounds (buffer length: ${length})`,
      { value, length }
    );
  }

  static invalidRange(start: number, end: number, length: number): BufferError {
    return new BufferError(
      BufferErrorKind.OUT_OF_BOUNDS,
      `Range [${start}, ${end}) is out of bounds (buffer length: ${length})`,
      { start, end, length }
    );
  }

  static invalidBoundary(offset: number): BufferError {
    return new BufferError(
      BufferErrorKind.INVALID_BOUNDARY,
      `Offset ${offset} falls inside a multi-byte character`,
      { offset }
    );
  }

  static invalidInterval(start: number, end: number): BufferError {
    return new BufferError(
      BufferErrorKind.INVALID_INTERVAL,
      `Invalid interval [${start}, ${end})`,
      { start, end }
    );
  }

  static invariantViolation(message: string, details: Record<string, number> = {}): BufferError {
    return new BufferError(BufferErrorKind.INVARIANT_VIOLATION, `Invariant violation: ${message}`, details);
  }
}

function isBufferError(error: unknown, kind?: BufferErrorKind): error is BufferError {
  return error instanceof BufferError && (kind === undefined || error.kind === kind);
}

/**
 * Message of an unknown thrown value
 */
function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { BufferError, BufferErrorKind, isBufferError, errorMessage };
