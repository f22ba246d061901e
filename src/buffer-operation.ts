/**
 * @fileoverview Edit event handed to event-log listeners
 * @description Each successful insert or delete on a TextBuffer produces one
 * BufferOperation. It carries enough data to replay the edit and to build
 * its inverse, which is all an undo log needs from the buffer core.
 */

import { OperationType } from './types/common';

/**
 * Anything edits can be replayed against
 */
export interface EditTarget {
  insert(offset: number, data: Buffer | string): number;
  delete(start: number, end: number): number;
}

/**
 * Global operation counter for determining chronological order
 */
let globalOperationCounter: number = 0;

/**
 * Reset the global operation counter (for testing)
 */
function resetOperationCounter(): void {
  globalOperationCounter = 0;
}

/**
 * Get current operation counter value (for testing)
 */
function getOperationCounter(): number {
  return globalOperationCounter;
}

class BufferOperation {
  public readonly type: OperationType;
  public readonly position: number;
  /** Inserted bytes for INSERT, removed bytes for DELETE */
  public readonly data: Buffer;
  /** Buffer version produced by the edit, when known */
  public readonly version: number | null;
  public readonly timestamp: number;
  public readonly operationNumber: number;
  public readonly id: string;

  constructor(
    type: OperationType,
    position: number,
    data: Buffer,
    version: number | null = null,
    timestamp: number | null = null
  ) {
    this.type = type;
    this.position = position;
    this.data = data;
    this.version = version;
    this.timestamp = timestamp ?? Date.now();
    this.operationNumber = ++globalOperationCounter;
    this.id = `op_${this.operationNumber}_${this.timestamp}`;
  }

  static insert(position: number, data: Buffer, version: number | null = null): BufferOperation {
    return new BufferOperation(OperationType.INSERT, position, data, version);
  }

  static delete(position: number, removed: Buffer, version: number | null = null): BufferOperation {
    return new BufferOperation(OperationType.DELETE, position, removed, version);
  }

  /**
   * Change in buffer length caused by this operation
   */
  getSizeImpact(): number {
    return this.type === OperationType.INSERT ? this.data.length : -this.data.length;
  }

  /**
   * End of the affected range in the buffer before the edit
   */
  getEndPosition(): number {
    return this.type === OperationType.INSERT ? this.position : this.position + this.data.length;
  }

  /**
   * Operation that undoes this one
   */
  invert(): BufferOperation {
    const type = this.type === OperationType.INSERT ? OperationType.DELETE : OperationType.INSERT;
    return new BufferOperation(type, this.position, this.data);
  }

  /**
   * Replay on a target; returns the version the target reports
   */
  applyTo(target: EditTarget): number {
    if (this.type === OperationType.INSERT) {
      return target.insert(this.position, this.data);
    }
    return target.delete(this.position, this.position + this.data.length);
  }

  toDescription(): string {
    const verb = this.type === OperationType.INSERT ? 'insert' : 'delete';
    return `${verb} ${this.data.length} bytes at ${this.position}`;
  }
}

export {
  BufferOperation,
  OperationType,
  resetOperationCounter,
  getOperationCounter
};
