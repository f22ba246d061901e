/**
 * UTF-8 boundary checks and line-ending normalization applied before bytes
 * reach the chunk store
 */

import { LineEnding } from '../types/buffer-types';

const LF = 0x0a;
const CR = 0x0d;

/**
 * True for UTF-8 continuation bytes (10xxxxxx)
 */
function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Bytes in the UTF-8 sequence a lead byte starts; 1 for ASCII and stray bytes
 */
function sequenceLength(lead: number): number {
  if ((lead & 0xe0) === 0xc0) return 2;
  if ((lead & 0xf0) === 0xe0) return 3;
  if ((lead & 0xf8) === 0xf0) return 4;
  return 1;
}

/**
 * Count LF bytes in data
 */
function countNewlines(data: Buffer, start: number = 0, end: number = data.length): number {
  let count = 0;
  let pos = data.indexOf(LF, start);
  while (pos !== -1 && pos < end) {
    count++;
    pos = data.indexOf(LF, pos + 1);
  }
  return count;
}

/**
 * Detect the dominant line ending of a file's bytes
 */
function detectLineEnding(data: Buffer): LineEnding {
  let lf = 0;
  let crlf = 0;
  let cr = 0;

  for (let i = 0; i < data.length; i++) {
    if (data[i] === CR) {
      if (data[i + 1] === LF) {
        crlf++;
        i++;
      } else {
        cr++;
      }
    } else if (data[i] === LF) {
      lf++;
    }
  }

  if (crlf > lf && crlf >= cr) return LineEnding.CRLF;
  if (cr > lf && cr > crlf) return LineEnding.CR;
  return LineEnding.LF;
}

/**
 * Convert CRLF and lone CR to LF
 */
function normalizeLineEndings(data: Buffer): { data: Buffer; lineEnding: LineEnding } {
  const lineEnding = detectLineEnding(data);
  if (data.indexOf(CR) === -1) {
    return { data, lineEnding };
  }

  const out = Buffer.allocUnsafe(data.length);
  let written = 0;
  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (byte === CR) {
      out[written++] = LF;
      if (data[i + 1] === LF) i++;
    } else {
      out[written++] = byte;
    }
  }

  return { data: out.subarray(0, written), lineEnding };
}

/**
 * Convert LF line endings back to the given style for writing
 */
function applyLineEnding(data: Buffer, lineEnding: LineEnding): Buffer {
  if (lineEnding === LineEnding.LF) return data;

  const newlines = countNewlines(data);
  if (newlines === 0) return data;

  if (lineEnding === LineEnding.CR) {
    const out = Buffer.from(data);
    for (let i = 0; i < out.length; i++) {
      if (out[i] === LF) out[i] = CR;
    }
    return out;
  }

  const out = Buffer.allocUnsafe(data.length + newlines);
  let written = 0;
  for (let i = 0; i < data.length; i++) {
    if (data[i] === LF) out[written++] = CR;
    out[written++] = data[i];
  }
  return out;
}

/**
 * Length in UTF-16 code units of UTF-8 bytes
 */
function utf16Length(data: Buffer): number {
  return data.toString('utf8').length;
}

export {
  LF,
  isContinuationByte,
  sequenceLength,
  countNewlines,
  detectLineEnding,
  normalizeLineEndings,
  applyLineEnding,
  utf16Length
};
