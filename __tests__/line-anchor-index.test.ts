/**
 * LineAnchorIndex tests: counting, estimation, refinement and edit adjustment
 */

import { ChunkStore } from '../src/chunk-store';
import { LineAnchorIndex, type LineAnchorIndexOptions } from '../src/line-anchor-index';
import { Confidence, type LineAnchor } from '../src/types/common';
import { BufferErrorKind, isBufferError } from '../src/utils/errors';
import { testUtils } from './setup';

const STORE_OPTIONS = { chunkSize: 4096, branchFactor: 16 };

function storeOf(text: string): ChunkStore {
  return ChunkStore.fromBytes(Buffer.from(text, 'utf8'), STORE_OPTIONS);
}

function indexOptions(overrides: Partial<LineAnchorIndexOptions> = {}): LineAnchorIndexOptions {
  return {
    maxScanLines: 100,
    maxScanBytes: 10240,
    lineSampleBytes: 65536,
    averageLineLength: null,
    ...overrides
  };
}

describe('LineAnchorIndex', () => {
  // 10000 lines of exactly 100 bytes: line n starts at n * 100
  let hugeStore: ChunkStore;

  beforeAll(() => {
    hugeStore = storeOf(testUtils.fixedWidthLines(10000, 100));
  });

  describe('Configuration', () => {
    test('should sample the average line length when none is configured', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions());

      expect(index.averageLineLength).toBeCloseTo(100, 0);
    });

    test('should charge the sample to the first query that needs it', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions());

      const first = index.lineToByte(50);
      const firstScan = index.lastScanBytes;
      index.lineToByte(51);

      // 5120 sampled bytes, then 50 lines of 100 bytes
      expect(first).toEqual({ line: 50, byteOffset: 5000, confidence: Confidence.EXACT, anchorId: 1 });
      expect(firstScan).toBe(10120);
      expect(firstScan).toBeLessThanOrEqual(index.scanBudgetBytes);
      expect(index.lastScanBytes).toBe(100);
    });

    test('should fall back to one byte per line for an empty source', () => {
      const index = new LineAnchorIndex(storeOf(''), indexOptions());

      expect(index.averageLineLength).toBe(1);
    });

    test('should size the scan budget from lines or bytes, whichever is larger', () => {
      expect(new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 80 })).scanBudgetBytes).toBe(10240);
      expect(new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 200 })).scanBudgetBytes).toBe(20000);
    });

    test('should start with an exact anchor at the origin', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));

      expect(index.getAnchors()).toEqual([
        { id: 0, byteOffset: 0, estimatedLine: 0, confidence: { kind: Confidence.EXACT } }
      ]);
    });
  });

  describe('Counting near an exact anchor', () => {
    test('should count lines exactly within the budget', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));

      const lookup = index.lineToByte(50);

      expect(lookup).toEqual({ line: 50, byteOffset: 5000, confidence: Confidence.EXACT, anchorId: 1 });
      expect(index.lastScanBytes).toBe(5000);
    });

    test('should answer from an exact anchor on the line without scanning', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));
      index.lineToByte(50);

      const lookup = index.lineToByte(50);

      expect(lookup.byteOffset).toBe(5000);
      expect(lookup.confidence).toBe(Confidence.EXACT);
      expect(index.lastScanBytes).toBe(0);
    });

    test('should resolve lines on a small buffer', () => {
      const index = new LineAnchorIndex(storeOf('a\nb\nc'), indexOptions());

      expect(index.lineToByte(2)).toEqual({ line: 2, byteOffset: 4, confidence: Confidence.EXACT, anchorId: 1 });
      expect(index.byteToLine(3)).toEqual({ line: 1, byteOffset: 2, confidence: Confidence.EXACT, anchorId: 2 });
    });

    test('should count backwards from a later anchor', () => {
      const index = new LineAnchorIndex(storeOf('a\nb\nc'), indexOptions());

      expect(index.byteToLine(4)).toEqual({ line: 2, byteOffset: 4, confidence: Confidence.EXACT, anchorId: 1 });
      expect(index.byteToLine(3)).toEqual({ line: 1, byteOffset: 2, confidence: Confidence.EXACT, anchorId: 2 });
      expect(index.lastScanBytes).toBe(3);
    });

    test('should reject lines past the end when counting from an exact anchor', () => {
      const index = new LineAnchorIndex(storeOf('a\nb\nc'), indexOptions());

      const error = testUtils.thrownBy(() => index.lineToByte(3));

      expect(isBufferError(error, BufferErrorKind.OUT_OF_BOUNDS)).toBe(true);
    });

    test('should reject negative lines and offsets past the end', () => {
      const index = new LineAnchorIndex(storeOf('a\nb\nc'), indexOptions());

      expect(isBufferError(testUtils.thrownBy(() => index.lineToByte(-1)), BufferErrorKind.OUT_OF_BOUNDS)).toBe(true);
      expect(isBufferError(testUtils.thrownBy(() => index.byteToLine(6)), BufferErrorKind.OUT_OF_BOUNDS)).toBe(true);
    });
  });

  describe('Estimation far from any anchor', () => {
    test('should extrapolate and snap to a line start with an accurate average', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));

      const lookup = index.lineToByte(5000);

      expect(lookup).toEqual({ line: 5000, byteOffset: 500000, confidence: Confidence.ESTIMATED, anchorId: 1 });
      expect(index.lastScanBytes).toBe(1);
    });

    test('should count relative to an estimated anchor', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));
      index.lineToByte(5000);

      const lookup = index.lineToByte(5003);

      expect(lookup).toEqual({ line: 5003, byteOffset: 500300, confidence: Confidence.RELATIVE, anchorId: 2 });
      expect(index.getAnchor(2)?.confidence).toEqual({ kind: Confidence.RELATIVE, parentId: 1 });
      expect(index.lastScanBytes).toBe(300);
    });

    test('should estimate the line of a far byte offset', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));

      const lookup = index.byteToLine(500040);

      expect(lookup).toEqual({ line: 5000, byteOffset: 500000, confidence: Confidence.ESTIMATED, anchorId: 1 });
      expect(index.lastScanBytes).toBe(41);
    });

    test('should not register an estimate that lands past the end', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));

      const lookup = index.lineToByte(20000);

      expect(lookup).toEqual({ line: 20000, byteOffset: 1000000, confidence: Confidence.ESTIMATED, anchorId: null });
      expect(index.getStats().anchorCount).toBe(1);
    });

    test('should keep drift as an estimate rather than an error', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 80 }));

      const lookup = index.lineToByte(5000);

      // 400000 is really line 4000
      expect(lookup).toEqual({ line: 5000, byteOffset: 400000, confidence: Confidence.ESTIMATED, anchorId: 1 });
    });
  });

  describe('Refinement', () => {
    test('should correct relative descendants and make them exact', () => {
      const refinements: Array<{ anchor: LineAnchor; error: number }> = [];
      const index = new LineAnchorIndex(hugeStore, indexOptions({
        averageLineLength: 80,
        onRefine: (anchor, error) => refinements.push({ anchor, error })
      }));
      const estimated = index.lineToByte(5000);
      const relative = index.byteToLine(400250);
      expect(relative).toEqual({ line: 5002, byteOffset: 400200, confidence: Confidence.RELATIVE, anchorId: 2 });

      expect(index.refine(1, 4000)).toBe(true);

      expect(estimated.anchorId).toBe(1);
      expect(index.getAnchor(1)).toEqual({
        id: 1, byteOffset: 400000, estimatedLine: 4000, confidence: { kind: Confidence.EXACT }
      });
      expect(index.getAnchor(2)).toEqual({
        id: 2, byteOffset: 400200, estimatedLine: 4002, confidence: { kind: Confidence.EXACT }
      });
      expect(refinements).toHaveLength(1);
      expect(refinements[0].error).toBe(-1000);
      expect(refinements[0].anchor.estimatedLine).toBe(4000);
    });

    test('should refuse to refine exact or unknown anchors', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 100 }));

      expect(index.refine(0, 0)).toBe(false);
      expect(index.refine(42, 7)).toBe(false);
    });

    test('should answer exactly once the anchor has been refined', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 80 }));
      index.lineToByte(5000);
      index.refine(1, 4000);

      const lookup = index.lineToByte(4001);

      expect(lookup).toEqual({ line: 4001, byteOffset: 400100, confidence: Confidence.EXACT, anchorId: 2 });
    });
  });

  describe('Edit adjustment', () => {
    function smallIndex(): { store: ChunkStore; index: LineAnchorIndex } {
      const store = storeOf('aaaa\nbbbb\ncccc\ndddd\n');
      const index = new LineAnchorIndex(store, indexOptions({ averageLineLength: 5 }));
      index.lineToByte(1);
      index.lineToByte(2);
      index.lineToByte(3);
      return { store, index };
    }

    test('should shift anchors after an insertion', () => {
      const { store, index } = smallIndex();

      store.insert(0, Buffer.from('xx\n'));
      index.adjustForEdit(0, 3, 1);

      expect(index.getAnchors().map(anchor => [anchor.byteOffset, anchor.estimatedLine])).toEqual([
        [0, 0], [8, 2], [13, 3], [18, 4]
      ]);
      expect(index.lineToByte(4).byteOffset).toBe(18);
    });

    test('should drop anchors inside a deleted range', () => {
      const { store, index } = smallIndex();

      store.delete(7, 12);
      index.adjustForEdit(7, -5, -1);

      expect(index.getAnchors().map(anchor => [anchor.byteOffset, anchor.estimatedLine])).toEqual([
        [0, 0], [5, 1], [10, 2]
      ]);
      expect(index.lineToByte(2)).toEqual({ line: 2, byteOffset: 10, confidence: Confidence.EXACT, anchorId: 3 });
    });

    test('should drop the relative children of a dropped estimated anchor', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 80 }));
      index.lineToByte(5000);
      index.byteToLine(400250);
      expect(index.getAnchor(2)?.confidence).toEqual({ kind: Confidence.RELATIVE, parentId: 1 });

      index.adjustForEdit(399990, -20, 0);

      expect(index.getAnchor(1)).toBeNull();
      expect(index.getAnchor(2)).toBeNull();
      expect(index.getAnchors().map(anchor => anchor.id)).toEqual([0]);
    });

    test('should refine anchors a count steps onto without scanning again', () => {
      const store = storeOf(testUtils.fixedWidthLines(10000, 100));
      const refinements: number[] = [];
      const index = new LineAnchorIndex(store, indexOptions({
        averageLineLength: 80,
        onRefine: (_anchor, error) => refinements.push(error)
      }));
      // Lands on 400000, which is really line 4000
      index.lineToByte(5000);
      // Leaves line 0, then the old lines 3999 onwards: the anchor moves to 200
      store.delete(100, 399900);
      index.adjustForEdit(100, -399800, -3998);
      expect(index.getAnchor(1)).toEqual({
        id: 1, byteOffset: 200, estimatedLine: 1002, confidence: { kind: Confidence.ESTIMATED }
      });
      const countSpy = jest.spyOn(store, 'countNewlines');

      const lookup = index.lineToByte(3);

      expect(lookup).toEqual({ line: 3, byteOffset: 300, confidence: Confidence.EXACT, anchorId: 2 });
      expect(refinements).toEqual([-1000]);
      expect(index.getAnchor(1)).toEqual({
        id: 1, byteOffset: 200, estimatedLine: 2, confidence: { kind: Confidence.EXACT }
      });
      expect(countSpy).not.toHaveBeenCalled();
      expect(index.lastScanBytes).toBe(300);
    });

    test('should never lower the confidence of a surviving anchor', () => {
      const store = storeOf(testUtils.fixedWidthLines(3000, 60));
      const index = new LineAnchorIndex(store, indexOptions({ averageLineLength: 45 }));
      const random = testUtils.seededRandom(5);
      const rank: Record<Confidence, number> = {
        [Confidence.ESTIMATED]: 0,
        [Confidence.RELATIVE]: 1,
        [Confidence.EXACT]: 2
      };
      const seen = new Map<number, number>();

      for (let step = 0; step < 400; step++) {
        const roll = random();
        const length = store.byteLength();
        if (roll < 0.2 && length > 200) {
          const start = testUtils.randomInt(random, 0, length - 100);
          const end = start + testUtils.randomInt(random, 1, 100);
          const lines = store.countNewlines(start, end);
          store.delete(start, end);
          index.adjustForEdit(start, start - end, -lines);
        } else if (roll < 0.35) {
          const offset = testUtils.randomInt(random, 0, length + 1);
          store.insert(offset, Buffer.from('ab\ncd\n'));
          index.adjustForEdit(offset, 6, 2);
        } else if (roll < 0.7) {
          index.lineToByte(testUtils.randomInt(random, 0, store.lineCount()));
        } else {
          index.byteToLine(testUtils.randomInt(random, 0, length + 1));
        }

        for (const anchor of index.getAnchors()) {
          const current = rank[anchor.confidence.kind];
          expect(current).toBeGreaterThanOrEqual(seen.get(anchor.id) ?? current);
          seen.set(anchor.id, current);
        }
      }
    });
  });

  describe('Bounded scans', () => {
    test('should keep anchors ordered, exact anchors correct and every scan within budget', () => {
      const index = new LineAnchorIndex(hugeStore, indexOptions({ averageLineLength: 80 }));
      const random = testUtils.seededRandom(11);

      for (let step = 0; step < 300; step++) {
        const lookup = random() < 0.5
          ? index.lineToByte(testUtils.randomInt(random, 0, 10000))
          : index.byteToLine(testUtils.randomInt(random, 0, 1000000));

        expect(index.lastScanBytes).toBeLessThanOrEqual(index.scanBudgetBytes);
        if (lookup.confidence === Confidence.EXACT) {
          expect(Math.floor(lookup.byteOffset / 100)).toBe(lookup.line);
        }
      }

      const anchors = index.getAnchors();
      for (let i = 1; i < anchors.length; i++) {
        expect(anchors[i].byteOffset).toBeGreaterThan(anchors[i - 1].byteOffset);
        expect(anchors[i].estimatedLine).toBeGreaterThan(anchors[i - 1].estimatedLine);
      }
      for (const anchor of anchors) {
        if (anchor.confidence.kind === Confidence.EXACT) {
          expect(anchor.byteOffset).toBe(anchor.estimatedLine * 100);
        }
      }
    });
  });
});
