/**
 * Span Utility Tests
 */

import {
  createSpan,
  spanWidth,
  spanCenter,
  spansOverlap,
  spanContains,
  mergeSpans,
  findFreeSpans
} from './span';

describe('Span utilities', () => {
  describe('spanWidth', () => {
    it('should measure the distance between start and end', () => {
      expect(spanWidth(createSpan(2, 32))).toBe(30);
    });

    it('should never return a negative width', () => {
      expect(spanWidth(createSpan(10, 4))).toBe(0);
    });
  });

  describe('spanCenter', () => {
    it('should return the midpoint', () => {
      expect(spanCenter(createSpan(10, 30))).toBe(20);
    });
  });

  describe('spansOverlap', () => {
    it('should detect overlapping spans', () => {
      expect(spansOverlap(createSpan(0, 10), createSpan(5, 15))).toBe(true);
    });

    it('should treat touching spans as not overlapping', () => {
      expect(spansOverlap(createSpan(0, 10), createSpan(10, 20))).toBe(false);
      expect(spansOverlap(createSpan(10, 20), createSpan(0, 10))).toBe(false);
    });

    it('should detect containment as overlap', () => {
      expect(spansOverlap(createSpan(0, 100), createSpan(40, 60))).toBe(true);
    });
  });

  describe('spanContains', () => {
    it('should accept a span on the boundary', () => {
      expect(spanContains(createSpan(2, 98), createSpan(2, 98))).toBe(true);
    });

    it('should reject a span that sticks out', () => {
      expect(spanContains(createSpan(2, 98), createSpan(90, 99))).toBe(false);
    });
  });

  describe('mergeSpans', () => {
    it('should merge overlapping and touching spans in order', () => {
      const merged = mergeSpans([
        createSpan(30, 40),
        createSpan(0, 10),
        createSpan(10, 15),
        createSpan(35, 50)
      ]);

      expect(merged).toEqual([
        { start: 0, end: 15 },
        { start: 30, end: 50 }
      ]);
    });

    it('should not mutate the input spans', () => {
      const input = [createSpan(0, 10), createSpan(5, 20)];
      mergeSpans(input);
      expect(input[0]).toEqual({ start: 0, end: 10 });
    });
  });

  describe('findFreeSpans', () => {
    it('should return the whole interior of empty bounds minus the margin', () => {
      expect(findFreeSpans([], createSpan(0, 100), 2)).toEqual([{ start: 2, end: 98 }]);
    });

    it('should skip gaps that are fully consumed by the margin', () => {
      const free = findFreeSpans(
        [createSpan(2, 32), createSpan(34, 54)],
        createSpan(0, 100),
        2
      );

      expect(free).toEqual([{ start: 56, end: 98 }]);
    });

    it('should report holes between occupied spans', () => {
      const free = findFreeSpans(
        [createSpan(2, 12), createSpan(40, 50)],
        createSpan(0, 60),
        2
      );

      expect(free).toEqual([
        { start: 14, end: 38 },
        { start: 52, end: 58 }
      ]);
    });

    it('should return nothing when the bounds are full', () => {
      expect(findFreeSpans([createSpan(0, 20)], createSpan(0, 20), 1)).toEqual([]);
    });
  });
});
