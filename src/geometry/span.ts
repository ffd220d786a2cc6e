/**
 * Span utility functions
 * Spans are half-open intervals [start, end) along one axis
 */

import { Span, POSITION_EPSILON } from '../types/geometry';

/**
 * Creates a new span
 */
export function createSpan(start: number, end: number): Span {
  return { start, end };
}

/**
 * Width of a span (never negative)
 */
export function spanWidth(span: Span): number {
  return Math.max(0, span.end - span.start);
}

/**
 * Midpoint of a span
 */
export function spanCenter(span: Span): number {
  return (span.start + span.end) / 2;
}

/**
 * Checks if two spans overlap. Touching spans do not overlap.
 */
export function spansOverlap(a: Span, b: Span): boolean {
  return !(
    a.end <= b.start + POSITION_EPSILON ||
    b.end <= a.start + POSITION_EPSILON
  );
}

/**
 * Checks if `inner` lies entirely within `outer`
 */
export function spanContains(outer: Span, inner: Span): boolean {
  return (
    inner.start >= outer.start - POSITION_EPSILON &&
    inner.end <= outer.end + POSITION_EPSILON
  );
}

/**
 * Sorts spans by start and merges overlapping or touching ones.
 * Returns new span objects; the input is not modified.
 */
export function mergeSpans(spans: Span[]): Span[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start);

  const merged: Span[] = [];
  for (const span of sorted) {
    if (merged.length === 0) {
      merged.push({ ...span });
      continue;
    }
    const last = merged[merged.length - 1];
    if (span.start <= last.end + POSITION_EPSILON) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ ...span });
    }
  }

  return merged;
}

/**
 * Finds the free spans inside `bounds` that are not covered by `occupied`.
 *
 * Every free span keeps `margin` clear of its neighbours on both sides, and
 * the bounds' edges count as neighbours. Spans left with no width once the
 * margin is applied are dropped.
 *
 * @param occupied - Spans already in use (any order, may overlap)
 * @param bounds - Outer limits, e.g. [0, shelf width]
 * @param margin - Clearance to keep from every neighbour and edge
 */
export function findFreeSpans(occupied: Span[], bounds: Span, margin: number = 0): Span[] {
  const free: Span[] = [];
  let cursor = bounds.start;

  const pushIfOpen = (start: number, end: number): void => {
    if (end - start > POSITION_EPSILON) {
      free.push(createSpan(start, end));
    }
  };

  for (const range of mergeSpans(occupied)) {
    pushIfOpen(cursor + margin, range.start - margin);
    cursor = Math.max(cursor, range.end);
  }
  pushIfOpen(cursor + margin, bounds.end - margin);

  return free;
}
