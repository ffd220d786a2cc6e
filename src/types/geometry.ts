/**
 * Core geometry types for the shelf allocation engine
 * All measurements are in centimetres along a shelf's horizontal axis
 */

/**
 * A half-open horizontal interval [start, end) along a shelf
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Three equal horizontal zones of a shelf, left to right
 */
export type ShelfZone = 'left' | 'center' | 'right';

/**
 * Tolerance for floating-point comparisons of positions and widths.
 * Widths are products of decimal centimetres and facing counts, so exact
 * comparison would reject placements that fit to the micron.
 */
export const POSITION_EPSILON = 1e-6;
