/**
 * Shelf Model Module
 *
 * A shelf owns an ordered list of placements. Placements are always sorted by
 * xStart, never overlap, and keep `gapSize` clear of each other and of both
 * shelf walls. Every mutation goes through the methods below so those
 * invariants hold after each call.
 */

import { Placement, Product, ShelfConfig, ShelfType } from './types';
import { Span, ShelfZone, POSITION_EPSILON } from '../types/geometry';
import { createSpan, findFreeSpans, spanCenter, spanContains, spanWidth } from '../geometry/span';
import { DEFAULT_GAP_SIZE, PLACEMENT_SCORE } from './constants';

export class Shelf {
  readonly id: string;
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly depth: number;
  readonly yPosition: number;
  readonly type: ShelfType;
  readonly eyeLevelScore: number;

  /** Spacing kept between placements and from the walls; set by the engine per run */
  gapSize: number;

  private items: Placement[] = [];

  constructor(config: ShelfConfig, gapSize: number = DEFAULT_GAP_SIZE) {
    this.id = config.id;
    this.name = config.name;
    this.width = config.width;
    this.height = config.height;
    this.depth = config.depth;
    this.yPosition = config.yPosition;
    this.type = config.type;
    this.eyeLevelScore = config.eyeLevelScore;
    this.gapSize = gapSize;
  }

  // ==========================================================================
  // Derived properties
  // ==========================================================================

  get placements(): readonly Placement[] {
    return this.items;
  }

  get area(): number {
    return this.width * this.height;
  }

  get isEyeLevel(): boolean {
    return this.eyeLevelScore >= PLACEMENT_SCORE.eyeLevelThreshold;
  }

  get isPremium(): boolean {
    return this.type === ShelfType.Premium || this.type === ShelfType.Promotional;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  get totalFacings(): number {
    return this.items.reduce((sum, p) => sum + p.facings, 0);
  }

  /**
   * Width taken by placements plus the gaps between them.
   */
  get usedWidth(): number {
    if (this.items.length === 0) return 0;
    const placementWidth = this.items.reduce((sum, p) => sum + p.width, 0);
    return placementWidth + (this.items.length - 1) * this.gapSize;
  }

  /**
   * Percentage of the shelf width consumed by placements and the gaps between them.
   */
  get utilization(): number {
    return (this.usedWidth / this.width) * 100;
  }

  /**
   * Free spans a new placement could occupy, already clear of every
   * neighbour and wall by `gapSize`.
   */
  freeGaps(): Span[] {
    return findFreeSpans(
      this.items.map(p => createSpan(p.xStart, p.xEnd)),
      createSpan(0, this.width),
      this.gapSize
    );
  }

  /**
   * Width of the widest free gap. On a shelf packed from the left this is
   * the shelf width minus used width minus every gap already consumed.
   */
  get availableWidth(): number {
    return this.freeGaps().reduce((widest, gap) => Math.max(widest, spanWidth(gap)), 0);
  }

  /**
   * Widest free gap, ties broken toward the gap whose center is nearest the
   * shelf's horizontal midpoint.
   */
  largestGap(): Span | null {
    const midpoint = this.width / 2;
    let best: Span | null = null;

    for (const gap of this.freeGaps()) {
      if (best === null) {
        best = gap;
        continue;
      }
      const widthDiff = spanWidth(gap) - spanWidth(best);
      if (widthDiff > POSITION_EPSILON) {
        best = gap;
      } else if (
        Math.abs(widthDiff) <= POSITION_EPSILON &&
        Math.abs(spanCenter(gap) - midpoint) < Math.abs(spanCenter(best) - midpoint)
      ) {
        best = gap;
      }
    }

    return best;
  }

  // ==========================================================================
  // Fit tests
  // ==========================================================================

  /**
   * Check the product's height and depth against the shelf.
   */
  fitsDimensions(product: Product): boolean {
    return product.height <= this.height && product.depth <= this.depth;
  }

  /**
   * Check if `facings` of the product fit in the widest free gap.
   */
  canFit(product: Product, facings: number = 1): boolean {
    if (!this.fitsDimensions(product)) return false;
    return product.width * facings <= this.availableWidth + POSITION_EPSILON;
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Insert the product into the leftmost free gap wide enough for it. On a
   * shelf packed from the left that is right after the last placement plus
   * one gap. Returns null, without changing anything, when nothing fits.
   */
  addPlacement(product: Product, facings: number): Placement | null {
    if (!this.fitsDimensions(product)) return null;

    const width = product.width * facings;
    const gap = this.freeGaps().find(g => spanWidth(g) + POSITION_EPSILON >= width);
    if (!gap) return null;

    return this.insert({ productId: product.id, facings, width, xStart: gap.start, xEnd: gap.start + width });
  }

  /**
   * Place the product with its left edge at `xStart`. The whole span must lie
   * inside one free gap. Returns null, without changing anything, otherwise.
   */
  placeAt(product: Product, facings: number, xStart: number): Placement | null {
    if (!this.fitsDimensions(product)) return null;

    const width = product.width * facings;
    const span = createSpan(xStart, xStart + width);
    if (!this.freeGaps().some(gap => spanContains(gap, span))) return null;

    return this.insert({ productId: product.id, facings, width, xStart, xEnd: xStart + width });
  }

  /**
   * Remove a product's placement. Returns the removed placement, or null when
   * the product is not on this shelf.
   */
  removePlacement(productId: string): Placement | null {
    const index = this.items.findIndex(p => p.productId === productId);
    if (index === -1) return null;
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  /**
   * Recompute every position left to right in the current order, starting one
   * gap from the left wall with one gap between neighbours. Placement objects
   * are updated in place.
   */
  reflow(gapSize: number = this.gapSize): void {
    let cursor = gapSize;
    for (const placement of this.items) {
      placement.xStart = cursor;
      placement.xEnd = cursor + placement.width;
      cursor = placement.xEnd + gapSize;
    }
  }

  /**
   * Sort placements with `compare` (stable), then reflow.
   */
  reorder(compare: (a: Placement, b: Placement) => number): void {
    this.items.sort(compare);
    this.reflow();
  }

  /**
   * Rewrite positions in the current order from explicit left edges. Used by
   * spacing passes that need uneven gaps; the caller checks the layout fits.
   */
  setPositions(xStarts: number[]): void {
    if (xStarts.length !== this.items.length) {
      throw new RangeError(`Expected ${this.items.length} positions for shelf ${this.id}, got ${xStarts.length}`);
    }
    this.items.forEach((placement, i) => {
      placement.xStart = xStarts[i];
      placement.xEnd = xStarts[i] + placement.width;
    });
  }

  clear(): void {
    this.items = [];
  }

  private insert(placement: Placement): Placement {
    this.items.push(placement);
    this.items.sort((a, b) => a.xStart - b.xStart);
    return placement;
  }

  // ==========================================================================
  // Scoring & zones
  // ==========================================================================

  /**
   * Heuristic desirability of this shelf for a product. Used to rank
   * candidate shelves only.
   */
  placementScore(product: Product): number {
    let score = 0;

    if (this.isEyeLevel) {
      score += PLACEMENT_SCORE.eyeLevelBonus;
    } else {
      score += PLACEMENT_SCORE.eyeLevelFactor * this.eyeLevelScore;
    }

    if (this.isPremium && product.price > PLACEMENT_SCORE.premiumPriceThreshold) {
      score += PLACEMENT_SCORE.premiumBonus;
    }

    const heightRatio = product.height / this.height;
    const [fitMin, fitMax] = PLACEMENT_SCORE.heightFitRange;
    if (heightRatio >= fitMin && heightRatio <= fitMax) {
      score += PLACEMENT_SCORE.heightFitBonus;
    } else if (heightRatio > fitMax) {
      score += PLACEMENT_SCORE.tightHeightBonus;
    }

    if (
      product.salesVelocity > PLACEMENT_SCORE.fastMoverVelocity &&
      this.eyeLevelScore > PLACEMENT_SCORE.fastMoverEyeLevel
    ) {
      score += PLACEMENT_SCORE.fastMoverBonus;
    }

    return score;
  }

  /**
   * Split placements into left, center and right thirds by their midpoint.
   */
  zones(): Record<ShelfZone, Placement[]> {
    const zones: Record<ShelfZone, Placement[]> = { left: [], center: [], right: [] };
    const third = this.width / 3;

    for (const placement of this.items) {
      const center = (placement.xStart + placement.xEnd) / 2;
      if (center < third) {
        zones.left.push(placement);
      } else if (center < 2 * third) {
        zones.center.push(placement);
      } else {
        zones.right.push(placement);
      }
    }

    return zones;
  }
}
