/**
 * Bundle Co-placement
 *
 * Products that are bought together are placed as one contiguous block on a
 * single shelf, or split across two vertically adjacent shelves when no shelf
 * can hold the whole block. Everything left over is then placed near related
 * products.
 *
 * Block placement is transactional: when any member fails to go down, the
 * members placed so far are removed again and the shelf is as before.
 */

import {
  AllocationStrategy,
  Bundle,
  BundleMetrics,
  BundlePlacement,
  Placement,
  Product
} from './types';
import { ADJACENT_SHELF_DISTANCE, BUNDLE_SCORE } from './constants';
import { coPurchaseRecordSchema, CoPurchaseRecord, parseOrThrow } from './schemas';
import { resolveFacings } from './product';
import { salesValue } from './scoring';
import { placeWithBumpOut, rejectionMessage } from './strategies';
import { PlacementContext } from './placement-context';
import { Shelf } from './shelf';
import { spanWidth } from '../geometry/span';
import { POSITION_EPSILON } from '../types/geometry';

export interface BundleRunOutcome {
  rejected: Product[];
  placements: BundlePlacement[];
}

// ============================================================================
// Bundle construction
// ============================================================================

/**
 * Resolve co-purchase records against the candidate products.
 *
 * Unknown and repeated ids are dropped, groups left with fewer than two
 * products are discarded, and the rest are sorted by frequency, highest
 * first (input order on ties).
 *
 * @throws ConfigurationError when a record is malformed
 */
export function buildBundles(records: CoPurchaseRecord[], products: Product[]): Bundle[] {
  const byId = new Map(products.map(p => [p.id, p]));
  const bundles: Bundle[] = [];

  for (const record of records) {
    const parsed = parseOrThrow(coPurchaseRecordSchema, record, 'co-purchase record');
    const members: Product[] = [];

    for (const id of parsed.productIds) {
      const product = byId.get(id);
      if (product && !members.includes(product)) {
        members.push(product);
      }
    }

    if (members.length >= 2) {
      bundles.push({ products: members, frequency: parsed.frequency });
    }
  }

  return bundles.sort((a, b) => b.frequency - a.frequency);
}

const bundleNames = (members: readonly Product[]): string => members.map(p => p.name).join(', ');

// ============================================================================
// Block geometry
// ============================================================================

export interface BlockMember {
  product: Product;
  facings: number;
}

const blockMembers = (ctx: PlacementContext, products: readonly Product[]): BlockMember[] =>
  products.map(product => ({ product, facings: resolveFacings(product, 'balanced', ctx.rules) }));

/**
 * Width of members placed side by side with one gap between neighbours.
 */
export const blockWidth = (members: readonly BlockMember[], gapSize: number): number =>
  members.reduce((sum, m) => sum + m.product.width * m.facings, 0) +
  gapSize * Math.max(0, members.length - 1);

const fitsBlock = (shelf: Shelf, members: readonly BlockMember[], width: number): boolean =>
  members.every(m => shelf.fitsDimensions(m.product)) && shelf.availableWidth + POSITION_EPSILON >= width;

/**
 * Desirability of a shelf for a whole bundle.
 */
export function bundleShelfScore(shelf: Shelf, products: readonly Product[], width: number): number {
  let score = products.reduce((sum, p) => sum + shelf.placementScore(p), 0) / products.length;

  const bundleValue = products.reduce((sum, p) => sum + salesValue(p), 0);
  if (bundleValue > BUNDLE_SCORE.highValueThreshold) {
    if (shelf.isEyeLevel) score += BUNDLE_SCORE.eyeLevelBonus;
    if (shelf.isPremium) score += BUNDLE_SCORE.premiumBonus;
  }

  const available = shelf.availableWidth;
  if (available > 0) {
    const ratio = width / available;
    const [low, high] = BUNDLE_SCORE.spaceEfficiencyRange;
    if (ratio >= low && ratio <= high) score += BUNDLE_SCORE.spaceEfficiencyBonus;
  }

  const categories = new Set(products.map(p => p.category));
  if (categories.size <= BUNDLE_SCORE.maxHomogeneousCategories) {
    score += BUNDLE_SCORE.homogeneityBonus;
  }

  return score;
}

/**
 * Place members contiguously, centered in the shelf's largest free gap.
 * Rolls back and returns false when any member fails.
 */
function placeBlock(ctx: PlacementContext, shelf: Shelf, members: readonly BlockMember[]): boolean {
  const width = blockWidth(members, ctx.gapSize);
  const gap = shelf.largestGap();
  if (!gap || spanWidth(gap) + POSITION_EPSILON < width) return false;

  let cursor = gap.start + Math.max(0, (spanWidth(gap) - width) / 2);
  const placed: Placement[] = [];

  for (const { product, facings } of members) {
    const placement = ctx.placeAt(shelf, product, facings, cursor);
    if (!placement) {
      for (const done of placed) ctx.remove(done.productId);
      return false;
    }
    placed.push(placement);
    cursor = placement.xEnd + ctx.gapSize;
  }

  return true;
}

// ============================================================================
// Whole and split placement
// ============================================================================

function placeWhole(ctx: PlacementContext, members: BlockMember[]): Shelf | null {
  const width = blockWidth(members, ctx.gapSize);
  const products = members.map(m => m.product);

  let best: Shelf | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const shelf of ctx.shelves) {
    if (!fitsBlock(shelf, members, width)) continue;
    const score = bundleShelfScore(shelf, products, width);
    if (score > bestScore) {
      best = shelf;
      bestScore = score;
    }
  }

  if (best && placeBlock(ctx, best, members)) return best;
  return null;
}

/**
 * Consecutive shelf pairs (lower, upper) whose vertical distance is under
 * the adjacency limit. Shelves are already ordered bottom to top.
 */
export function adjacentShelfPairs(shelves: readonly Shelf[]): [Shelf, Shelf][] {
  const pairs: [Shelf, Shelf][] = [];
  for (let i = 0; i + 1 < shelves.length; i++) {
    const lower = shelves[i];
    const upper = shelves[i + 1];
    if (Math.abs(upper.yPosition - (lower.yPosition + lower.height)) < ADJACENT_SHELF_DISTANCE) {
      pairs.push([lower, upper]);
    }
  }
  return pairs;
}

function placeSplit(ctx: PlacementContext, members: BlockMember[]): [Shelf, Shelf] | null {
  const half = Math.floor(members.length / 2);
  const first = members.slice(0, half);
  const second = members.slice(half);

  for (const [lower, upper] of adjacentShelfPairs(ctx.shelves)) {
    if (!fitsBlock(lower, first, blockWidth(first, ctx.gapSize))) continue;
    if (!fitsBlock(upper, second, blockWidth(second, ctx.gapSize))) continue;

    if (!placeBlock(ctx, lower, first)) continue;
    if (!placeBlock(ctx, upper, second)) {
      for (const m of first) ctx.remove(m.product.id);
      continue;
    }
    return [lower, upper];
  }

  return null;
}

/**
 * Place one bundle whole, or split, or not at all. Members already placed by
 * an earlier bundle are left where they are.
 */
export function placeBundle(ctx: PlacementContext, bundle: Bundle): BundlePlacement | null {
  const pending = bundle.products.filter(p => !ctx.isPlaced(p.id));
  if (pending.length < 2) {
    ctx.warn(`Skipped bundle (${bundleNames(bundle.products)}): fewer than 2 members left to place`);
    return null;
  }

  const members = blockMembers(ctx, pending);
  const productIds = pending.map(p => p.id);

  const shelf = placeWhole(ctx, members);
  if (shelf) {
    productIds.forEach(id => ctx.markBundleMember(id));
    return { productIds, shelfIds: [shelf.id], split: false };
  }

  const pair = placeSplit(ctx, members);
  if (pair) {
    productIds.forEach(id => ctx.markBundleMember(id));
    ctx.warn(`Split bundle (${bundleNames(pending)}) across shelves ${pair[0].name} and ${pair[1].name}`);
    return { productIds, shelfIds: [pair[0].id, pair[1].id], split: true };
  }

  ctx.warn(`Could not place bundle (${bundleNames(pending)}); members will be placed individually`);
  return null;
}

// ============================================================================
// Remaining products
// ============================================================================

/**
 * Shelf holding the most products of the same category or series, if any.
 */
export function findRelatedShelf(ctx: PlacementContext, product: Product): Shelf | null {
  let best: Shelf | null = null;
  let bestCount = 0;

  for (const shelf of ctx.shelves) {
    const related = ctx
      .productsOn(shelf)
      .filter(p => p.category === product.category || (product.series !== '' && p.series === product.series))
      .length;
    if (related > bestCount) {
      best = shelf;
      bestCount = related;
    }
  }

  return best;
}

function placeRemaining(
  ctx: PlacementContext,
  products: Product[],
  strategy: AllocationStrategy,
  rejected: Product[]
): void {
  const mode = strategy === 'salesVelocity' ? 'salesBased' : 'balanced';

  for (const product of products) {
    if (ctx.isPlaced(product.id)) continue;

    const facings = resolveFacings(product, mode, ctx.rules);
    const related = findRelatedShelf(ctx, product);
    const leastUtilized = [...ctx.shelves].sort((a, b) => a.utilization - b.utilization);

    let placement = (related ? ctx.tryPlace(related, product, facings) : null) ??
      ctx.tryPlaceOnAny(leastUtilized, product, facings);

    if (!placement && strategy === 'salesVelocity') {
      placement = placeWithBumpOut(ctx, product, facings, rejected);
    }

    if (!placement) {
      rejected.push(product);
      ctx.warn(rejectionMessage(product));
    }
  }
}

/**
 * Bundles first, in frequency order, then every other product in priority
 * order.
 */
export function placeWithBundles(
  ctx: PlacementContext,
  products: Product[],
  bundles: Bundle[],
  strategy: AllocationStrategy
): BundleRunOutcome {
  const placements: BundlePlacement[] = [];
  const rejected: Product[] = [];

  for (const bundle of bundles) {
    const placed = placeBundle(ctx, bundle);
    if (placed) placements.push(placed);
  }
  ctx.logger.info(`Placed ${placements.length} of ${bundles.length} bundles`);

  placeRemaining(ctx, products, strategy, rejected);

  return { rejected, placements };
}

// ============================================================================
// Spacing & metrics
// ============================================================================

/**
 * Left edges for a shelf's placements with one extra gap wherever a bundle
 * block meets a product outside it. Returns null when that layout would not
 * fit the shelf.
 */
export function bundleSpacedPositions(
  shelf: Shelf,
  bundleOf: ReadonlyMap<string, number>,
  gapSize: number
): number[] | null {
  const positions: number[] = [];
  let cursor = gapSize;
  let previous: Placement | null = null;

  for (const placement of shelf.placements) {
    if (previous) {
      const boundary = bundleOf.get(previous.productId) !== bundleOf.get(placement.productId);
      cursor += boundary ? 2 * gapSize : gapSize;
    }
    positions.push(cursor);
    cursor += placement.width;
    previous = placement;
  }

  return cursor + gapSize <= shelf.width ? positions : null;
}

/**
 * Reflow every shelf, separating bundle blocks from their neighbours by an
 * extra gap where the shelf has room for it.
 */
export function applyBundleSpacing(ctx: PlacementContext, placements: readonly BundlePlacement[]): void {
  const bundleOf = new Map<string, number>();
  placements.forEach((bp, i) => bp.productIds.forEach(id => bundleOf.set(id, i)));

  for (const shelf of ctx.shelves) {
    const positions = bundleSpacedPositions(shelf, bundleOf, ctx.gapSize);
    if (positions) {
      shelf.setPositions(positions);
    } else {
      shelf.reflow(ctx.gapSize);
    }
  }
}

export function calculateBundleMetrics(
  bundles: readonly Bundle[],
  placements: readonly BundlePlacement[],
  totalPlaced: number
): BundleMetrics {
  const productsInBundles = new Set(placements.flatMap(bp => bp.productIds)).size;
  const sizes = placements.map(bp => bp.productIds.length);

  return {
    totalBundles: bundles.length,
    bundlesPlaced: placements.length,
    splitBundles: placements.filter(bp => bp.split).length,
    productsInBundles,
    averageBundleSize: sizes.length > 0 ? sizes.reduce((a, b) => a + b, 0) / sizes.length : 0,
    bundleCoverage: totalPlaced > 0 ? (productsInBundles / totalPlaced) * 100 : 0
  };
}
