/**
 * Post-optimization passes
 *
 * Run once after every product has been placed:
 * 1. Load balancing moves slow sellers off crowded shelves onto empty ones
 * 2. Every shelf is reflowed with uniform gaps
 * 3. Each shelf is reordered so products of the same category and series
 *    stand together
 *
 * Runs with bundles replace steps 2 and 3 with the bundle spacing pass, so
 * bundle blocks stay contiguous.
 */

import { BundlePlacement, Placement, Product } from './types';
import { LOAD_BALANCING } from './constants';
import { PlacementContext } from './placement-context';
import { applyBundleSpacing } from './bundle-placement';
import { Shelf } from './shelf';

// ============================================================================
// Load balancing
// ============================================================================

/**
 * Utilization of a shelf after adding (`delta` > 0) or removing (`delta` < 0)
 * a placement of `width`.
 */
const utilizationAfter = (shelf: Shelf, width: number, delta: 1 | -1): number => {
  const count = shelf.placements.length + delta;
  if (count <= 0) return 0;
  const placementWidth = shelf.placements.reduce((sum, p) => sum + p.width, 0) + delta * width;
  return ((placementWidth + (count - 1) * shelf.gapSize) / shelf.width) * 100;
};

/**
 * Try one move from `donor`. Its slowest non-bundle product goes to the
 * emptiest receiver that can take it, as long as the receiver does not end up
 * fuller than the donor.
 */
function moveOne(ctx: PlacementContext, donor: Shelf, receivers: Shelf[]): boolean {
  const candidate = ctx
    .productsOn(donor)
    .filter(p => !ctx.isBundleMember(p.id))
    .reduce<Product | null>((slowest, p) => (slowest === null || p.salesVelocity < slowest.salesVelocity ? p : slowest), null);
  if (!candidate) return false;

  const entry = ctx.lookup(candidate.id);
  if (!entry) return false;
  const { placement } = entry;

  for (const receiver of receivers) {
    if (!receiver.canFit(candidate, placement.facings)) continue;
    if (utilizationAfter(receiver, placement.width, 1) > utilizationAfter(donor, placement.width, -1)) continue;

    if (ctx.move(candidate.id, receiver)) {
      ctx.logger.debug(`Load balancing moved ${candidate.id} from ${donor.id} to ${receiver.id}`);
      return true;
    }
  }

  return false;
}

/**
 * Move products from shelves above the crowding threshold to shelves below
 * the sparse threshold, at most one move per placement. Returns the number
 * of moves made.
 */
export function balanceLoad(ctx: PlacementContext): number {
  const budget = ctx.entries().length;
  let moves = 0;

  while (moves < budget) {
    const donors = ctx.shelves.filter(s => s.utilization > LOAD_BALANCING.overUtilized);
    const receivers = ctx.shelves
      .filter(s => s.utilization < LOAD_BALANCING.underUtilized)
      .sort((a, b) => a.utilization - b.utilization);
    if (donors.length === 0 || receivers.length === 0) break;

    const moved = donors.some(donor => moveOne(ctx, donor, receivers.filter(r => r !== donor)));
    if (!moved) break;
    moves++;
  }

  if (moves > 0) {
    ctx.logger.info(`Load balancing made ${moves} move(s)`);
  }
  return moves;
}

// ============================================================================
// Reflow & grouping
// ============================================================================

export function reflowAll(ctx: PlacementContext): void {
  for (const shelf of ctx.shelves) {
    shelf.reflow(ctx.gapSize);
  }
}

/**
 * Comparator that keeps each (category, series) group together. Groups
 * appear in the order their first member stood on the shelf.
 */
export function groupingComparator(ctx: PlacementContext, shelf: Shelf): (a: Placement, b: Placement) => number {
  const categoryRank = new Map<string, number>();
  const groupRank = new Map<string, number>();

  const keys = new Map<string, { category: string; group: string }>();
  for (const product of ctx.productsOn(shelf)) {
    const group = `${product.category}|${product.series}`;
    if (!categoryRank.has(product.category)) categoryRank.set(product.category, categoryRank.size);
    if (!groupRank.has(group)) groupRank.set(group, groupRank.size);
    keys.set(product.id, { category: product.category, group });
  }

  const rankOf = (placement: Placement): [number, number] => {
    const key = keys.get(placement.productId);
    if (!key) return [Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER];
    return [categoryRank.get(key.category) ?? 0, groupRank.get(key.group) ?? 0];
  };

  return (a, b) => {
    const [categoryA, groupA] = rankOf(a);
    const [categoryB, groupB] = rankOf(b);
    return categoryA - categoryB || groupA - groupB;
  };
}

/**
 * Reorder every shelf by (category, series) and reflow it.
 */
export function groupByCategory(ctx: PlacementContext): void {
  for (const shelf of ctx.shelves) {
    shelf.reorder(groupingComparator(ctx, shelf));
  }
}

/**
 * Run every post-placement pass. With bundle placements, the bundle spacing
 * pass replaces reflow and grouping.
 */
export function postOptimize(ctx: PlacementContext, bundlePlacements?: readonly BundlePlacement[]): void {
  balanceLoad(ctx);

  if (bundlePlacements) {
    applyBundleSpacing(ctx, bundlePlacements);
    return;
  }

  reflowAll(ctx);
  groupByCategory(ctx);
}
