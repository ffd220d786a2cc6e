/**
 * Placement Strategies
 *
 * Each strategy receives the filtered products already sorted by its own
 * priority score (see scoring.ts), places them through the run's
 * PlacementContext, and returns the products it had to reject.
 *
 * Every facing count a strategy attempts is within the product's
 * [minFacings, maxFacings] range, and every failed attempt is retried once at
 * minFacings (PlacementContext.tryPlace) before the next shelf is tried.
 */

import {
  AllocationStrategy,
  Placement,
  Product,
  ProductCategory
} from './types';
import {
  CATEGORY_LABELS,
  CATEGORY_TIERS,
  STRATEGY_THRESHOLDS
} from './constants';
import { capFacings, resolveFacings } from './product';
import { salesValue, shelfSelectionScore } from './scoring';
import { PlacementContext } from './placement-context';
import { Shelf } from './shelf';

/**
 * Places products and returns the rejected ones.
 */
export type StrategyRunner = (ctx: PlacementContext, products: Product[]) => Product[];

// ============================================================================
// Shared helpers
// ============================================================================

/**
 * Warning text for a product that found no space.
 */
export const rejectionMessage = (product: Product, detail?: string): string => {
  const minWidth = (product.width * product.minFacings).toFixed(1);
  const suffix = detail ? `, ${detail}` : '';
  return `Could not place ${product.name} (needs ${minWidth}cm at ${product.minFacings} facing(s)${suffix})`;
};

const eyeLevelShelves = (ctx: PlacementContext): Shelf[] =>
  ctx.shelves.filter(s => s.eyeLevelScore >= STRATEGY_THRESHOLDS.eyeLevelShelfScore);

const belowEyeLevelShelves = (ctx: PlacementContext): Shelf[] =>
  ctx.shelves.filter(s => s.eyeLevelScore < STRATEGY_THRESHOLDS.eyeLevelShelfScore);

const byUtilizationAsc = (shelves: readonly Shelf[]): Shelf[] =>
  [...shelves].sort((a, b) => a.utilization - b.utilization);

const holdsCategory = (ctx: PlacementContext, shelf: Shelf, category: ProductCategory): boolean =>
  ctx.productsOn(shelf).some(p => p.category === category);

// ============================================================================
// Bump-out
// ============================================================================

export interface BumpOutResult {
  placement: Placement;
  displaced: Product;
}

/**
 * Make room for `product` by displacing one placed product with strictly
 * lower sales velocity.
 *
 * Candidates are tried slowest first (placement order on ties). Each one is
 * removed, the product is tried on the freed shelf, and the candidate is put
 * back at its old position when that fails. Bundle members are never
 * displaced. A product is never displaced by one of equal or lower velocity.
 */
export function bumpOut(ctx: PlacementContext, product: Product, facings: number): BumpOutResult | null {
  const candidates = ctx
    .entries()
    .filter(e =>
      e.product.salesVelocity < product.salesVelocity &&
      !ctx.isBundleMember(e.product.id) &&
      e.shelf.fitsDimensions(product)
    )
    .sort((a, b) => a.product.salesVelocity - b.product.salesVelocity);

  for (const candidate of candidates) {
    ctx.remove(candidate.product.id);

    const placement = ctx.tryPlace(candidate.shelf, product, facings);
    if (placement) {
      ctx.logger.debug(`Bumped ${candidate.product.id} off shelf ${candidate.shelf.id} for ${product.id}`);
      return { placement, displaced: candidate.product };
    }

    ctx.restore(candidate.shelf, candidate.product, candidate.placement);
  }

  return null;
}

/**
 * Bump-out followed by one attempt to re-home the displaced product at its
 * minimum facings. Displaced products that find no space are added to
 * `rejected` with a warning.
 */
export function placeWithBumpOut(
  ctx: PlacementContext,
  product: Product,
  facings: number,
  rejected: Product[]
): Placement | null {
  const bumped = bumpOut(ctx, product, facings);
  if (!bumped) return null;

  const { displaced } = bumped;
  const rehomed = ctx.tryPlaceOnAny(byUtilizationAsc(ctx.shelves), displaced, displaced.minFacings);
  if (!rehomed) {
    rejected.push(displaced);
    ctx.warn(`${displaced.name} was displaced by faster-selling ${product.name} and could not be re-placed`);
  }

  return bumped.placement;
}

// ============================================================================
// Sales velocity
// ============================================================================

/**
 * Fast movers first. Products above the high-velocity threshold try eye-level
 * shelves before the rest; everything else tries lower shelves first. When no
 * shelf has room, bump-out displaces a slower product.
 */
export const placeBySalesVelocity: StrategyRunner = (ctx, products) => {
  const rejected: Product[] = [];
  const eyeLevel = eyeLevelShelves(ctx);
  const fallbackOrder = [...belowEyeLevelShelves(ctx), ...eyeLevel];

  for (const product of products) {
    const facings = resolveFacings(product, 'salesBased', ctx.rules);
    let placement: Placement | null = null;

    if (product.salesVelocity > STRATEGY_THRESHOLDS.highVelocity) {
      placement = ctx.tryPlaceOnAny(eyeLevel, product, facings);
    }
    placement = placement ?? ctx.tryPlaceOnAny(fallbackOrder, product, facings);
    placement = placement ?? placeWithBumpOut(ctx, product, facings, rejected);

    if (!placement) {
      rejected.push(product);
      ctx.warn(rejectionMessage(product, `sales ${product.salesVelocity.toFixed(1)}/day`));
    }
  }

  return rejected;
};

// ============================================================================
// Category grouping
// ============================================================================

/**
 * Shelves of the three visibility tiers: eye level, middle and low.
 */
export const categoryTiers = (shelves: readonly Shelf[]): [Shelf[], Shelf[], Shelf[]] => [
  shelves.filter(s => s.eyeLevelScore >= CATEGORY_TIERS.eyeLevelMin),
  shelves.filter(s => s.eyeLevelScore >= CATEGORY_TIERS.midLevelMin && s.eyeLevelScore < CATEGORY_TIERS.eyeLevelMin),
  shelves.filter(s => s.eyeLevelScore < CATEGORY_TIERS.midLevelMin)
];

/**
 * Rank categories by total sales value and pin them, round robin, to the
 * eye-level, middle and low tiers. Returns the categories in rank order with
 * their products and tier.
 */
export function assignCategoryTiers(
  products: Product[],
  shelves: readonly Shelf[]
): { category: ProductCategory; products: Product[]; shelves: Shelf[] }[] {
  const groups = new Map<ProductCategory, Product[]>();
  for (const product of products) {
    const group = groups.get(product.category) ?? [];
    group.push(product);
    groups.set(product.category, group);
  }

  const ranked = [...groups.entries()]
    .map(([category, members]) => ({
      category,
      members,
      total: members.reduce((sum, p) => sum + salesValue(p), 0)
    }))
    .sort((a, b) => b.total - a.total);

  const tiers = categoryTiers(shelves);
  return ranked.map((entry, i) => ({
    category: entry.category,
    products: entry.members,
    shelves: tiers[i % tiers.length]
  }));
}

/**
 * Place each category on its tier, fastest sellers first. A product that
 * finds no room on its tier falls back to its minimum facings on any shelf.
 */
export const placeByCategory: StrategyRunner = (ctx, products) => {
  const rejected: Product[] = [];

  for (const assignment of assignCategoryTiers(products, ctx.shelves)) {
    const members = [...assignment.products].sort((a, b) => b.salesVelocity - a.salesVelocity);

    for (const product of members) {
      const facings = resolveFacings(product, 'balanced', ctx.rules);
      const placement =
        ctx.tryPlaceOnAny(assignment.shelves, product, facings) ??
        ctx.tryPlaceOnAny(ctx.shelves, product, product.minFacings);

      if (!placement) {
        rejected.push(product);
        ctx.warn(rejectionMessage(product, `category ${CATEGORY_LABELS[product.category]}`));
      }
    }
  }

  return rejected;
};

// ============================================================================
// Value density & profit efficiency
// ============================================================================

/**
 * Highest value per cm first, on the most visible shelves first.
 * High-margin products get up to three facings.
 */
export const placeByValueDensity: StrategyRunner = (ctx, products) => {
  const rejected: Product[] = [];
  const byVisibility = [...ctx.shelves].sort((a, b) => b.eyeLevelScore - a.eyeLevelScore);

  for (const product of products) {
    const facings = product.profit > STRATEGY_THRESHOLDS.highMarginValue
      ? capFacings(product, Math.min(product.maxFacings, STRATEGY_THRESHOLDS.highMarginFacings), ctx.rules)
      : resolveFacings(product, 'balanced', ctx.rules);

    if (!ctx.tryPlaceOnAny(byVisibility, product, facings)) {
      rejected.push(product);
      ctx.warn(rejectionMessage(product));
    }
  }

  return rejected;
};

/**
 * Facing count for profitEfficiency: more facings for higher margins.
 */
export const marginFacings = (ctx: PlacementContext, product: Product): number => {
  if (product.profit > STRATEGY_THRESHOLDS.premiumMarginProfit) {
    return capFacings(product, Math.min(product.maxFacings, STRATEGY_THRESHOLDS.premiumMarginFacings), ctx.rules);
  }
  if (product.profit > STRATEGY_THRESHOLDS.mediumMarginProfit) {
    return capFacings(product, Math.min(product.maxFacings, STRATEGY_THRESHOLDS.mediumMarginFacings), ctx.rules);
  }
  return resolveFacings(product, 'balanced', ctx.rules);
};

/**
 * Highest value per cm of minimum display width first. Efficient products
 * try eye-level shelves first; everything falls back to the emptiest shelves.
 */
export const placeByProfitEfficiency: StrategyRunner = (ctx, products) => {
  const rejected: Product[] = [];
  const eyeLevel = eyeLevelShelves(ctx);

  for (const product of products) {
    const facings = marginFacings(ctx, product);
    let placement: Placement | null = null;

    if (product.priorityScore > STRATEGY_THRESHOLDS.highEfficiency) {
      placement = ctx.tryPlaceOnAny(eyeLevel, product, facings);
    }
    placement = placement ?? ctx.tryPlaceOnAny(byUtilizationAsc(ctx.shelves), product, facings);

    if (!placement) {
      rejected.push(product);
      ctx.warn(rejectionMessage(product));
    }
  }

  return rejected;
};

// ============================================================================
// Balanced
// ============================================================================

/**
 * Best shelf for a product under the balanced strategy, among shelves that
 * can take its minimum facings. The first shelf wins ties.
 */
export function findOptimalShelf(ctx: PlacementContext, product: Product): Shelf | null {
  let best: Shelf | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const shelf of ctx.shelves) {
    if (!shelf.canFit(product, product.minFacings)) continue;
    const score = shelfSelectionScore(shelf, product, holdsCategory(ctx, shelf, product.category));
    if (score > bestScore) {
      best = shelf;
      bestScore = score;
    }
  }

  return best;
}

/**
 * Composite-score order with smart shelf selection. Stores that require
 * category grouping use the category placement instead.
 */
export const placeBalanced: StrategyRunner = (ctx, products) => {
  if (ctx.rules.categoryGrouping) {
    return placeByCategory(ctx, products);
  }

  const rejected: Product[] = [];

  for (const product of products) {
    const facings = resolveFacings(product, 'balanced', ctx.rules);
    const best = findOptimalShelf(ctx, product);
    const placement =
      (best ? ctx.tryPlace(best, product, facings) : null) ??
      ctx.tryPlaceOnAny(ctx.shelves, product, facings);

    if (!placement) {
      rejected.push(product);
      ctx.warn(rejectionMessage(product));
    }
  }

  return rejected;
};

export const STRATEGY_RUNNERS: Record<AllocationStrategy, StrategyRunner> = {
  salesVelocity: placeBySalesVelocity,
  categoryGrouped: placeByCategory,
  valueDensity: placeByValueDensity,
  profitEfficiency: placeByProfitEfficiency,
  balanced: placeBalanced
};
