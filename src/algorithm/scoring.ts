/**
 * Priority Scoring Module
 *
 * Every strategy gives each product a `priorityScore` and then processes
 * products in descending score order. Array.prototype.sort is stable, so
 * equal scores keep their input order and runs are deterministic.
 *
 * NORMALIZATION
 * The balanced composite uses one normalization per factor: daily velocity
 * over 50 units/day and unit value over 50, both capped at 1. Attach rate is
 * already a probability and novelty is 0 or 1.
 */

import { AllocationStrategy, OptimizationWeights, Product } from './types';
import { SCORE_NORMALIZATION, SHELF_SELECTION } from './constants';
import { isNewProduct } from './product';
import { Shelf } from './shelf';

// ============================================================================
// Per-strategy scores
// ============================================================================

/**
 * Weighted composite of sales, value, attach rate and novelty, each in [0, 1].
 */
export const balancedScore = (product: Product, weights: OptimizationWeights): number => {
  const salesScore = Math.min(product.salesVelocity / SCORE_NORMALIZATION.velocityCeiling, 1);
  const valueScore = Math.min(product.unitValue / SCORE_NORMALIZATION.valueCeiling, 1);
  const noveltyScore = isNewProduct(product) ? 1 : 0;

  return (
    salesScore * weights.salesVelocity +
    valueScore * weights.profitability +
    product.attachRate * weights.attachRate +
    noveltyScore * weights.novelty
  );
};

/**
 * Value of a product's sales: price × daily velocity.
 */
export const salesValue = (product: Product): number => product.price * product.salesVelocity;

/**
 * Total value potential per cm of a single facing.
 */
export const valueDensityScore = (product: Product): number =>
  (product.unitValue * product.totalQuantity) / product.width;

/**
 * Total value potential per cm of the minimum display width.
 */
export const profitEfficiencyScore = (product: Product): number =>
  (product.unitValue * product.totalQuantity) / (product.width * product.minFacings);

/**
 * Priority score of a product under a strategy.
 */
export function priorityScore(
  product: Product,
  strategy: AllocationStrategy,
  weights: OptimizationWeights
): number {
  switch (strategy) {
    case 'salesVelocity':
      return product.weeklySales;
    case 'categoryGrouped':
      return salesValue(product);
    case 'valueDensity':
      return valueDensityScore(product);
    case 'profitEfficiency':
      return profitEfficiencyScore(product);
    case 'balanced':
    default:
      return balancedScore(product, weights);
  }
}

/**
 * Write every product's priority score and return a new array sorted by it,
 * highest first. Ties keep input order.
 */
export function sortByPriority(
  products: Product[],
  strategy: AllocationStrategy,
  weights: OptimizationWeights
): Product[] {
  for (const product of products) {
    product.priorityScore = priorityScore(product, strategy, weights);
  }
  return [...products].sort((a, b) => b.priorityScore - a.priorityScore);
}

// ============================================================================
// Shelf selection
// ============================================================================

/**
 * Score of a shelf for the balanced strategy: placement score, a bonus when
 * the shelf already shows the product's category, a height-fit bonus, and a
 * penalty that grows with how full the shelf is.
 *
 * @param holdsCategory - Whether the shelf already holds a product of the same category
 */
export function shelfSelectionScore(shelf: Shelf, product: Product, holdsCategory: boolean): number {
  let score = shelf.placementScore(product);

  if (holdsCategory) {
    score += SHELF_SELECTION.categoryAffinityBonus;
  }

  const heightRatio = product.height / shelf.height;
  const [fitMin, fitMax] = SHELF_SELECTION.heightFitRange;
  if (heightRatio >= fitMin && heightRatio <= fitMax) {
    score += SHELF_SELECTION.heightFitBonus;
  }

  score -= (shelf.utilization / 100) * SHELF_SELECTION.utilizationPenalty;

  return score;
}
