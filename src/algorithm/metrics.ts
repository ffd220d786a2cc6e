/**
 * Metrics & Validation
 *
 * Read-only reporting over a finished run: aggregate metrics, validation
 * warnings, a compact summary and a restocking list. Nothing here changes a
 * placement.
 */

import {
  AllocationMetrics,
  AllocationResult,
  AllocationSummary,
  BundleMetrics,
  Placement,
  Product,
  ProductCategory,
  ReorderEntry
} from './types';
import { CATEGORY_LABELS, VALIDATION_THRESHOLDS } from './constants';
import { Store } from './store';
import { EngineLogger } from './utils/logger';

// Restock products whose stock runs out within this multiple of the restock cycle
const REORDER_HORIZON_FACTOR = 1.5;
// Order enough for this many restock cycles
const REORDER_CYCLES = 2;

/**
 * Map of product id to its placement, across every shelf of the store.
 */
export function placementsById(store: Store): Map<string, Placement> {
  const byId = new Map<string, Placement>();
  for (const shelf of store.shelves) {
    for (const placement of shelf.placements) {
      byId.set(placement.productId, placement);
    }
  }
  return byId;
}

// ============================================================================
// Metrics
// ============================================================================

export function calculateMetrics(
  store: Store,
  placed: readonly Product[],
  rejected: readonly Product[],
  bundles?: BundleMetrics
): AllocationMetrics {
  const placements = placementsById(store);

  const categoryDistribution: Partial<Record<ProductCategory, number>> = {};
  const facingsByProduct: Record<string, number> = {};
  let totalFacings = 0;
  let totalWidth = 0;
  let valueTotal = 0;
  let quantityTotal = 0;

  for (const product of placed) {
    const placement = placements.get(product.id);
    if (!placement) continue;

    facingsByProduct[product.id] = placement.facings;
    categoryDistribution[product.category] = (categoryDistribution[product.category] ?? 0) + placement.facings;
    totalFacings += placement.facings;
    totalWidth += placement.width;
    valueTotal += product.unitValue * product.totalQuantity * placement.facings;
    quantityTotal += product.totalQuantity * placement.facings;
  }

  const shelfUtilization = store.shelves.map(shelf => ({
    shelfId: shelf.id,
    shelfName: shelf.name,
    utilization: shelf.utilization,
    products: shelf.placements.length,
    facings: shelf.totalFacings
  }));

  const averageUtilization = shelfUtilization.length > 0
    ? shelfUtilization.reduce((sum, s) => sum + s.utilization, 0) / shelfUtilization.length
    : 0;

  const metrics: AllocationMetrics = {
    totalPlaced: placed.length,
    totalRejected: rejected.length,
    totalFacings,
    categoryDistribution,
    facingsByProduct,
    shelfUtilization,
    averageUtilization,
    profitDensity: totalWidth > 0 ? valueTotal / totalWidth : 0,
    quantityDensity: totalWidth > 0 ? quantityTotal / totalWidth : 0,
    totalShelves: store.shelves.length,
    eyeLevelShelves: store.eyeLevelShelves.length,
    premiumShelves: store.premiumShelves.length,
    totalShelfArea: store.totalShelfArea
  };

  if (bundles) {
    metrics.bundles = bundles;
  }

  return metrics;
}

// ============================================================================
// Validation
// ============================================================================

const averagePrice = (products: readonly Product[]): number =>
  products.length > 0 ? products.reduce((sum, p) => sum + p.price, 0) / products.length : 0;

/**
 * Check a finished placement against the store rules and merchandising
 * heuristics. Findings are returned as warnings; facing-range violations are
 * also logged as errors since the placement primitives should never allow
 * them.
 *
 * @param candidates - Products that survived filtering, used to know which
 *   categories were expected on the shelves
 */
export function validatePlacement(
  store: Store,
  placed: readonly Product[],
  candidates: readonly Product[],
  logger: EngineLogger
): string[] {
  const warnings: string[] = [];
  const productById = new Map(placed.map(p => [p.id, p]));
  const productsOn = (placements: readonly Placement[]): Product[] =>
    placements.flatMap(pl => {
      const product = productById.get(pl.productId);
      return product ? [product] : [];
    });

  const categoryLimit = store.rules.maxCategoriesPerShelf ??
    (store.rules.categoryGrouping ? VALIDATION_THRESHOLDS.groupedMaxCategoriesPerShelf : undefined);
  const overallAveragePrice = averagePrice(placed);

  for (const shelf of store.shelves) {
    const utilization = shelf.utilization;
    if (!shelf.isEmpty && utilization < VALIDATION_THRESHOLDS.underUtilized) {
      warnings.push(`Shelf ${shelf.name} is under-utilized (${utilization.toFixed(1)}%)`);
    }
    if (utilization > VALIDATION_THRESHOLDS.overcrowded) {
      warnings.push(`Shelf ${shelf.name} is overcrowded (${utilization.toFixed(1)}%)`);
    }

    const onShelf = productsOn(shelf.placements);

    if (categoryLimit !== undefined) {
      const categories = new Set(onShelf.map(p => p.category)).size;
      if (categories > categoryLimit) {
        warnings.push(`Shelf ${shelf.name} mixes ${categories} categories (limit ${categoryLimit})`);
      }
    }

    if (shelf.isEyeLevel && onShelf.length > 0) {
      const shelfAverage = averagePrice(onShelf);
      if (shelfAverage < overallAveragePrice) {
        warnings.push(
          `Eye-level shelf ${shelf.name} holds below-average prices (${shelfAverage.toFixed(2)} vs ${overallAveragePrice.toFixed(2)})`
        );
      }
    }
  }

  const minSkus = store.rules.minSkusPerCategory;
  if (minSkus !== undefined && minSkus > 0) {
    const expected = [...new Set(candidates.map(p => p.category))];
    for (const category of expected) {
      const count = placed.filter(p => p.category === category).length;
      if (count < minSkus) {
        warnings.push(`Category ${CATEGORY_LABELS[category]} has ${count} SKU(s) placed, below the minimum of ${minSkus}`);
      }
    }
  }

  const placements = placementsById(store);
  for (const product of placed) {
    const placement = placements.get(product.id);
    if (!placement) continue;
    if (placement.facings < product.minFacings || placement.facings > product.maxFacings) {
      const message = `Product ${product.name} has ${placement.facings} facings, outside ${product.minFacings}-${product.maxFacings}`;
      logger.error(message);
      warnings.push(message);
    }
  }

  return warnings;
}

// ============================================================================
// Summary & reorder list
// ============================================================================

export function summarizeResult(result: AllocationResult): AllocationSummary {
  return {
    success: result.success,
    productsPlaced: result.productsPlaced.length,
    productsRejected: result.productsRejected.length,
    totalFacings: result.metrics.totalFacings,
    spaceUtilization: result.metrics.averageUtilization,
    elapsedTime: result.elapsedTime,
    warnings: result.warnings.length
  };
}

/**
 * Placed products that will run out within one and a half restock cycles,
 * urgent ones (out before the next restock) first, then by days of stock.
 */
export function buildReorderList(result: AllocationResult): ReorderEntry[] {
  const cycle = result.store.restockFrequencyDays;

  return result.productsPlaced
    .filter(p => p.stockDays < cycle * REORDER_HORIZON_FACTOR)
    .map((p): ReorderEntry => ({
      productId: p.id,
      productName: p.name,
      currentStock: p.currentStock,
      daysOfStock: p.stockDays,
      recommendedOrder: Math.floor(p.salesVelocity * cycle * REORDER_CYCLES),
      priority: p.stockDays < cycle ? 'urgent' : 'normal'
    }))
    .sort((a, b) => {
      if (a.priority !== b.priority) return a.priority === 'urgent' ? -1 : 1;
      return a.daysOfStock - b.daysOfStock;
    });
}
