/**
 * Product Model Module
 *
 * Builds validated products with their derived scoring fields and works out
 * how many facings a product should get.
 *
 * SALES SIGNAL
 * Records carry sales in whichever window the source had: an average per
 * week, last week's or last month's quantity, or a raw total. `weeklySales`
 * picks the most specific one available and `salesVelocity` (units per day)
 * is always `weeklySales / 7`, so every strategy compares the same figure.
 */

import {
  Product,
  ProductStatus,
  PerformanceTier,
  FacingMode,
  StoreRules
} from './types';
import {
  DAYS_PER_WEEK,
  WEEKS_PER_MONTH,
  STOCK_DAYS_UNKNOWN,
  PERFORMANCE_TIERS,
  VELOCITY_PER_FACING,
  HIGH_ATTACH_RATE
} from './constants';
import { productRecordSchema, parseOrThrow, ProductRecord } from './schemas';

// ============================================================================
// Derivation Helpers
// ============================================================================

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

/**
 * Clamp a facing count into the product's allowed range.
 */
export const clampFacings = (product: Pick<Product, 'minFacings' | 'maxFacings'>, facings: number): number =>
  clamp(Math.floor(facings), product.minFacings, product.maxFacings);

/**
 * Classify a total sold quantity into a performance tier.
 */
export const getPerformanceTier = (totalQuantity: number): PerformanceTier => {
  const entry = PERFORMANCE_TIERS.find(t => totalQuantity >= t.minQuantity);
  return entry ? entry.tier : 'low';
};

/**
 * Facing cap of a tier for a product, always within [minFacings, maxFacings].
 */
export const getFacingLimit = (tier: PerformanceTier, minFacings: number, maxFacings: number): number => {
  const entry = PERFORMANCE_TIERS.find(t => t.tier === tier);
  const cap = entry?.facingCap ?? maxFacings;
  return clamp(cap, minFacings, maxFacings);
};

// ============================================================================
// Construction
// ============================================================================

/**
 * Validate a raw product record and derive its scoring fields.
 *
 * @throws ConfigurationError when the record breaks a dimension, facing or
 *   attach-rate constraint
 */
export function createProduct(record: ProductRecord): Product {
  const r = parseOrThrow(productRecordSchema, record, `product ${record.id}`);

  const weeklySales =
    r.avgWeeklySales ??
    (r.qtySoldLastMonth !== undefined ? r.qtySoldLastMonth / WEEKS_PER_MONTH : undefined) ??
    r.qtySoldLastWeek ??
    (r.totalQuantity !== undefined ? r.totalQuantity / WEEKS_PER_MONTH : 0);

  const totalQuantity = r.totalQuantity ?? r.qtySoldLastMonth ?? weeklySales * WEEKS_PER_MONTH;
  const salesVelocity = weeklySales / DAYS_PER_WEEK;
  const performanceTier = getPerformanceTier(totalQuantity);

  return {
    id: r.id,
    name: r.name ?? r.id,
    category: r.category,
    series: r.series,
    brand: r.brand,
    status: r.status,
    width: r.width,
    height: r.height,
    depth: r.depth,
    price: r.price,
    profit: r.profit ?? 0,
    currentStock: r.currentStock,
    minStock: r.minStock,
    minFacings: r.minFacings,
    maxFacings: r.maxFacings,
    attachRate: r.attachRate,
    bundleFrequency: r.bundleFrequency,
    weeklySales,
    totalQuantity,
    salesVelocity,
    unitValue: r.profit ?? r.price,
    stockDays: salesVelocity > 0 ? r.currentStock / salesVelocity : STOCK_DAYS_UNKNOWN,
    needsRestock: r.minStock > 0 && r.currentStock <= r.minStock,
    performanceTier,
    facingLimit: getFacingLimit(performanceTier, r.minFacings, r.maxFacings),
    priorityScore: 0
  };
}

/**
 * Build products from a list of records, in order.
 */
export const createProducts = (records: ProductRecord[]): Product[] => records.map(createProduct);

export const isNewProduct = (product: Product): boolean => product.status === ProductStatus.New;

// ============================================================================
// Facings
// ============================================================================

const salesFacings = (product: Product): number =>
  Math.floor(product.salesVelocity / VELOCITY_PER_FACING) + 1;

/**
 * Facing count suggested by a product's own sales and stock figures,
 * clamped to [minFacings, facingLimit].
 *
 * - salesBased: one facing per 10 units/day of velocity, plus one
 * - stockBased: minimum when restock is due, else proportional to stock cover
 * - balanced: average of the sales and stock suggestions
 *
 * Products without a minimum stock fall back to the sales suggestion
 * wherever a stock ratio would be needed.
 */
export function calculateFacings(product: Product, mode: FacingMode = 'balanced'): number {
  let facings: number;

  switch (mode) {
    case 'salesBased':
      facings = salesFacings(product);
      break;
    case 'stockBased':
      if (product.needsRestock) {
        facings = product.minFacings;
      } else if (product.minStock > 0) {
        const stockRatio = product.currentStock / (product.minStock * 3);
        facings = Math.floor(stockRatio * 3) + 1;
      } else {
        facings = salesFacings(product);
      }
      break;
    case 'balanced':
    default: {
      const bySales = salesFacings(product);
      const byStock = product.minStock > 0
        ? Math.floor(product.currentStock / product.minStock)
        : bySales;
      facings = Math.floor((bySales + byStock) / 2);
      break;
    }
  }

  return clamp(facings, product.minFacings, product.facingLimit);
}

/**
 * Facing count a strategy should attempt for a product in a given store:
 * the product's own suggestion, one more for high attach rates, capped by the
 * store's per-product maximum. Never below minFacings.
 */
export function resolveFacings(product: Product, mode: FacingMode, rules: StoreRules): number {
  let facings = calculateFacings(product, mode);

  if (product.attachRate > HIGH_ATTACH_RATE) {
    facings = Math.min(facings + 1, product.maxFacings);
  }

  return capFacings(product, facings, rules);
}

/**
 * Apply the store's per-product facing cap and the product's own range.
 */
export function capFacings(product: Product, facings: number, rules: StoreRules): number {
  const storeCap = rules.maxFacingsPerProduct ?? product.maxFacings;
  return Math.max(product.minFacings, Math.min(clampFacings(product, facings), storeCap));
}
