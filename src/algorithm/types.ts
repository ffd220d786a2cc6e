/**
 * Shelf Allocation Engine - Algorithm Types
 * Types for products, shelves, stores and the allocation result
 *
 * ## Type System Architecture
 *
 * Input records (`ProductRecord`, `StoreConfig`, `AllocationOptions`) are
 * declared by the zod schemas in `schemas.ts` and may omit optional fields.
 * Everything in this module is the validated, fully-defaulted form the
 * algorithm works on:
 * - `Product` is built once by `createProduct()` and carries its derived
 *   scoring fields; only `priorityScore` changes during a run.
 * - `Shelf` and `Store` are classes (see `shelf.ts`, `store.ts`) because they
 *   own mutable placement state.
 * - `AllocationResult` is what a run hands to presentation/export code.
 */

import type { Shelf } from './shelf';
import type { Store } from './store';

// ============================================================================
// PRODUCTS
// ============================================================================

export enum ProductCategory {
  Case = 'case',
  Cable = 'cable',
  Adapter = 'adapter',
  ScreenProtector = 'screen-protector',
  Charger = 'charger',
  Mount = 'mount',
  Audio = 'audio',
  Keyboard = 'keyboard',
  Mouse = 'mouse',
  Pencil = 'pencil',
  WatchBand = 'watch-band',
  Other = 'other'
}

export enum ProductStatus {
  Active = 'active',
  Discontinued = 'discontinued',
  Seasonal = 'seasonal',
  New = 'new'
}

/**
 * Sales volume tiers, by total quantity sold.
 * Higher tiers earn a wider facing range.
 */
export type PerformanceTier = 'top' | 'high' | 'good' | 'average' | 'low';

/**
 * How a facing count is derived from a product's sales and stock data
 */
export type FacingMode = 'salesBased' | 'stockBased' | 'balanced';

export interface Product {
  // Identity
  readonly id: string;
  readonly name: string;
  readonly category: ProductCategory;
  readonly series: string;            // Core-device tag (e.g., "Phone 16")
  readonly brand: string;
  readonly status: ProductStatus;

  // Dimensions (cm)
  readonly width: number;
  readonly height: number;
  readonly depth: number;

  // Commercial data - missing values default to 0
  readonly price: number;
  readonly profit: number;
  readonly currentStock: number;
  readonly minStock: number;

  // Display constraints
  readonly minFacings: number;
  readonly maxFacings: number;

  // Enrichment from co-purchase data
  readonly attachRate: number;        // 0-1
  readonly bundleFrequency: number;

  // Derived at construction
  readonly weeklySales: number;       // Units per week
  readonly totalQuantity: number;     // Raw quantity figure for value scoring
  readonly salesVelocity: number;     // Units per day
  readonly unitValue: number;         // Profit per unit, falling back to price
  readonly stockDays: number;         // Days of supply left
  readonly needsRestock: boolean;
  readonly performanceTier: PerformanceTier;
  readonly facingLimit: number;       // Facing cap for the tier, within [min, max]

  // Transient - rewritten by every scoring pass
  priorityScore: number;
}

// ============================================================================
// SHELVES
// ============================================================================

export enum ShelfType {
  Storage = 'storage',
  Standard = 'standard',
  Premium = 'premium',
  Promotional = 'promotional'
}

/**
 * One product's slot on a shelf. Positions are mutated in place by reflow,
 * so references held by the placement index stay valid.
 */
export interface Placement {
  readonly productId: string;
  readonly facings: number;
  readonly width: number;             // product.width × facings
  xStart: number;
  xEnd: number;
}

export interface ShelfConfig {
  id: string;
  name: string;
  width: number;
  height: number;
  depth: number;
  yPosition: number;                  // Height of the shelf base from the floor
  type: ShelfType;
  eyeLevelScore: number;              // 0-1, 1 = prime eye level
}

// ============================================================================
// STORES
// ============================================================================

export type StoreType = 'flagship' | 'standard' | 'express';

export interface StoreRules {
  minSkusPerCategory?: number;
  maxSkusPerCategory?: number;
  minWeeklySales?: number;
  maxFacingsPerProduct?: number;
  categoryGrouping: boolean;
  onlyBestsellers: boolean;           // Express stores: keep top performers only
  maxSkusTotal: number;
  filterBySalesRank: boolean;         // Standard stores: keep top-ranked sellers only
  maxRankIncluded: number;
  maxCategoriesPerShelf?: number;
}

/**
 * Relative importance of each factor in the balanced composite score
 */
export interface OptimizationWeights {
  salesVelocity: number;
  profitability: number;
  attachRate: number;
  novelty: number;
}

// ============================================================================
// STRATEGIES & OPTIONS
// ============================================================================

// Strategies:
// - salesVelocity: Fast movers first, eye level for high velocity, bump-out fallback
// - categoryGrouped: Categories pinned to shelf tiers by aggregate value
// - valueDensity: Value per cm of a single facing
// - profitEfficiency: Value per cm of the minimum display width
// - balanced: Weighted composite of sales, value, attach rate and novelty
export type AllocationStrategy =
  | 'salesVelocity'
  | 'categoryGrouped'
  | 'valueDensity'
  | 'profitEfficiency'
  | 'balanced';

/**
 * A group of products bought together, recomputed per run
 */
export interface Bundle {
  readonly products: readonly Product[];
  readonly frequency: number;
}

/**
 * Where a bundle ended up. Split bundles span two shelves.
 */
export interface BundlePlacement {
  readonly productIds: readonly string[];
  readonly shelfIds: readonly string[];
  readonly split: boolean;
}

// ============================================================================
// RESULT
// ============================================================================

export interface ShelfUtilizationEntry {
  shelfId: string;
  shelfName: string;
  utilization: number;
  products: number;
  facings: number;
}

export interface BundleMetrics {
  totalBundles: number;
  bundlesPlaced: number;
  splitBundles: number;
  productsInBundles: number;
  averageBundleSize: number;
  bundleCoverage: number;             // % of placed products that belong to a bundle
}

export interface AllocationMetrics {
  totalPlaced: number;
  totalRejected: number;
  totalFacings: number;
  categoryDistribution: Partial<Record<ProductCategory, number>>;  // Facings per category
  facingsByProduct: Record<string, number>;
  shelfUtilization: ShelfUtilizationEntry[];
  averageUtilization: number;
  profitDensity: number;              // Value per cm of placement width
  quantityDensity: number;            // Units per cm of placement width
  totalShelves: number;
  eyeLevelShelves: number;
  premiumShelves: number;
  totalShelfArea: number;
  bundles?: BundleMetrics;
}

export interface AllocationResult {
  readonly success: boolean;
  readonly store: Store;
  readonly productsPlaced: readonly Product[];
  readonly productsRejected: readonly Product[];
  readonly metrics: AllocationMetrics;
  readonly warnings: readonly string[];
  readonly elapsedTime: number;       // Milliseconds
}

export interface AllocationSummary {
  success: boolean;
  productsPlaced: number;
  productsRejected: number;
  totalFacings: number;
  spaceUtilization: number;
  elapsedTime: number;
  warnings: number;
}

export interface ReorderEntry {
  productId: string;
  productName: string;
  currentStock: number;
  daysOfStock: number;
  recommendedOrder: number;
  priority: 'urgent' | 'normal';
}

/**
 * Lookup entry of the product-to-placement index
 */
export interface IndexedPlacement {
  readonly product: Product;
  readonly shelf: Shelf;
  readonly placement: Placement;
}
