/**
 * Shelf Allocation Engine - Constants
 * Default values and configuration
 *
 * ALL DIMENSIONS ARE IN CENTIMETRES, utilization figures are percentages (0-100)
 */

import {
  AllocationStrategy,
  OptimizationWeights,
  PerformanceTier,
  ProductCategory,
  StoreRules
} from './types';

// ============================================================================
// PLACEMENT DEFAULTS
// ============================================================================

export const DEFAULT_GAP_SIZE = 2.0;                 // cm between placements and from shelf walls
export const DEFAULT_STRATEGY: AllocationStrategy = 'balanced';
export const DEFAULT_RESTOCK_FREQUENCY_DAYS = 7;

// Average accessory width used to estimate how many products a store holds
export const AVERAGE_PRODUCT_WIDTH = 8;

// Vertical distance under which two shelves count as adjacent for split bundles
export const ADJACENT_SHELF_DISTANCE = 10;

// ============================================================================
// PRODUCT DERIVATION
// ============================================================================

export const DAYS_PER_WEEK = 7;
export const WEEKS_PER_MONTH = 4;

// Stock-days figure reported for products that do not sell
export const STOCK_DAYS_UNKNOWN = 999;

/**
 * Performance tiers by total quantity sold, highest first.
 * `facingCap` of null means the product's own maxFacings.
 */
export const PERFORMANCE_TIERS: { tier: PerformanceTier; minQuantity: number; facingCap: number | null }[] = [
  { tier: 'top', minQuantity: 500, facingCap: null },
  { tier: 'high', minQuantity: 300, facingCap: 4 },
  { tier: 'good', minQuantity: 100, facingCap: 3 },
  { tier: 'average', minQuantity: 50, facingCap: 2 },
  { tier: 'low', minQuantity: 0, facingCap: 1 }
];

// Each facing per this many units of daily velocity (salesBased mode)
export const VELOCITY_PER_FACING = 10;

// Attach rate above which a product earns one extra facing
export const HIGH_ATTACH_RATE = 0.3;

// ============================================================================
// SCORING
// ============================================================================

/**
 * Normalization of the balanced composite score.
 * Daily velocity and unit value are each divided by a single ceiling and
 * capped at 1, so every factor lands in [0, 1] before weighting.
 */
export const SCORE_NORMALIZATION = {
  velocityCeiling: 50,     // Units per day that count as a full sales score
  valueCeiling: 50         // Value per unit that counts as a full value score
};

export const DEFAULT_OPTIMIZATION_WEIGHTS: OptimizationWeights = {
  salesVelocity: 0.3,
  profitability: 0.4,
  attachRate: 0.2,
  novelty: 0.1
};

/**
 * Bonuses of the per-shelf placement score. This score only orders candidate
 * shelves; it never decides whether a product fits.
 */
export const PLACEMENT_SCORE = {
  eyeLevelThreshold: 0.8,
  eyeLevelBonus: 0.3,
  eyeLevelFactor: 0.1,            // × eyeLevelScore below the threshold
  premiumPriceThreshold: 50,
  premiumBonus: 0.2,
  heightFitRange: [0.5, 0.8],
  heightFitBonus: 0.2,
  tightHeightBonus: 0.1,          // Height ratio above the fit range
  fastMoverVelocity: 10,
  fastMoverEyeLevel: 0.7,
  fastMoverBonus: 0.2
} as const;

/**
 * Extra terms of the balanced strategy's shelf selection
 */
export const SHELF_SELECTION = {
  categoryAffinityBonus: 0.3,
  heightFitRange: [0.6, 0.8],
  heightFitBonus: 0.2,
  utilizationPenalty: 0.3         // × utilization / 100
} as const;

// ============================================================================
// STRATEGY THRESHOLDS
// ============================================================================

export const STRATEGY_THRESHOLDS = {
  highVelocity: 10,               // Units/day - salesVelocity tries eye level first
  eyeLevelShelfScore: 0.7,        // Shelves counted as eye level by strategies
  highMarginValue: 30,            // valueDensity boosts facings above this profit
  highMarginFacings: 3,
  premiumMarginProfit: 40,        // profitEfficiency facing tiers
  premiumMarginFacings: 4,
  mediumMarginProfit: 20,
  mediumMarginFacings: 3,
  highEfficiency: 50              // profitEfficiency tries eye level first above this
};

/**
 * Shelf tiers for category pinning, by eye-level score
 */
export const CATEGORY_TIERS = {
  eyeLevelMin: 0.8,
  midLevelMin: 0.4
};

// ============================================================================
// BUNDLES
// ============================================================================

export const BUNDLE_SCORE = {
  highValueThreshold: 100,        // Σ price × velocity
  eyeLevelBonus: 0.5,
  premiumBonus: 0.3,
  spaceEfficiencyRange: [0.3, 0.7],
  spaceEfficiencyBonus: 0.3,
  maxHomogeneousCategories: 2,
  homogeneityBonus: 0.2
} as const;

// ============================================================================
// POST-OPTIMIZATION & VALIDATION
// ============================================================================

export const LOAD_BALANCING = {
  overUtilized: 85,
  underUtilized: 40
};

export const VALIDATION_THRESHOLDS = {
  underUtilized: 20,
  overcrowded: 95,
  groupedMaxCategoriesPerShelf: 3
};

// ============================================================================
// STORE RULE DEFAULTS
// ============================================================================

export const DEFAULT_STORE_RULES: StoreRules = {
  categoryGrouping: false,
  onlyBestsellers: false,
  maxSkusTotal: 30,
  filterBySalesRank: false,
  maxRankIncluded: 20
};

// ============================================================================
// LABELS
// ============================================================================

export const STRATEGY_LABELS: Record<AllocationStrategy, string> = {
  salesVelocity: 'Sales Velocity',
  categoryGrouped: 'Category Grouped',
  valueDensity: 'Value Density',
  profitEfficiency: 'Profit Efficiency',
  balanced: 'Balanced'
};

export const STRATEGY_DESCRIPTIONS: Record<AllocationStrategy, string> = {
  salesVelocity: 'Fast movers first, at eye level, displacing slower items when space runs out',
  categoryGrouped: 'Each category pinned to an eye-level, middle or low shelf tier by its value',
  valueDensity: 'Highest value per centimetre of a single facing first, best-visibility shelves first',
  profitEfficiency: 'Highest value per centimetre of minimum display width first, boosted facings for high margins',
  balanced: 'Weighted mix of sales, value, attach rate and novelty with smart shelf selection'
};

export const CATEGORY_LABELS: Record<ProductCategory, string> = {
  [ProductCategory.Case]: 'Cases',
  [ProductCategory.Cable]: 'Cables',
  [ProductCategory.Adapter]: 'Adapters',
  [ProductCategory.ScreenProtector]: 'Screen Protectors',
  [ProductCategory.Charger]: 'Chargers',
  [ProductCategory.Mount]: 'Mounts',
  [ProductCategory.Audio]: 'Audio',
  [ProductCategory.Keyboard]: 'Keyboards',
  [ProductCategory.Mouse]: 'Mice',
  [ProductCategory.Pencil]: 'Pencils',
  [ProductCategory.WatchBand]: 'Watch Bands',
  [ProductCategory.Other]: 'Other'
};
