/**
 * Shelf Allocation Engine - Algorithm Module
 *
 * Exports all public APIs for shelf-space allocation
 */

// Types - use 'export type' for type-only exports
export { ProductCategory, ProductStatus, ShelfType } from './types';
export type {
  Product,
  PerformanceTier,
  FacingMode,
  Placement,
  ShelfConfig,
  StoreType,
  StoreRules,
  OptimizationWeights,
  AllocationStrategy,
  Bundle,
  BundlePlacement,
  BundleMetrics,
  ShelfUtilizationEntry,
  AllocationMetrics,
  AllocationResult,
  AllocationSummary,
  ReorderEntry
} from './types';

// Constants
export {
  DEFAULT_GAP_SIZE,
  DEFAULT_STRATEGY,
  DEFAULT_OPTIMIZATION_WEIGHTS,
  DEFAULT_STORE_RULES,
  STRATEGY_LABELS,
  STRATEGY_DESCRIPTIONS,
  CATEGORY_LABELS
} from './constants';

// Input schemas
export {
  productRecordSchema,
  shelfConfigSchema,
  storeConfigSchema,
  allocationOptionsSchema,
  coPurchaseRecordSchema
} from './schemas';

export type {
  ProductRecord,
  ShelfConfigInput,
  StoreConfig,
  AllocationOptionsInput,
  CoPurchaseRecord
} from './schemas';

// Errors
export {
  PlanogramError,
  ConfigurationError,
  OptimizationError,
  NoProductsError
} from './errors';

// Models
export { createProduct, createProducts, calculateFacings } from './product';
export { Shelf } from './shelf';
export { Store, createStore } from './store';

// Engine
export { AllocationEngine, optimizePlanogram } from './allocation-engine';
export type { EngineOptions, RunOptions } from './allocation-engine';
export { buildBundles } from './bundle-placement';

// Reporting
export { summarizeResult, buildReorderList } from './metrics';

// Logging & monitoring
export { LogLevel, createLogger, silentLogger } from './utils/logger';
export type { EngineLogger, LogSink } from './utils/logger';
export { createMonitor, noopMonitor } from './utils/monitor';
export type { EngineMonitor, PhaseTiming } from './utils/monitor';
