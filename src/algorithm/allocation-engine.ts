/**
 * Allocation Engine
 *
 * Orchestrates one allocation run over a store:
 *
 *   Reset → Filter → Score/Sort → Place → Post-optimize → Validate → Result
 *
 * A run is synchronous and owns the store's shelves until it returns; the
 * next run starts by clearing them. Products that do not fit are reported in
 * `productsRejected` with a warning. Only a run that has nothing left to
 * place, or hits an unexpected error, fails, always with an
 * OptimizationError whose `cause` is the underlying error.
 */

import {
  AllocationResult,
  AllocationStrategy,
  BundleMetrics,
  BundlePlacement,
  Product
} from './types';
import { STRATEGY_LABELS } from './constants';
import {
  allocationOptionsSchema,
  AllocationOptionsInput,
  CoPurchaseRecord,
  parseOrThrow
} from './schemas';
import { ConfigurationError, NoProductsError, OptimizationError } from './errors';
import { Store } from './store';
import { PlacementContext } from './placement-context';
import { sortByPriority } from './scoring';
import { STRATEGY_RUNNERS } from './strategies';
import { buildBundles, calculateBundleMetrics, placeWithBundles } from './bundle-placement';
import { postOptimize } from './post-optimization';
import { calculateMetrics, validatePlacement } from './metrics';
import { createLogger, EngineLogger } from './utils/logger';
import { EngineMonitor, noopMonitor } from './utils/monitor';

export interface EngineOptions extends AllocationOptionsInput {
  logger?: EngineLogger;
  monitor?: EngineMonitor;
}

export interface RunOptions {
  /** Co-purchase groups; when any bundle forms, bundles are placed first */
  coPurchases?: CoPurchaseRecord[];
}

interface PlacementOutcome {
  rejected: Product[];
  bundlePlacements?: BundlePlacement[];
  bundleMetrics?: BundleMetrics;
}

export class AllocationEngine {
  readonly store: Store;
  readonly gapSize: number;
  readonly strategy: AllocationStrategy;

  private readonly logger: EngineLogger;
  private readonly monitor: EngineMonitor;

  /**
   * @throws ConfigurationError when the gap size or strategy is invalid
   */
  constructor(store: Store, options: EngineOptions = {}) {
    const { logger, monitor, ...rest } = options;
    const parsed = parseOrThrow(allocationOptionsSchema, rest, 'allocation options');

    this.store = store;
    this.gapSize = parsed.gapSize;
    this.strategy = parsed.strategy;
    this.logger = logger ?? createLogger();
    this.monitor = monitor ?? noopMonitor;
  }

  /**
   * Place `products` on the store's shelves.
   *
   * @throws ConfigurationError when a co-purchase record is malformed
   * @throws OptimizationError when no product survives filtering or the run
   *   fails unexpectedly
   */
  run(products: Product[], options: RunOptions = {}): AllocationResult {
    const startedAt = performance.now();
    this.logger.info(`Optimizing ${this.store.name} with ${STRATEGY_LABELS[this.strategy]} strategy (${products.length} products)`);

    try {
      return this.execute(products, options, startedAt);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      const failure = new OptimizationError(error);
      this.logger.error(failure.message);
      throw failure;
    }
  }

  private execute(products: Product[], options: RunOptions, startedAt: number): AllocationResult {
    this.store.reset(this.gapSize);
    const ctx = new PlacementContext(this.store, this.gapSize, this.logger);

    const candidates = this.monitor.time('filter', () => this.filter(ctx, products));
    if (candidates.length === 0) {
      throw new NoProductsError();
    }
    this.logger.info(`${candidates.length} of ${products.length} products remain after filtering`);

    const sorted = this.monitor.time('score', () =>
      sortByPriority(candidates, this.strategy, this.store.weights)
    );

    const outcome = this.monitor.time('place', () => this.place(ctx, sorted, candidates, options));

    this.monitor.time('post-optimize', () => postOptimize(ctx, outcome.bundlePlacements));

    const placed = ctx.placedProducts();
    const rejected = dedupe(outcome.rejected).filter(p => !ctx.isPlaced(p.id));

    this.monitor.time('validate', () => {
      for (const warning of validatePlacement(this.store, placed, candidates, this.logger)) {
        ctx.warn(warning);
      }
    });

    const metrics = calculateMetrics(this.store, placed, rejected, outcome.bundleMetrics);
    const elapsedTime = performance.now() - startedAt;
    this.logger.info(
      `Placed ${placed.length} products (${rejected.length} rejected) in ${elapsedTime.toFixed(1)}ms, ` +
      `average utilization ${metrics.averageUtilization.toFixed(1)}%`
    );

    return {
      success: placed.length > 0,
      store: this.store,
      productsPlaced: placed,
      productsRejected: rejected,
      metrics,
      warnings: [...ctx.warnings],
      elapsedTime
    };
  }

  /**
   * Drop repeated ids (first occurrence wins), then apply the store rules.
   */
  private filter(ctx: PlacementContext, products: Product[]): Product[] {
    const seen = new Set<string>();
    const unique: Product[] = [];
    for (const product of products) {
      if (seen.has(product.id)) {
        ctx.warn(`Duplicate product id ${product.id} ignored`);
        continue;
      }
      seen.add(product.id);
      unique.push(product);
    }
    return this.store.filterProducts(unique);
  }

  private place(
    ctx: PlacementContext,
    sorted: Product[],
    candidates: Product[],
    options: RunOptions
  ): PlacementOutcome {
    const bundles = options.coPurchases ? buildBundles(options.coPurchases, candidates) : [];

    if (bundles.length === 0) {
      if (options.coPurchases && options.coPurchases.length > 0) {
        this.logger.warn(
          `No co-purchase group formed a bundle of 2 or more products; placing with ${STRATEGY_LABELS[this.strategy]} strategy`
        );
      }
      return { rejected: STRATEGY_RUNNERS[this.strategy](ctx, sorted) };
    }

    const { rejected, placements } = placeWithBundles(ctx, sorted, bundles, this.strategy);
    return {
      rejected,
      bundlePlacements: placements,
      bundleMetrics: calculateBundleMetrics(bundles, placements, ctx.placedProducts().length)
    };
  }
}

const dedupe = (products: Product[]): Product[] => [...new Set(products)];

/**
 * Run one allocation with a fresh engine.
 *
 * @throws ConfigurationError on invalid options, OptimizationError when the run fails
 */
export function optimizePlanogram(
  products: Product[],
  store: Store,
  options: EngineOptions & RunOptions = {}
): AllocationResult {
  const { coPurchases, ...engineOptions } = options;
  return new AllocationEngine(store, engineOptions).run(products, { coPurchases });
}
