/**
 * Store Model Module
 *
 * Ordered shelves (bottom to top) plus the rules and weights one allocation
 * run works under. Shelves are mutated in place during a run and cleared by
 * `reset()` at the start of the next one.
 */

import {
  OptimizationWeights,
  Product,
  ProductCategory,
  ShelfConfig,
  StoreRules,
  StoreType
} from './types';
import { AVERAGE_PRODUCT_WIDTH, DEFAULT_GAP_SIZE } from './constants';
import { Shelf } from './shelf';
import { parseOrThrow, storeConfigSchema, StoreConfig } from './schemas';
import { ConfigurationError } from './errors';

export interface StoreInit {
  name: string;
  type: StoreType;
  restockFrequencyDays: number;
  shelves: Shelf[];
  rules: StoreRules;
  weights: OptimizationWeights;
}

/**
 * Sort by weekly sales, highest first, keeping input order on ties.
 */
const bySalesDesc = (products: Product[]): Product[] =>
  [...products].sort((a, b) => b.weeklySales - a.weeklySales);

export class Store {
  readonly name: string;
  readonly type: StoreType;
  readonly restockFrequencyDays: number;
  readonly shelves: readonly Shelf[];
  readonly rules: StoreRules;
  readonly weights: OptimizationWeights;

  constructor(init: StoreInit) {
    this.name = init.name;
    this.type = init.type;
    this.restockFrequencyDays = init.restockFrequencyDays;
    // Stable sort keeps configuration order for shelves at the same height
    this.shelves = [...init.shelves].sort((a, b) => a.yPosition - b.yPosition);
    this.rules = init.rules;
    this.weights = init.weights;
  }

  // ==========================================================================
  // Derived properties
  // ==========================================================================

  get totalShelfArea(): number {
    return this.shelves.reduce((sum, s) => sum + s.area, 0);
  }

  get eyeLevelShelves(): Shelf[] {
    return this.shelves.filter(s => s.isEyeLevel);
  }

  get premiumShelves(): Shelf[] {
    return this.shelves.filter(s => s.isPremium);
  }

  /**
   * Rough number of products the store can display, from total shelf width.
   */
  get totalCapacity(): number {
    const totalWidth = this.shelves.reduce((sum, s) => sum + s.width, 0);
    return Math.floor(totalWidth / AVERAGE_PRODUCT_WIDTH);
  }

  shelfById(id: string): Shelf | undefined {
    return this.shelves.find(s => s.id === id);
  }

  /**
   * Clear every placement and set the spacing for the coming run.
   */
  reset(gapSize: number): void {
    for (const shelf of this.shelves) {
      shelf.clear();
      shelf.gapSize = gapSize;
    }
  }

  // ==========================================================================
  // Filtering
  // ==========================================================================

  /**
   * Apply the store rules to the candidate list:
   * 1. Express stores showing only bestsellers keep the top `maxSkusTotal`
   * 2. Standard stores ranking by sales keep the top `maxRankIncluded`
   * 3. Products below `minWeeklySales` are dropped
   * 4. With `minSkusPerCategory` set, each category keeps at most
   *    `maxSkusPerCategory` of its best sellers
   *
   * Survivors keep their input order so later stable sorts break ties the
   * same way every run.
   */
  filterProducts(products: Product[]): Product[] {
    let kept = products;

    if (this.type === 'express' && this.rules.onlyBestsellers) {
      kept = bySalesDesc(kept).slice(0, this.rules.maxSkusTotal);
    } else if (this.type === 'standard' && this.rules.filterBySalesRank) {
      kept = bySalesDesc(kept).slice(0, this.rules.maxRankIncluded);
    }

    const minWeeklySales = this.rules.minWeeklySales;
    if (minWeeklySales !== undefined) {
      kept = kept.filter(p => p.weeklySales >= minWeeklySales);
    }

    if (this.rules.minSkusPerCategory !== undefined) {
      kept = this.applyCategoryLimits(kept);
    }

    const keptIds = new Set(kept.map(p => p.id));
    return products.filter(p => keptIds.has(p.id));
  }

  private applyCategoryLimits(products: Product[]): Product[] {
    const minPerCategory = this.rules.minSkusPerCategory ?? 1;
    const maxPerCategory = this.rules.maxSkusPerCategory ?? Number.POSITIVE_INFINITY;

    const byCategory = new Map<ProductCategory, Product[]>();
    for (const product of products) {
      const group = byCategory.get(product.category) ?? [];
      group.push(product);
      byCategory.set(product.category, group);
    }

    const result: Product[] = [];
    for (const group of byCategory.values()) {
      // A category cannot supply more SKUs than it has, whatever its minimum
      const toTake = Math.max(minPerCategory, Math.min(group.length, maxPerCategory));
      result.push(...bySalesDesc(group).slice(0, toTake));
    }
    return result;
  }
}

/**
 * Validate a store configuration and build its shelves.
 *
 * @throws ConfigurationError on invalid shelves, rules or weights, or when two
 *   shelves share an id
 */
export function createStore(config: StoreConfig, gapSize: number = DEFAULT_GAP_SIZE): Store {
  const parsed = parseOrThrow(storeConfigSchema, config, 'store configuration');

  const seen = new Set<string>();
  const duplicates = parsed.shelves.filter(s => {
    const duplicate = seen.has(s.id);
    seen.add(s.id);
    return duplicate;
  });
  if (duplicates.length > 0) {
    throw new ConfigurationError('Invalid store configuration', duplicates.map(s => `duplicate shelf id ${s.id}`));
  }

  const shelves = parsed.shelves.map(s => {
    const shelfConfig: ShelfConfig = { ...s, name: s.name ?? s.id };
    return new Shelf(shelfConfig, gapSize);
  });

  return new Store({
    name: parsed.name,
    type: parsed.type,
    restockFrequencyDays: parsed.restockFrequencyDays,
    shelves,
    rules: parsed.rules,
    weights: parsed.weights
  });
}
