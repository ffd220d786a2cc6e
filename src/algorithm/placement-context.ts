/**
 * Placement Context
 *
 * Mutable state of one allocation run: the store being filled, an index from
 * product id to its current shelf and placement, the order products were
 * placed in, bundle membership, and the warnings collected so far.
 *
 * Every strategy places and removes products through this class, never on a
 * shelf directly, so the index always matches what the shelves hold.
 */

import { IndexedPlacement, Placement, Product, StoreRules } from './types';
import { Shelf } from './shelf';
import { Store } from './store';
import { EngineLogger } from './utils/logger';

export class PlacementContext {
  readonly store: Store;
  readonly gapSize: number;
  readonly logger: EngineLogger;
  readonly warnings: string[] = [];

  private readonly index = new Map<string, IndexedPlacement>();
  private readonly placementOrder: Product[] = [];
  private readonly bundleMembers = new Set<string>();

  constructor(store: Store, gapSize: number, logger: EngineLogger) {
    this.store = store;
    this.gapSize = gapSize;
    this.logger = logger;
  }

  get rules(): StoreRules {
    return this.store.rules;
  }

  get shelves(): readonly Shelf[] {
    return this.store.shelves;
  }

  // ==========================================================================
  // Index lookups
  // ==========================================================================

  lookup(productId: string): IndexedPlacement | undefined {
    return this.index.get(productId);
  }

  isPlaced(productId: string): boolean {
    return this.index.has(productId);
  }

  /**
   * Products currently on a shelf, in shelf order (left to right).
   */
  productsOn(shelf: Shelf): Product[] {
    const products: Product[] = [];
    for (const placement of shelf.placements) {
      const entry = this.index.get(placement.productId);
      if (entry) products.push(entry.product);
    }
    return products;
  }

  /**
   * Products currently placed, in the order they were placed.
   */
  placedProducts(): Product[] {
    return this.placementOrder.filter(p => this.index.has(p.id));
  }

  entries(): IndexedPlacement[] {
    return [...this.index.values()];
  }

  markBundleMember(productId: string): void {
    this.bundleMembers.add(productId);
  }

  isBundleMember(productId: string): boolean {
    return this.bundleMembers.has(productId);
  }

  warn(message: string): void {
    this.warnings.push(message);
    this.logger.warn(message);
  }

  // ==========================================================================
  // Placement primitives
  // ==========================================================================

  /**
   * Insert exactly `facings` of the product into the first free gap that fits.
   */
  place(shelf: Shelf, product: Product, facings: number): Placement | null {
    if (this.index.has(product.id)) {
      throw new Error(`Product ${product.id} is already placed on shelf ${this.index.get(product.id)?.shelf.id}`);
    }
    const placement = shelf.addPlacement(product, facings);
    if (placement) this.record(shelf, product, placement);
    return placement;
  }

  /**
   * Place exactly `facings` of the product with its left edge at `xStart`.
   */
  placeAt(shelf: Shelf, product: Product, facings: number, xStart: number): Placement | null {
    if (this.index.has(product.id)) {
      throw new Error(`Product ${product.id} is already placed on shelf ${this.index.get(product.id)?.shelf.id}`);
    }
    const placement = shelf.placeAt(product, facings, xStart);
    if (placement) this.record(shelf, product, placement);
    return placement;
  }

  /**
   * Place the product at `facings`, retrying once at its minimum facing
   * count when that many do not fit.
   */
  tryPlace(shelf: Shelf, product: Product, facings: number): Placement | null {
    if (!shelf.fitsDimensions(product)) {
      this.logger.debug(`${product.id} does not fit shelf ${shelf.id} (h ${product.height}/${shelf.height}, d ${product.depth}/${shelf.depth})`);
      return null;
    }

    const placement = this.place(shelf, product, facings);
    if (placement) return placement;

    if (facings > product.minFacings) {
      this.logger.debug(`Reducing facings of ${product.id} from ${facings} to ${product.minFacings} on shelf ${shelf.id}`);
      return this.place(shelf, product, product.minFacings);
    }

    return null;
  }

  /**
   * Try each shelf in order; returns the placement on the first that takes it.
   */
  tryPlaceOnAny(shelves: readonly Shelf[], product: Product, facings: number): Placement | null {
    for (const shelf of shelves) {
      const placement = this.tryPlace(shelf, product, facings);
      if (placement) return placement;
    }
    return null;
  }

  /**
   * Remove a product from wherever it is placed.
   */
  remove(productId: string): IndexedPlacement | undefined {
    const entry = this.index.get(productId);
    if (!entry) return undefined;
    entry.shelf.removePlacement(productId);
    this.index.delete(productId);
    return entry;
  }

  /**
   * Move a placed product to another shelf at its current facing count.
   * Leaves everything unchanged and returns null when the target cannot
   * take it.
   */
  move(productId: string, target: Shelf): Placement | null {
    const entry = this.index.get(productId);
    if (!entry || entry.shelf === target) return null;
    if (!target.canFit(entry.product, entry.placement.facings)) return null;

    const { product, shelf, placement } = entry;
    this.remove(productId);
    const moved = this.place(target, product, placement.facings);
    if (!moved) {
      this.restore(shelf, product, placement);
      return null;
    }
    return moved;
  }

  /**
   * Put back a placement that was removed, at its old position.
   */
  restore(shelf: Shelf, product: Product, placement: Placement): void {
    const restored = this.placeAt(shelf, product, placement.facings, placement.xStart);
    if (!restored) {
      throw new Error(`Could not restore ${product.id} on shelf ${shelf.id} at x=${placement.xStart}`);
    }
  }

  private record(shelf: Shelf, product: Product, placement: Placement): void {
    this.index.set(product.id, { product, shelf, placement });
    if (!this.placementOrder.includes(product)) {
      this.placementOrder.push(product);
    }
    this.logger.debug(
      `Placed ${product.id} on ${shelf.id}: ${placement.facings} facings, ${placement.width.toFixed(1)}cm at x=${placement.xStart.toFixed(1)}`
    );
  }
}
