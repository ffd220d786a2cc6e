/**
 * Bundle Co-placement Tests
 */

import {
  adjacentShelfPairs,
  applyBundleSpacing,
  blockWidth,
  buildBundles,
  bundleSpacedPositions,
  calculateBundleMetrics,
  findRelatedShelf,
  placeBundle,
  placeWithBundles
} from './bundle-placement';
import { PlacementContext } from './placement-context';
import { createStore } from './store';
import { createProduct } from './product';
import { ConfigurationError } from './errors';
import { ProductCategory } from './types';
import { StoreConfig } from './schemas';
import { silentLogger } from './utils/logger';
import { DOCK_A, DOCK_B, makeProduct } from '../../test/fixtures/products';
import { ADJACENT_PAIR_STORE, SINGLE_SHELF_STORE, shelfConfig } from '../../test/fixtures/stores';

const contextFor = (config: StoreConfig): PlacementContext =>
  new PlacementContext(createStore(config), 2, silentLogger);

const positionsOn = (ctx: PlacementContext, shelfIndex: number) =>
  ctx.shelves[shelfIndex].placements.map(p => [p.productId, p.xStart, p.xEnd]);

describe('Bundle co-placement', () => {
  describe('buildBundles', () => {
    const products = ['a', 'b', 'c', 'd'].map(id => makeProduct({ id }));

    it('should drop unknown and repeated ids and sort by frequency', () => {
      const bundles = buildBundles(
        [
          { productIds: ['a', 'b'], frequency: 2 },
          { productIds: ['c', 'x', 'c', 'd'], frequency: 5 },
          { productIds: ['a', 'missing'], frequency: 9 },
          { productIds: ['d', 'b'], frequency: 5 }
        ],
        products
      );

      expect(bundles.map(b => b.products.map(p => p.id))).toEqual([
        ['c', 'd'],
        ['d', 'b'],
        ['a', 'b']
      ]);
      expect(bundles.map(b => b.frequency)).toEqual([5, 5, 2]);
    });

    it('should reject malformed records', () => {
      expect(() => buildBundles([{ productIds: ['a'] }], products)).toThrow(ConfigurationError);
    });
  });

  describe('blockWidth', () => {
    it('should add one gap between members', () => {
      const members = [
        { product: makeProduct({ id: 'a', width: 10 }), facings: 2 },
        { product: makeProduct({ id: 'b', width: 15 }), facings: 1 }
      ];
      expect(blockWidth(members, 2)).toBe(37);
    });
  });

  describe('adjacentShelfPairs', () => {
    it('should pair shelves less than 10cm apart', () => {
      const pairs = adjacentShelfPairs(createStore(ADJACENT_PAIR_STORE).shelves);
      expect(pairs.map(([lower, upper]) => [lower.id, upper.id])).toEqual([['lower', 'upper']]);
    });

    it('should not pair distant shelves', () => {
      const store = createStore({
        shelves: [shelfConfig({ id: 'a', yPosition: 0 }), shelfConfig({ id: 'b', yPosition: 60 })]
      });
      expect(adjacentShelfPairs(store.shelves)).toEqual([]);
    });
  });

  describe('placeBundle', () => {
    it('should center a whole bundle in the largest gap', () => {
      const ctx = contextFor(SINGLE_SHELF_STORE);
      const bundle = {
        products: [makeProduct({ id: 'm1', width: 10, maxFacings: 1 }), makeProduct({ id: 'm2', width: 20, maxFacings: 1 })],
        frequency: 3
      };

      const placed = placeBundle(ctx, bundle);

      expect(placed).toEqual({ productIds: ['m1', 'm2'], shelfIds: ['bay-1'], split: false });
      expect(positionsOn(ctx, 0)).toEqual([
        ['m1', 34, 44],
        ['m2', 46, 66]
      ]);
      expect(ctx.isBundleMember('m1')).toBe(true);
    });

    it('should place a bundle that exactly fills the free width', () => {
      const ctx = contextFor({ shelves: [shelfConfig({ id: 'only', width: 34.3 })] });
      const bundle = {
        products: [
          makeProduct({ id: 'a', width: 10.3, maxFacings: 1 }),
          makeProduct({ id: 'b', width: 18, maxFacings: 1 })
        ],
        frequency: 1
      };

      const placed = placeBundle(ctx, bundle);

      expect(placed).toEqual({ productIds: ['a', 'b'], shelfIds: ['only'], split: false });
      expect(ctx.warnings).toEqual([]);
      const [a, b] = ctx.shelves[0].placements;
      expect(a.productId).toBe('a');
      expect(a.xStart).toBeCloseTo(2);
      expect(b.productId).toBe('b');
      expect(b.xStart).toBeCloseTo(14.3);
      expect(b.xEnd).toBeCloseTo(32.3);
    });

    it('should prefer eye level for a high-value bundle', () => {
      const ctx = contextFor({
        shelves: [
          shelfConfig({ id: 'low', yPosition: 0, eyeLevelScore: 0.3 }),
          shelfConfig({ id: 'eye', yPosition: 40, eyeLevelScore: 0.9 })
        ]
      });
      const bundle = {
        products: [
          makeProduct({ id: 'm1', price: 30, avgWeeklySales: 70 }),
          makeProduct({ id: 'm2', price: 30, avgWeeklySales: 70 })
        ],
        frequency: 1
      };

      expect(placeBundle(ctx, bundle)?.shelfIds).toEqual(['eye']);
    });

    it('should split across adjacent shelves when no shelf holds the whole bundle', () => {
      const ctx = contextFor(ADJACENT_PAIR_STORE);
      const bundle = { products: [createProduct(DOCK_A), createProduct(DOCK_B)], frequency: 4 };

      const placed = placeBundle(ctx, bundle);

      expect(placed).toEqual({ productIds: ['dock-a', 'dock-b'], shelfIds: ['lower', 'upper'], split: true });
      expect(positionsOn(ctx, 0)).toEqual([['dock-a', 5, 45]]);
      expect(positionsOn(ctx, 1)).toEqual([['dock-b', 5, 45]]);
      expect(ctx.warnings).toEqual(['Split bundle (Dock A, Dock B) across shelves Lower and Upper']);
    });

    it('should abandon a bundle with no shelf or adjacent pair for it', () => {
      const ctx = contextFor({ shelves: [shelfConfig({ id: 'only', width: 50 })] });
      const bundle = { products: [createProduct(DOCK_A), createProduct(DOCK_B)], frequency: 4 };

      expect(placeBundle(ctx, bundle)).toBeNull();
      expect(ctx.shelves[0].isEmpty).toBe(true);
      expect(ctx.warnings).toEqual(['Could not place bundle (Dock A, Dock B); members will be placed individually']);
    });

    it('should skip a bundle whose members are already placed', () => {
      const ctx = contextFor(ADJACENT_PAIR_STORE);
      const dockA = createProduct(DOCK_A);
      ctx.place(ctx.shelves[0], dockA, 1);

      expect(placeBundle(ctx, { products: [dockA, createProduct(DOCK_B)], frequency: 1 })).toBeNull();
      expect(ctx.warnings).toEqual(['Skipped bundle (Dock A, Dock B): fewer than 2 members left to place']);
    });
  });

  describe('findRelatedShelf', () => {
    it('should find the shelf holding the same series', () => {
      const ctx = contextFor({
        shelves: [shelfConfig({ id: 'a', yPosition: 0 }), shelfConfig({ id: 'b', yPosition: 40 })]
      });
      ctx.place(ctx.shelves[1], makeProduct({ id: 'case', series: 'Phone 16' }), 1);

      const sameSeries = makeProduct({ id: 'glass', category: ProductCategory.ScreenProtector, series: 'Phone 16' });
      const unrelated = makeProduct({ id: 'cable', category: ProductCategory.Cable });

      expect(findRelatedShelf(ctx, sameSeries)?.id).toBe('b');
      expect(findRelatedShelf(ctx, unrelated)).toBeNull();
    });
  });

  describe('placeWithBundles', () => {
    it('should place bundles first and the rest beside related products', () => {
      const ctx = contextFor(SINGLE_SHELF_STORE);
      const m1 = makeProduct({ id: 'm1', width: 10, maxFacings: 1 });
      const m2 = makeProduct({ id: 'm2', width: 20, maxFacings: 1 });
      const loose = makeProduct({ id: 'loose', width: 10, maxFacings: 1 });

      const outcome = placeWithBundles(ctx, [loose, m1, m2], [{ products: [m1, m2], frequency: 1 }], 'balanced');

      expect(outcome.rejected).toEqual([]);
      expect(outcome.placements).toHaveLength(1);
      expect(positionsOn(ctx, 0)).toEqual([
        ['loose', 2, 12],
        ['m1', 34, 44],
        ['m2', 46, 66]
      ]);
    });
  });

  describe('bundle spacing', () => {
    const placeThree = (ctx: PlacementContext) => {
      for (const id of ['x', 'y', 'z']) {
        ctx.place(ctx.shelves[0], makeProduct({ id, width: 10 }), 1);
      }
    };
    const bundleXY = [{ productIds: ['x', 'y'], shelfIds: ['only'], split: false }];

    it('should add an extra gap where a bundle block ends', () => {
      const ctx = contextFor({ shelves: [shelfConfig({ id: 'only' })] });
      placeThree(ctx);

      expect(bundleSpacedPositions(ctx.shelves[0], new Map([['x', 0], ['y', 0]]), 2)).toEqual([2, 14, 28]);

      applyBundleSpacing(ctx, bundleXY);
      expect(ctx.shelves[0].placements.map(p => p.xStart)).toEqual([2, 14, 28]);
    });

    it('should fall back to a plain reflow when the extra gap does not fit', () => {
      const ctx = contextFor({ shelves: [shelfConfig({ id: 'only', width: 39 })] });
      placeThree(ctx);

      expect(bundleSpacedPositions(ctx.shelves[0], new Map([['x', 0], ['y', 0]]), 2)).toBeNull();

      applyBundleSpacing(ctx, bundleXY);
      expect(ctx.shelves[0].placements.map(p => p.xStart)).toEqual([2, 14, 26]);
    });
  });

  describe('calculateBundleMetrics', () => {
    it('should summarize bundle placement', () => {
      const products = ['a', 'b', 'c', 'd', 'e'].map(id => makeProduct({ id }));
      const bundles = [
        { products: products.slice(0, 2), frequency: 2 },
        { products: products.slice(2), frequency: 1 }
      ];

      const metrics = calculateBundleMetrics(
        bundles,
        [
          { productIds: ['a', 'b'], shelfIds: ['s1'], split: false },
          { productIds: ['c', 'd', 'e'], shelfIds: ['s1', 's2'], split: true }
        ],
        10
      );

      expect(metrics).toEqual({
        totalBundles: 2,
        bundlesPlaced: 2,
        splitBundles: 1,
        productsInBundles: 5,
        averageBundleSize: 2.5,
        bundleCoverage: 50
      });
    });
  });
});
