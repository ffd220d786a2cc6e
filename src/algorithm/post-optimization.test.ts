/**
 * Post-optimization Tests
 */

import { balanceLoad, groupByCategory, postOptimize } from './post-optimization';
import { PlacementContext } from './placement-context';
import { createStore } from './store';
import { ProductCategory } from './types';
import { StoreConfig } from './schemas';
import { silentLogger } from './utils/logger';
import { makeProduct } from '../../test/fixtures/products';
import { shelfConfig } from '../../test/fixtures/stores';

const contextFor = (config: StoreConfig): PlacementContext =>
  new PlacementContext(createStore(config), 2, silentLogger);

const donorAndReceiver: StoreConfig = {
  shelves: [shelfConfig({ id: 'donor', yPosition: 0 }), shelfConfig({ id: 'receiver', yPosition: 40 })]
};

const xStarts = (ctx: PlacementContext, shelfIndex: number): [string, number][] =>
  ctx.shelves[shelfIndex].placements.map(p => [p.productId, p.xStart]);

describe('Post-optimization', () => {
  describe('balanceLoad', () => {
    const fillDonor = (ctx: PlacementContext): void => {
      const [donor] = ctx.shelves;
      ctx.place(donor, makeProduct({ id: 'p1', width: 40, avgWeeklySales: 140, maxFacings: 1 }), 1);
      ctx.place(donor, makeProduct({ id: 'p2', width: 30, avgWeeklySales: 7, maxFacings: 1 }), 1);
      ctx.place(donor, makeProduct({ id: 'p3', width: 16, avgWeeklySales: 70, maxFacings: 1 }), 1);
    };

    it('should move the slowest product off a crowded shelf', () => {
      const ctx = contextFor(donorAndReceiver);
      fillDonor(ctx);
      expect(ctx.shelves[0].utilization).toBeCloseTo(90);

      expect(balanceLoad(ctx)).toBe(1);
      expect(xStarts(ctx, 1)).toEqual([['p2', 2]]);
      expect(ctx.lookup('p2')?.shelf.id).toBe('receiver');
      expect(ctx.shelves[0].utilization).toBeCloseTo(58);
    });

    it('should leave bundle members where they are', () => {
      const ctx = contextFor(donorAndReceiver);
      fillDonor(ctx);
      ctx.markBundleMember('p2');

      expect(balanceLoad(ctx)).toBe(1);
      expect(xStarts(ctx, 1)).toEqual([['p3', 2]]);
      expect(ctx.shelves[0].utilization).toBeCloseTo(72);
    });

    it('should not move a product when the receiver would end up fuller', () => {
      const ctx = contextFor(donorAndReceiver);
      ctx.place(ctx.shelves[0], makeProduct({ id: 'big', width: 90, maxFacings: 1 }), 1);

      expect(balanceLoad(ctx)).toBe(0);
      expect(ctx.lookup('big')?.shelf.id).toBe('donor');
    });
  });

  describe('groupByCategory', () => {
    it('should keep categories and series together in first-seen order', () => {
      const ctx = contextFor({ shelves: [shelfConfig({ id: 'only' })] });
      const [shelf] = ctx.shelves;
      ctx.place(shelf, makeProduct({ id: 'c1', series: 'A' }), 1);
      ctx.place(shelf, makeProduct({ id: 'k1', category: ProductCategory.Cable }), 1);
      ctx.place(shelf, makeProduct({ id: 'c2', series: 'B' }), 1);
      ctx.place(shelf, makeProduct({ id: 'c3', series: 'A' }), 1);

      groupByCategory(ctx);

      expect(xStarts(ctx, 0)).toEqual([
        ['c1', 2],
        ['c3', 14],
        ['c2', 26],
        ['k1', 38]
      ]);
    });
  });

  describe('postOptimize', () => {
    it('should close holes left by removed products', () => {
      const ctx = contextFor({ shelves: [shelfConfig({ id: 'only' })] });
      const [shelf] = ctx.shelves;
      for (const id of ['a', 'b', 'c']) {
        ctx.place(shelf, makeProduct({ id }), 1);
      }
      ctx.remove('b');

      postOptimize(ctx);

      expect(xStarts(ctx, 0)).toEqual([
        ['a', 2],
        ['c', 14]
      ]);
    });
  });
});
