/**
 * Placement Context Tests
 */

import { PlacementContext } from './placement-context';
import { createStore } from './store';
import { silentLogger } from './utils/logger';
import { StoreConfig } from './schemas';
import { makeProduct } from '../../test/fixtures/products';
import { shelfConfig } from '../../test/fixtures/stores';

const contextFor = (config: StoreConfig): PlacementContext =>
  new PlacementContext(createStore(config), 2, silentLogger);

const twoShelves: StoreConfig = {
  shelves: [shelfConfig({ id: 'left', width: 34 }), shelfConfig({ id: 'right', width: 34, yPosition: 40 })]
};

describe('PlacementContext', () => {
  describe('place', () => {
    it('should index placements', () => {
      const ctx = contextFor(twoShelves);
      const [left] = ctx.shelves;
      const product = makeProduct({ id: 'p' });

      const placement = ctx.place(left, product, 2);

      expect(placement).toEqual({ productId: 'p', facings: 2, width: 20, xStart: 2, xEnd: 22 });
      expect(ctx.isPlaced('p')).toBe(true);
      expect(ctx.lookup('p')?.shelf).toBe(left);
      expect(ctx.productsOn(left)).toEqual([product]);
    });

    it('should refuse to place a product twice', () => {
      const ctx = contextFor(twoShelves);
      const [left, right] = ctx.shelves;
      const product = makeProduct({ id: 'p' });
      ctx.place(left, product, 1);

      expect(() => ctx.place(right, product, 1)).toThrow('Product p is already placed on shelf left');
    });
  });

  describe('tryPlace', () => {
    it('should retry at minimum facings when the request does not fit', () => {
      const ctx = contextFor(twoShelves);
      const product = makeProduct({ id: 'p', width: 10, maxFacings: 5 });

      expect(ctx.tryPlace(ctx.shelves[0], product, 4)?.facings).toBe(1);
    });

    it('should skip shelves the product is too tall for', () => {
      const ctx = contextFor({
        shelves: [shelfConfig({ id: 'short', height: 10 }), shelfConfig({ id: 'tall', height: 40, yPosition: 20 })]
      });
      const product = makeProduct({ id: 'p', height: 20 });

      expect(ctx.tryPlace(ctx.shelves[0], product, 1)).toBeNull();
      ctx.tryPlaceOnAny(ctx.shelves, product, 1);
      expect(ctx.lookup('p')?.shelf.id).toBe('tall');
    });
  });

  describe('remove', () => {
    it('should keep the index and the shelf in step', () => {
      const ctx = contextFor(twoShelves);
      ctx.place(ctx.shelves[0], makeProduct({ id: 'p' }), 1);

      const removed = ctx.remove('p');

      expect(removed?.placement.xStart).toBe(2);
      expect(ctx.isPlaced('p')).toBe(false);
      expect(ctx.shelves[0].isEmpty).toBe(true);
      expect(ctx.remove('p')).toBeUndefined();
    });
  });

  describe('move', () => {
    it('should move a product at its current facings', () => {
      const ctx = contextFor(twoShelves);
      const [left, right] = ctx.shelves;
      ctx.place(left, makeProduct({ id: 'p' }), 2);

      const moved = ctx.move('p', right);

      expect(moved).toEqual({ productId: 'p', facings: 2, width: 20, xStart: 2, xEnd: 22 });
      expect(ctx.lookup('p')?.shelf).toBe(right);
      expect(left.isEmpty).toBe(true);
    });

    it('should leave everything in place when the target is full', () => {
      const ctx = contextFor(twoShelves);
      const [left, right] = ctx.shelves;
      ctx.place(left, makeProduct({ id: 'p', width: 20 }), 1);
      ctx.place(right, makeProduct({ id: 'q', width: 20 }), 1);

      expect(ctx.move('p', right)).toBeNull();
      expect(ctx.lookup('p')?.shelf).toBe(left);
      expect(left.placements[0].xStart).toBe(2);
    });
  });

  describe('restore', () => {
    it('should put a placement back at its old position', () => {
      const ctx = contextFor(twoShelves);
      const [left] = ctx.shelves;
      const product = makeProduct({ id: 'p' });
      ctx.placeAt(left, product, 1, 12);
      const removed = ctx.remove('p');
      if (!removed) throw new Error('Expected a removed entry');

      ctx.restore(removed.shelf, removed.product, removed.placement);

      expect(ctx.lookup('p')?.placement.xStart).toBe(12);
    });

    it('should throw when the old position is taken', () => {
      const ctx = contextFor(twoShelves);
      const [left] = ctx.shelves;
      const product = makeProduct({ id: 'p' });
      ctx.place(left, product, 1);
      const removed = ctx.remove('p');
      if (!removed) throw new Error('Expected a removed entry');
      ctx.place(left, makeProduct({ id: 'q' }), 1);

      expect(() => ctx.restore(left, product, removed.placement)).toThrow('Could not restore p on shelf left at x=2');
    });
  });

  describe('placedProducts', () => {
    it('should list products in placement order, skipping removed ones', () => {
      const ctx = contextFor(twoShelves);
      const [left, right] = ctx.shelves;
      ctx.place(right, makeProduct({ id: 'b' }), 1);
      ctx.place(left, makeProduct({ id: 'a' }), 1);
      ctx.place(left, makeProduct({ id: 'c' }), 1);
      ctx.remove('a');

      expect(ctx.placedProducts().map(p => p.id)).toEqual(['b', 'c']);
    });
  });

  describe('warn', () => {
    it('should collect warnings', () => {
      const ctx = contextFor(twoShelves);
      ctx.warn('first');
      ctx.warn('second');
      expect(ctx.warnings).toEqual(['first', 'second']);
    });
  });
});
