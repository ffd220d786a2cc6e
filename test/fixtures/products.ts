/**
 * Test Fixtures - Products
 *
 * Product records for testing the allocation engine.
 * Dimensions are in centimetres, sales in units per week unless noted.
 */

import { Product, ProductCategory, ProductStatus } from '../../src/algorithm/types';
import { ProductRecord } from '../../src/algorithm/schemas';
import { createProduct } from '../../src/algorithm/product';

type RecordOverrides = Partial<ProductRecord> & { id: string };

/**
 * A small accessory with one to three facings, 2 units/day
 */
export const productRecord = (overrides: RecordOverrides): ProductRecord => ({
  category: ProductCategory.Case,
  width: 10,
  height: 15,
  depth: 5,
  avgWeeklySales: 14,
  price: 20,
  minFacings: 1,
  maxFacings: 3,
  ...overrides
});

export const makeProduct = (overrides: RecordOverrides): Product => createProduct(productRecord(overrides));

// ============================================================================
// Scenario products
// ============================================================================

/**
 * Fast seller - 50 units/day, top tier, capped at 3 facings
 */
export const CLEAR_CASE: ProductRecord = productRecord({
  id: 'clear-case',
  name: 'Clear Case',
  series: 'Phone 16',
  avgWeeklySales: 350,
  price: 30,
  maxFacings: 3
});

/**
 * Steady seller - 10 units/day, good tier, capped at 2 facings
 */
export const SLIM_CASE: ProductRecord = productRecord({
  id: 'slim-case',
  name: 'Slim Case',
  series: 'Phone 16',
  avgWeeklySales: 70,
  price: 30,
  maxFacings: 2
});

/**
 * Wider than any narrow test shelf
 */
export const WIDE_CASE: ProductRecord = productRecord({
  id: 'wide-case',
  name: 'Wide Case',
  width: 20,
  height: 10,
  maxFacings: 1
});

/**
 * Two docks bought together, 40cm each, always one facing
 */
export const DOCK_A: ProductRecord = productRecord({
  id: 'dock-a',
  name: 'Dock A',
  category: ProductCategory.Charger,
  width: 40,
  height: 10,
  maxFacings: 1
});

export const DOCK_B: ProductRecord = productRecord({
  id: 'dock-b',
  name: 'Dock B',
  category: ProductCategory.Charger,
  width: 40,
  height: 10,
  maxFacings: 1
});

// ============================================================================
// Mixed catalog
// ============================================================================

/**
 * Ten accessories across five categories with varied sales, margins and
 * facing ranges. Fits partly on GONDOLA_STORE.
 */
export const CATALOG: ProductRecord[] = [
  productRecord({ id: 'case-clear', name: 'Clear Case', series: 'Phone 16', avgWeeklySales: 210, price: 25, profit: 15, maxFacings: 4 }),
  productRecord({ id: 'case-leather', name: 'Leather Case', series: 'Phone 16', avgWeeklySales: 35, price: 60, profit: 35, maxFacings: 2 }),
  productRecord({ id: 'case-rugged', name: 'Rugged Case', series: 'Phone 15', avgWeeklySales: 56, price: 45, profit: 22, maxFacings: 3 }),
  productRecord({ id: 'cable-usbc', name: 'USB-C Cable', category: ProductCategory.Cable, width: 8, height: 20, avgWeeklySales: 280, price: 19, profit: 11, attachRate: 0.4, maxFacings: 4 }),
  productRecord({ id: 'cable-lightning', name: 'Lightning Cable', category: ProductCategory.Cable, width: 8, height: 20, qtySoldLastMonth: 240, price: 19, profit: 10, maxFacings: 3 }),
  productRecord({ id: 'charger-20w', name: '20W Charger', category: ProductCategory.Charger, width: 12, height: 12, avgWeeklySales: 140, price: 29, profit: 14, currentStock: 40, minStock: 10, maxFacings: 4 }),
  productRecord({ id: 'charger-mag', name: 'Magnetic Charger', category: ProductCategory.Charger, width: 14, height: 12, avgWeeklySales: 42, price: 49, profit: 24, status: ProductStatus.New, maxFacings: 2 }),
  productRecord({ id: 'glass-pro', name: 'Glass Protector', category: ProductCategory.ScreenProtector, width: 9, height: 18, avgWeeklySales: 175, price: 15, profit: 10, maxFacings: 3 }),
  productRecord({ id: 'buds-lite', name: 'Buds Lite', category: ProductCategory.Audio, width: 16, height: 22, avgWeeklySales: 28, price: 129, profit: 45, minFacings: 1, maxFacings: 2 }),
  productRecord({ id: 'band-sport', name: 'Sport Band', category: ProductCategory.WatchBand, width: 7, height: 25, qtySoldLastWeek: 12, price: 39, profit: 20, maxFacings: 2 })
];
