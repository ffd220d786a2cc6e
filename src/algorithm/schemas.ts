/**
 * Input schemas
 *
 * Every record that crosses into the engine is validated here, and every
 * optional field gets its default here, once. Scoring code never checks for
 * missing attributes.
 */

import { z } from 'zod';
import { ProductCategory, ProductStatus, ShelfType } from './types';
import {
  DEFAULT_GAP_SIZE,
  DEFAULT_OPTIMIZATION_WEIGHTS,
  DEFAULT_RESTOCK_FREQUENCY_DAYS,
  DEFAULT_STORE_RULES,
  DEFAULT_STRATEGY
} from './constants';
import { ConfigurationError } from './errors';

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();

export const productRecordSchema = z
  .object({
    id: z.string().min(1, 'Product id is required'),
    name: z.string().optional(),
    category: z.nativeEnum(ProductCategory).default(ProductCategory.Other),
    series: z.string().default(''),
    brand: z.string().default(''),
    status: z.nativeEnum(ProductStatus).default(ProductStatus.Active),
    width: positive,
    height: positive,
    depth: positive,
    avgWeeklySales: nonNegative.optional(),
    qtySoldLastWeek: nonNegative.optional(),
    qtySoldLastMonth: nonNegative.optional(),
    totalQuantity: nonNegative.optional(),
    price: nonNegative.default(0),
    profit: nonNegative.optional(),
    currentStock: nonNegative.default(0),
    minStock: nonNegative.default(0),
    minFacings: z.number().int().min(1).default(1),
    maxFacings: z.number().int().min(1).default(1),
    attachRate: z.number().min(0).max(1).default(0),
    bundleFrequency: nonNegative.default(0)
  })
  .refine(p => p.minFacings <= p.maxFacings, {
    message: 'minFacings must not exceed maxFacings',
    path: ['minFacings']
  });

export const shelfConfigSchema = z.object({
  id: z.string().min(1, 'Shelf id is required'),
  name: z.string().optional(),
  width: positive,
  height: positive,
  depth: positive,
  yPosition: nonNegative.default(0),
  type: z.nativeEnum(ShelfType).default(ShelfType.Standard),
  eyeLevelScore: z.number().min(0).max(1).default(0.5)
});

export const storeRulesSchema = z.object({
  minSkusPerCategory: z.number().int().nonnegative().optional(),
  maxSkusPerCategory: z.number().int().positive().optional(),
  minWeeklySales: nonNegative.optional(),
  maxFacingsPerProduct: z.number().int().positive().optional(),
  categoryGrouping: z.boolean().default(DEFAULT_STORE_RULES.categoryGrouping),
  onlyBestsellers: z.boolean().default(DEFAULT_STORE_RULES.onlyBestsellers),
  maxSkusTotal: z.number().int().positive().default(DEFAULT_STORE_RULES.maxSkusTotal),
  filterBySalesRank: z.boolean().default(DEFAULT_STORE_RULES.filterBySalesRank),
  maxRankIncluded: z.number().int().positive().default(DEFAULT_STORE_RULES.maxRankIncluded),
  maxCategoriesPerShelf: z.number().int().positive().optional()
});

export const optimizationWeightsSchema = z.object({
  salesVelocity: nonNegative.default(DEFAULT_OPTIMIZATION_WEIGHTS.salesVelocity),
  profitability: nonNegative.default(DEFAULT_OPTIMIZATION_WEIGHTS.profitability),
  attachRate: nonNegative.default(DEFAULT_OPTIMIZATION_WEIGHTS.attachRate),
  novelty: nonNegative.default(DEFAULT_OPTIMIZATION_WEIGHTS.novelty)
});

export const storeConfigSchema = z.object({
  name: z.string().default('Store'),
  type: z.enum(['flagship', 'standard', 'express']).default('standard'),
  restockFrequencyDays: z.number().int().positive().default(DEFAULT_RESTOCK_FREQUENCY_DAYS),
  shelves: z.array(shelfConfigSchema),
  rules: storeRulesSchema.default({}),
  weights: optimizationWeightsSchema.default({})
});

export const allocationStrategySchema = z.enum([
  'salesVelocity',
  'categoryGrouped',
  'valueDensity',
  'profitEfficiency',
  'balanced'
]);

export const allocationOptionsSchema = z.object({
  gapSize: nonNegative.default(DEFAULT_GAP_SIZE),
  strategy: allocationStrategySchema.default(DEFAULT_STRATEGY)
});

export const coPurchaseRecordSchema = z.object({
  productIds: z.array(z.string().min(1)).min(2, 'A co-purchase group needs at least two products'),
  frequency: nonNegative.default(0)
});

export type ProductRecord = z.input<typeof productRecordSchema>;
export type ShelfConfigInput = z.input<typeof shelfConfigSchema>;
export type StoreConfig = z.input<typeof storeConfigSchema>;
export type ParsedStoreConfig = z.output<typeof storeConfigSchema>;
export type AllocationOptionsInput = z.input<typeof allocationOptionsSchema>;
export type AllocationOptions = z.output<typeof allocationOptionsSchema>;
export type CoPurchaseRecord = z.input<typeof coPurchaseRecordSchema>;
export type ParsedCoPurchaseRecord = z.output<typeof coPurchaseRecordSchema>;

/**
 * Formats zod issues as "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parses `input` with `schema`, raising a ConfigurationError that lists every
 * failing field.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${what}`, formatIssues(parsed.error));
  }
  return parsed.data;
}
