import { z } from "zod";

import type { DiscountTable } from "./types";

const RATIO_SCHEMA = z.number().gt(0).lte(1);

/** Shape of the discount configuration file. */
export const DISCOUNT_CONFIG_SCHEMA = z.object({
  SP_BRAND_DC_RATIO: z.record(z.string(), RATIO_SCHEMA).default({}),
  OTHER_BRAND_DC_RATIO: RATIO_SCHEMA,
});

export type DiscountConfig = z.input<typeof DISCOUNT_CONFIG_SCHEMA>;

export const NO_DISCOUNT: DiscountTable = Object.freeze({
  brandRatio: new Map<string, number>(),
  defaultRatio: 1,
});

export function createDiscountTable(brandRatio: Record<string, number>, defaultRatio: number): DiscountTable {
  const normalized = new Map<string, number>();
  for (const [brand, ratio] of Object.entries(brandRatio)) {
    normalized.set(normalizeBrand(brand), RATIO_SCHEMA.parse(ratio));
  }

  return Object.freeze({
    brandRatio: normalized,
    defaultRatio: RATIO_SCHEMA.parse(defaultRatio),
  });
}

export function parseDiscountTable(raw: unknown): DiscountTable {
  const config = DISCOUNT_CONFIG_SCHEMA.parse(raw);
  return createDiscountTable(config.SP_BRAND_DC_RATIO, config.OTHER_BRAND_DC_RATIO);
}

export function resolveRatio(table: DiscountTable, brand: string | null): number {
  if (brand === null) {
    return table.defaultRatio;
  }

  const key = normalizeBrand(brand);
  if (!key) {
    return table.defaultRatio;
  }

  return table.brandRatio.get(key) ?? table.defaultRatio;
}

/**
 * Discounted price for a brand, rounded half-up to two decimal places.
 */
export function applyDiscount(table: DiscountTable, brand: string | null, basePrice: number): number {
  return roundCurrency(basePrice * resolveRatio(table, brand));
}

export function roundCurrency(value: number): number {
  // Scaling by 100 can land just below a .5 boundary (1.005 * 100 = 100.49999...).
  const scaled = Number((Math.abs(value) * 100).toPrecision(15));
  return (Math.sign(value) * Math.round(scaled)) / 100;
}

function normalizeBrand(brand: string): string {
  return brand.trim().toLowerCase();
}
