import { readFile } from "node:fs/promises";

import { z } from "zod";

import { NO_DISCOUNT, parseDiscountTable } from "./discount";
import { ConfigError, describeError } from "./errors";
import { createLogger } from "./logger";
import type { Credentials, DiscountTable } from "./types";

const logger = createLogger("config");

const ENV_SCHEMA = z.object({
  CATALOG_USERNAME: z.string().min(1),
  CATALOG_PASSWORD: z.string().min(1),
  STOCK_BASE_URL: z.string().url(),
  CATALOG_BASE_URL: z.string().url(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  AUTH_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  SESSION_MAX_AGE_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  BATCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DISCOUNT_CONFIG_PATH: z.string().min(1).default("discount.json"),
});

export type AppConfig = {
  credentials: Credentials;
  requestTimeoutMs: number;
  authRetries: number;
  sessionMaxAgeMs: number;
  batchTimeoutMs?: number;
  discountConfigPath: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ENV_SCHEMA.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid environment",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    credentials: Object.freeze({
      username: values.CATALOG_USERNAME,
      password: values.CATALOG_PASSWORD,
      stockBaseUrl: values.STOCK_BASE_URL,
      catalogBaseUrl: values.CATALOG_BASE_URL,
    }),
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    authRetries: values.AUTH_RETRIES,
    sessionMaxAgeMs: values.SESSION_MAX_AGE_MS,
    batchTimeoutMs: values.BATCH_TIMEOUT_MS,
    discountConfigPath: values.DISCOUNT_CONFIG_PATH,
  };
}

/**
 * Reads the discount table from a JSON file. A missing or invalid file falls back
 * to {@link NO_DISCOUNT} so lookups keep working with undiscounted prices.
 */
export async function loadDiscountTable(path: string): Promise<DiscountTable> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    logger.error({ path, error: describeError(error) }, "Discount config not readable, prices will not be discounted");
    return NO_DISCOUNT;
  }

  try {
    const table = parseDiscountTable(JSON.parse(contents));
    logger.info({ path, brands: table.brandRatio.size, defaultRatio: table.defaultRatio }, "Loaded discount config");
    return table;
  } catch (error) {
    logger.error({ path, error: describeError(error) }, "Discount config invalid, prices will not be discounted");
    return NO_DISCOUNT;
  }
}
