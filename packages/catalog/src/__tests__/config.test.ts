import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadConfig, loadDiscountTable } from "../config";
import { NO_DISCOUNT } from "../discount";
import { ConfigError } from "../errors";

const baseEnv = {
  CATALOG_USERNAME: "test-user",
  CATALOG_PASSWORD: "test-secret",
  STOCK_BASE_URL: "https://shop.example.test/th/THB",
  CATALOG_BASE_URL: "https://catalog.example.test",
};

describe("loadConfig", () => {
  it("applies defaults for optional settings", () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      credentials: {
        username: "test-user",
        password: "test-secret",
        stockBaseUrl: "https://shop.example.test/th/THB",
        catalogBaseUrl: "https://catalog.example.test",
      },
      requestTimeoutMs: 20000,
      authRetries: 2,
      sessionMaxAgeMs: 1800000,
      batchTimeoutMs: undefined,
      discountConfigPath: "discount.json",
    });
  });

  it("coerces numeric settings from strings", () => {
    const config = loadConfig({ ...baseEnv, REQUEST_TIMEOUT_MS: "5000", AUTH_RETRIES: "0", BATCH_TIMEOUT_MS: "60000" });

    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.authRetries).toBe(0);
    expect(config.batchTimeoutMs).toBe(60000);
  });

  it("lists every invalid setting", () => {
    const env = { ...baseEnv, CATALOG_PASSWORD: "", STOCK_BASE_URL: "not a url" };

    expect(() => loadConfig(env)).toThrow(ConfigError);
    try {
      loadConfig(env);
    } catch (error) {
      expect(error instanceof ConfigError && error.issues.map((issue) => issue.split(":")[0])).toEqual([
        "CATALOG_PASSWORD",
        "STOCK_BASE_URL",
      ]);
    }
  });
});

describe("loadDiscountTable", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sku-lookup-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads brand ratios from the file", async () => {
    const path = join(dir, "discount.json");
    await writeFile(path, JSON.stringify({ SP_BRAND_DC_RATIO: { BrandX: 0.85 }, OTHER_BRAND_DC_RATIO: 0.95 }));

    const table = await loadDiscountTable(path);

    expect(table.brandRatio.get("brandx")).toBe(0.85);
    expect(table.defaultRatio).toBe(0.95);
  });

  it("falls back to no discount when the file is missing", async () => {
    await expect(loadDiscountTable(join(dir, "missing.json"))).resolves.toBe(NO_DISCOUNT);
  });

  it("falls back to no discount when a ratio is out of range", async () => {
    const path = join(dir, "discount.json");
    await writeFile(path, JSON.stringify({ OTHER_BRAND_DC_RATIO: 1.5 }));

    await expect(loadDiscountTable(path)).resolves.toBe(NO_DISCOUNT);
  });

  it("falls back to no discount when the file is not JSON", async () => {
    const path = join(dir, "discount.json");
    await writeFile(path, "SP_BRAND_DC_RATIO=0.9");

    await expect(loadDiscountTable(path)).resolves.toBe(NO_DISCOUNT);
  });
});
