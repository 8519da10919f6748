import { describe, expect, it } from "vitest";

import { createDiscountTable } from "../discount";
import { CatalogService } from "../service";
import { toWireBatch, toWireEntry } from "../wire";
import {
  createFakeSite,
  expiringShop,
  html,
  loginPage,
  loginRoutes,
  productRoutes,
  redirect,
  stockPage,
  TEST_CREDENTIALS,
} from "./helpers";

const table = createDiscountTable({ brandx: 0.85 }, 0.95);

function createService(routes: Parameters<typeof createFakeSite>[0]) {
  const site = createFakeSite({ ...loginRoutes(), ...routes });
  const service = new CatalogService({
    credentials: TEST_CREDENTIALS,
    discountTable: table,
    fetch: site.fetch,
    authRetries: 0,
  });
  return { site, service };
}

const products = {
  "100201": {
    stock: stockPage([["บางนา", "15"]]),
    catalog: { sku: "100201", brand: "BrandX", salePrice: "฿1,000.00", wasPrice: "฿1,290.00" },
  },
  "100202": {
    stock: stockPage([["บางนา", "0"]]),
    catalog: { sku: "100202", brand: "Other", salePrice: "฿1,000.00" },
  },
  "100203": {
    stock: stockPage([["บางนา", "3"]]),
  },
};

describe("CatalogService", () => {
  it("returns one outcome per SKU with a NotFoundError for the missing product", async () => {
    const { service } = createService(productRoutes(products));

    const batch = await service.fetchMany(["100201", "100203", "100202"], 2);

    expect(batch.summary).toEqual({ processed: 3, succeeded: 2, failed: 1 });
    expect(batch.results.map(toWireEntry)).toEqual([
      {
        sku: "100201",
        brand: "BrandX",
        stock_quantity: 15,
        stock_status: 1,
        sale_price: 850,
        regular_price: "฿1,290.00",
      },
      {
        sku: "100203",
        error: { reason: "NotFoundError", stage: "catalog", detail: "No catalog results for SKU 100203" },
      },
      {
        sku: "100202",
        brand: "Other",
        stock_quantity: 0,
        stock_status: 0,
        sale_price: 950,
        regular_price: "฿1,000.00",
      },
    ]);
  });

  it("counts successful records in the wire summary", async () => {
    const { service } = createService(productRoutes(products));

    const wire = toWireBatch(await service.fetchMany(["100201", "100203"]));

    expect(wire.count).toBe(1);
    expect(wire.products).toHaveLength(2);
    expect(wire.summary).toEqual({ processed: 2, succeeded: 1, failed: 1 });
    expect(wire.processing_time).toBeGreaterThanOrEqual(0);
  });

  it("fetches a single SKU through the same pipeline", async () => {
    const { service } = createService(productRoutes(products));

    const result = await service.fetchOne("100202");

    expect(result.status === "success" && result.record.salePrice).toBe(950);
  });

  it("logs in once for consecutive batches", async () => {
    const { site, service } = createService(productRoutes(products));

    await service.fetchMany(["100201"]);
    await service.fetchMany(["100202"]);

    expect(site.requests.filter((request) => request.method === "POST")).toHaveLength(1);
  });

  it("logs in again after a fetch found the session expired", async () => {
    let expired = true;
    const routes = productRoutes({
      "100201": {
        stock: () => {
          if (expired) {
            expired = false;
            return redirect(`${TEST_CREDENTIALS.stockBaseUrl}/login`);
          }
          return html(stockPage([["บางนา", "2"]]));
        },
        catalog: products["100201"].catalog,
      },
    });
    const { site, service } = createService(routes);

    const first = await service.fetchOne("100201");
    const second = await service.fetchOne("100201");

    expect(first.status === "failed" && first.failure.detail).toBe("Session expired: stock page redirected to login");
    expect(second.status === "success" && second.record.stockQuantity).toBe(2);
    expect(site.requests.filter((request) => request.method === "POST")).toHaveLength(2);
  });

  it("logs in again when the shop ended the session between batches", async () => {
    const shop = expiringShop({ "1": "4", "2": "0", "3": "7" });
    const catalog = productRoutes({
      "1": { catalog: { sku: "1", brand: "BrandX", salePrice: "฿100.00" } },
      "2": { catalog: { sku: "2", brand: "BrandX", salePrice: "฿200.00" } },
      "3": { catalog: { sku: "3", brand: "BrandX", salePrice: "฿300.00" } },
    });
    const { site, service } = createService({ ...catalog, ...shop.routes });

    const first = await service.fetchMany(["1", "2", "3"], 1);
    shop.endSessions();
    const second = await service.fetchMany(["1", "2", "3"], 1);

    expect(first.summary.succeeded).toBe(3);
    expect(second.summary.succeeded).toBe(3);
    expect(second.results.map((result) => result.status === "success" && result.record.stockQuantity)).toEqual([4, 0, 7]);
    expect(site.requests.filter((request) => request.method === "POST")).toHaveLength(2);
  });

  it("moves to a new login when the shop ends the session mid-batch", async () => {
    const shop = expiringShop({ "1": "4", "2": "5", "3": "6" });
    const catalog = productRoutes({
      "1": { catalog: { sku: "1", brand: "BrandX", salePrice: "฿100.00" } },
      "2": { catalog: { sku: "2", brand: "BrandX", salePrice: "฿200.00" } },
      "3": { catalog: { sku: "3", brand: "BrandX", salePrice: "฿300.00" } },
    });
    const stockOne = shop.routes[`GET ${TEST_CREDENTIALS.stockBaseUrl}/p/1`];
    const { service } = createService({
      ...catalog,
      ...shop.routes,
      [`GET ${TEST_CREDENTIALS.stockBaseUrl}/p/1`]: (request) => {
        shop.endSessions();
        return stockOne(request);
      },
    });

    const batch = await service.fetchMany(["1", "2", "3"], 1);

    expect(batch.results.map((result) => result.status)).toEqual(["failed", "success", "success"]);
  });

  it("uses a replaced discount table for later batches", async () => {
    const { service } = createService(productRoutes(products));

    service.setDiscountTable(createDiscountTable({ brandx: 0.5 }, 1));
    const result = await service.fetchOne("100201");

    expect(result.status === "success" && result.record.salePrice).toBe(500);
    expect(service.currentDiscountTable.defaultRatio).toBe(1);
  });

  it("reports a rejected login as false", async () => {
    const { service } = createService({
      [`GET ${TEST_CREDENTIALS.stockBaseUrl}/my-account/update-profile`]: () => html(loginPage()),
    });

    await expect(service.login()).resolves.toBe(false);
  });

  it("fails the batch when the shop rejects the credentials", async () => {
    const { service } = createService({
      ...productRoutes(products),
      [`GET ${TEST_CREDENTIALS.stockBaseUrl}/my-account/update-profile`]: () => html(loginPage()),
    });

    await expect(service.fetchMany(["100201", "100202"])).rejects.toThrow("Shop rejected the credentials");
  });
});
