import { applyDiscount } from "./discount";
import { CatalogError, describeError, NetworkError, NotFoundError } from "./errors";
import { extractCatalog, extractStock } from "./extract";
import type { CatalogSession, PageResponse } from "./http";
import { createLogger, type Logger } from "./logger";
import { DEFAULT_MARKUP, type MarkupContract } from "./markup";
import type { Credentials, DiscountTable, FetchFailure, FetchStage, ProductRecord, ProductResult } from "./types";
import { buildUrl, DEFAULT_URL_TEMPLATES, isLoginUrl, type UrlTemplates } from "./url";

export type FetchOptions = {
  credentials: Pick<Credentials, "stockBaseUrl" | "catalogBaseUrl">;
  urls?: UrlTemplates;
  markup?: MarkupContract;
  logger?: Logger;
};

export type ProductFetcher = (sku: string, session: CatalogSession, discountTable: DiscountTable) => Promise<ProductResult>;

const NOT_FOUND_STATUS = 404;

/**
 * Loads the stock page and the catalog page for one SKU and merges them into a
 * record. Every failure is returned as a `failed` result; nothing is retried.
 */
export async function fetchProduct(
  sku: string,
  session: CatalogSession,
  discountTable: DiscountTable,
  options: FetchOptions,
): Promise<ProductResult> {
  const urls = options.urls ?? DEFAULT_URL_TEMPLATES;
  const markup = options.markup ?? DEFAULT_MARKUP;
  const logger = (options.logger ?? createLogger("fetcher")).child({ sku });

  const stockUrl = buildUrl(urls.stockProduct, options.credentials.stockBaseUrl, sku);
  const catalogUrl = buildUrl(urls.catalogSearch, options.credentials.catalogBaseUrl, sku);
  const loginUrl = buildUrl(urls.login, options.credentials.stockBaseUrl);

  try {
    const [stockPage, catalogPage] = await Promise.all([
      loadPage(session, stockUrl, "stock"),
      loadPage(session, catalogUrl, "catalog"),
    ]);

    if (isLoginUrl(stockPage.url, loginUrl)) {
      session.markStale();
      throw new NetworkError("Session expired: stock page redirected to login", { stage: "stock" });
    }

    const catalog = extractCatalog(catalogPage.html, sku, markup.catalog);
    const stock = extractStock(stockPage.html, markup.stock);

    const record: ProductRecord = Object.freeze({
      sku,
      brand: catalog.brand,
      stockQuantity: stock.stockQuantity,
      stockStatus: stock.stockStatus,
      salePrice: catalog.basePrice === null ? null : applyDiscount(discountTable, catalog.brand, catalog.basePrice),
      regularPrice: catalog.regularPrice,
    });

    logger.info(
      { brand: record.brand, stockQuantity: record.stockQuantity, basePrice: catalog.basePrice, salePrice: record.salePrice },
      "Fetched product",
    );

    return { status: "success", record };
  } catch (error) {
    const failure = toFailure(sku, error);
    logger.warn({ reason: failure.reason, stage: failure.stage, detail: failure.detail }, "Product fetch failed");
    return { status: "failed", failure };
  }
}

export function createProductFetcher(options: FetchOptions): ProductFetcher {
  return (sku, session, discountTable) => fetchProduct(sku, session, discountTable, options);
}

async function loadPage(session: CatalogSession, url: string, stage: FetchStage): Promise<PageResponse> {
  let page: PageResponse;
  try {
    page = await session.get(url);
  } catch (error) {
    throw new NetworkError(`${stage} request failed: ${describeError(error)}`, { stage, cause: error });
  }

  if (page.status === NOT_FOUND_STATUS) {
    throw new NotFoundError(`${stage} page returned ${NOT_FOUND_STATUS}`, { stage });
  }

  if (!page.ok) {
    throw new NetworkError(`${stage} page responded with ${page.status}`, { stage });
  }

  return page;
}

function toFailure(sku: string, error: unknown): FetchFailure {
  if (error instanceof CatalogError && error.kind !== "AuthError") {
    return {
      sku,
      reason: error.kind,
      stage: error.stage ?? "catalog",
      detail: error.message,
    };
  }

  // Anything else escaped the extractors: treat it as markup we could not read.
  return {
    sku,
    reason: "ParseError",
    stage: "catalog",
    detail: describeError(error),
  };
}
