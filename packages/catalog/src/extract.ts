import { load } from "cheerio";

import { NotFoundError, ParseError } from "./errors";
import { DEFAULT_MARKUP, type CatalogMarkup, type LoginMarkup, type StockMarkup } from "./markup";
import { parsePriceFromText } from "./price";
import type { CatalogExtract, StockExtract } from "./types";

type Document = ReturnType<typeof load>;

export function extractStock(html: string, markup: StockMarkup = DEFAULT_MARKUP.stock): StockExtract {
  const $ = load(html);
  const table = $(markup.table).first();
  const available = detectAvailability($, markup);

  if (table.length === 0) {
    if ($(markup.productContainer).length === 0 && available === null) {
      throw new ParseError("Stock page has no stock table or product container", { stage: "stock" });
    }

    return {
      stockQuantity: null,
      stockStatus: available === true ? 1 : 0,
    };
  }

  const stockColumn = findStockColumn($, markup);
  let total = 0;

  table.find("tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length <= stockColumn) {
      return;
    }

    const quantity = parseStockCell(cells.eq(stockColumn).text());
    if (quantity !== null) {
      total += quantity;
    }
  });

  return {
    stockQuantity: total,
    stockStatus: total > 0 ? 1 : 0,
  };
}

export function extractCatalog(html: string, sku: string, markup: CatalogMarkup = DEFAULT_MARKUP.catalog): CatalogExtract {
  const $ = load(html);
  const items = $(markup.item);

  if (items.length === 0) {
    if ($(markup.resultsContainer).length > 0 || $(markup.emptyResults).length > 0) {
      throw new NotFoundError(`No catalog results for SKU ${sku}`, { stage: "catalog" });
    }
    throw new ParseError("Catalog page has no recognizable search results", { stage: "catalog" });
  }

  const match = items.filter((_, item) => skuMatches($(item).find(markup.sku).first().text(), sku)).first();
  if (match.length === 0) {
    throw new NotFoundError(`SKU ${sku} not present in ${items.length} catalog results`, { stage: "catalog" });
  }

  const brand = cleanText(match.find(markup.brand).first().text());
  const displayedPrice = cleanText(match.find(markup.salePrice).first().text());
  const wasPrice = cleanText(match.find(markup.regularPrice).first().text());

  const base = displayedPrice ? parsePriceFromText(displayedPrice) : null;
  const fallback = base === null && wasPrice ? parsePriceFromText(wasPrice) : null;

  return {
    brand,
    regularPrice: wasPrice ?? displayedPrice ?? "",
    basePrice: base ?? fallback,
  };
}

export function extractCsrfToken(html: string, markup: LoginMarkup = DEFAULT_MARKUP.login): string | null {
  const $ = load(html);
  const value = $(markup.csrfInput).first().attr("value")?.trim();
  return value ? value : null;
}

export function hasLoggedInIndicator(html: string, markup: LoginMarkup = DEFAULT_MARKUP.login): boolean {
  const $ = load(html);
  return markup.loggedInIndicators.some((selector) => $(selector).length > 0);
}

function findStockColumn($: Document, markup: StockMarkup): number {
  let column = markup.defaultStockColumn;

  $(markup.table)
    .first()
    .find(markup.headerCell)
    .each((index, header) => {
      if ($(header).text().includes(markup.stockHeaderText)) {
        column = index;
        return false;
      }
      return undefined;
    });

  return column;
}

function parseStockCell(text: string): number | null {
  const parts = text.trim().split(/\s+/);
  const last = parts[parts.length - 1]?.replace(/,/g, "");
  if (!last || !/^\d+$/.test(last)) {
    return null;
  }
  return Number.parseInt(last, 10);
}

function detectAvailability($: Document, markup: StockMarkup): boolean | null {
  for (const selector of markup.availability) {
    const node = $(selector).first();
    if (node.length === 0) {
      continue;
    }

    const value = parseAvailabilityValue(node.attr("href") ?? node.attr("content") ?? node.text());
    if (value !== null) {
      return value;
    }
  }

  return null;
}

function parseAvailabilityValue(value: string): boolean | null {
  const normalized = value.toLowerCase();
  if (!normalized) {
    return null;
  }

  if (
    normalized.includes("outofstock") ||
    normalized.includes("out of stock") ||
    normalized.includes("soldout") ||
    normalized.includes("sold out") ||
    normalized.includes("สินค้าหมด")
  ) {
    return false;
  }

  if (normalized.includes("instock") || normalized.includes("in stock") || normalized.includes("มีสินค้า")) {
    return true;
  }

  return null;
}

function skuMatches(text: string, sku: string): boolean {
  const wanted = sku.trim().toUpperCase();
  if (!wanted) {
    return false;
  }

  const normalized = text.replace(/\s+/g, " ").trim().toUpperCase();
  return normalized === wanted || normalized.split(/[\s:#|,]+/).includes(wanted);
}

function cleanText(text: string): string | null {
  const cleaned = text.replace(/\s+/g, " ").trim();
  return cleaned ? cleaned : null;
}
