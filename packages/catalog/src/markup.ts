/**
 * Selectors the extractors rely on. The remote pages are not under our control,
 * so every selector lives here and can be overridden without touching the
 * extraction logic.
 */
export type StockMarkup = {
  table: string;
  headerCell: string;
  stockHeaderText: string;
  defaultStockColumn: number;
  productContainer: string;
  availability: string[];
};

export type CatalogMarkup = {
  item: string;
  sku: string;
  brand: string;
  salePrice: string;
  regularPrice: string;
  resultsContainer: string;
  emptyResults: string;
};

export type LoginMarkup = {
  csrfInput: string;
  loggedInIndicators: string[];
};

export type MarkupContract = {
  version: string;
  stock: StockMarkup;
  catalog: CatalogMarkup;
  login: LoginMarkup;
};

export const DEFAULT_MARKUP: MarkupContract = {
  version: "2025-03",
  stock: {
    table: "div.table-responsive.stock-striped table",
    headerCell: "th",
    stockHeaderText: "ในสต๊อก",
    defaultStockColumn: 1,
    productContainer: ".product-details, .product-main-info",
    availability: ["[itemprop='availability']", "meta[property='product:availability']"],
  },
  catalog: {
    item: ".grid-item",
    sku: ".grid-item__sku",
    brand: ".grid-item__brand",
    salePrice: ".grid-item__saleprice",
    regularPrice: ".grid-item__wasprice",
    resultsContainer: ".search-result, .product-grid",
    emptyResults: ".search-empty, .no-result",
  },
  login: {
    csrfInput: "input[name='CSRFToken']",
    loggedInIndicators: ["form#updateProfileForm", "input#profile\\.email", "a[href*='logout']"],
  },
};
