export type ErrorKind = "AuthError" | "NetworkError" | "NotFoundError" | "ParseError";

export type FailureReason = Exclude<ErrorKind, "AuthError">;

export type FetchStage = "session" | "stock" | "catalog";

export type StockStatus = 0 | 1;

export type ProductRecord = {
  sku: string;
  brand: string | null;
  stockQuantity: number | null;
  stockStatus: StockStatus;
  salePrice: number | null;
  regularPrice: string;
};

export type FetchFailure = {
  sku: string;
  reason: FailureReason;
  stage: FetchStage;
  detail: string;
};

export type ProductResult =
  | { status: "success"; record: ProductRecord }
  | { status: "failed"; failure: FetchFailure };

export type DiscountTable = {
  brandRatio: ReadonlyMap<string, number>;
  defaultRatio: number;
};

export type Credentials = {
  username: string;
  password: string;
  stockBaseUrl: string;
  catalogBaseUrl: string;
};

export type BatchSummary = {
  processed: number;
  succeeded: number;
  failed: number;
};

export type BatchResult = {
  results: ProductResult[];
  elapsedMs: number;
  summary: BatchSummary;
};

export type StockExtract = {
  stockQuantity: number | null;
  stockStatus: StockStatus;
};

export type CatalogExtract = {
  brand: string | null;
  regularPrice: string;
  basePrice: number | null;
};

export type WireProductRecord = {
  sku: string;
  brand: string | null;
  stock_quantity: number | null;
  stock_status: StockStatus;
  sale_price: number | null;
  regular_price: string;
};

export type WireFetchFailure = {
  sku: string;
  error: {
    reason: FailureReason;
    stage: FetchStage;
    detail: string;
  };
};

export type WireProductEntry = WireProductRecord | WireFetchFailure;
