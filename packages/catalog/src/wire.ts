import type { BatchResult, ProductRecord, ProductResult, WireFetchFailure, WireProductEntry, WireProductRecord } from "./types";

export function toWireRecord(record: ProductRecord): WireProductRecord {
  return {
    sku: record.sku,
    brand: record.brand,
    stock_quantity: record.stockQuantity,
    stock_status: record.stockStatus,
    sale_price: record.salePrice,
    regular_price: record.regularPrice,
  };
}

export function toWireEntry(result: ProductResult): WireProductEntry {
  if (result.status === "success") {
    return toWireRecord(result.record);
  }

  const failure: WireFetchFailure = {
    sku: result.failure.sku,
    error: {
      reason: result.failure.reason,
      stage: result.failure.stage,
      detail: result.failure.detail,
    },
  };
  return failure;
}

export function isWireFailure(entry: WireProductEntry): entry is WireFetchFailure {
  return "error" in entry;
}

export function toWireBatch(batch: BatchResult) {
  return {
    products: batch.results.map(toWireEntry),
    count: batch.summary.succeeded,
    processing_time: Number((batch.elapsedMs / 1000).toFixed(3)),
    summary: batch.summary,
  };
}
