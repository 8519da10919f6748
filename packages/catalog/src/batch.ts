import { performance } from "node:perf_hooks";

import pLimit from "p-limit";

import { BatchTimeoutError } from "./errors";
import type { ProductFetcher } from "./fetcher";
import { createLogger, type Logger } from "./logger";
import type { SessionSource } from "./session";
import type { BatchResult, BatchSummary, DiscountTable, ProductResult } from "./types";

export const DEFAULT_MAX_WORKERS = 10;

export type BatchOptions = {
  sessions: SessionSource;
  discountTable: DiscountTable;
  fetcher: ProductFetcher;
  maxWorkers?: number;
  timeoutMs?: number;
  logger?: Logger;
};

/**
 * Fetches every SKU through a bounded pool. `results[i]` always belongs to
 * `skus[i]`; duplicates are fetched separately. Rejects with `AuthError` when no
 * session can be obtained (at the start, or after the shop ends one mid-batch)
 * and with `BatchTimeoutError` when `timeoutMs` elapses.
 */
export async function runBatch(skus: readonly string[], options: BatchOptions): Promise<BatchResult> {
  const maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
  if (!Number.isInteger(maxWorkers) || maxWorkers <= 0) {
    throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
  }

  const logger = options.logger ?? createLogger("batch");
  const startedAt = performance.now();

  if (skus.length === 0) {
    return { results: [], elapsedMs: 0, summary: summarize([]) };
  }

  const poolSize = Math.min(maxWorkers, skus.length);
  logger.info({ skuCount: skus.length, poolSize }, "Starting batch");

  let session = await options.sessions.acquire();
  const limit = pLimit(poolSize);
  const discountTable = options.discountTable;

  // A fetch bounced to the login page marks the session stale; later SKUs run on its successor.
  const fetchWithSession = async (sku: string): Promise<ProductResult> => {
    if (session.isStale) {
      session = await options.sessions.renew(session);
    }
    return options.fetcher(sku, session, discountTable);
  };

  const work = Promise.all(skus.map((sku) => limit(() => fetchWithSession(sku))));
  const results = await withBudget(work, options.timeoutMs, () => limit.clearQueue());

  const elapsedMs = performance.now() - startedAt;
  const summary = summarize(results);
  logger.info({ ...summary, elapsedMs: Math.round(elapsedMs) }, "Batch finished");

  return { results, elapsedMs, summary };
}

export function summarize(results: readonly ProductResult[]): BatchSummary {
  const succeeded = results.filter((result) => result.status === "success").length;
  return {
    processed: results.length,
    succeeded,
    failed: results.length - succeeded,
  };
}

async function withBudget<T>(work: Promise<T>, timeoutMs: number | undefined, onTimeout: () => void): Promise<T> {
  if (timeoutMs === undefined) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout();
      reject(new BatchTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
