import { DEFAULT_MAX_WORKERS, runBatch } from "./batch";
import { loadConfig, loadDiscountTable } from "./config";
import { NO_DISCOUNT } from "./discount";
import { AuthError } from "./errors";
import { createProductFetcher, type ProductFetcher } from "./fetcher";
import type { FetchLike } from "./http";
import { createLogger, type Logger } from "./logger";
import type { MarkupContract } from "./markup";
import { SessionProvider, type SessionSource } from "./session";
import type { BatchResult, Credentials, DiscountTable, ProductResult } from "./types";
import type { UrlTemplates } from "./url";

type ServiceDependencies = {
  credentials: Credentials;
  discountTable?: DiscountTable;
  sessions?: SessionSource;
  fetcher?: ProductFetcher;
  fetch?: FetchLike;
  requestTimeoutMs?: number;
  authRetries?: number;
  sessionMaxAgeMs?: number;
  batchTimeoutMs?: number;
  urls?: UrlTemplates;
  markup?: MarkupContract;
  logger?: Logger;
};

export class CatalogService {
  private readonly sessions: SessionSource;
  private readonly fetcher: ProductFetcher;
  private readonly batchTimeoutMs?: number;
  private readonly logger: Logger;
  private discountTable: DiscountTable;

  constructor(deps: ServiceDependencies) {
    this.logger = deps.logger ?? createLogger("service");
    this.discountTable = deps.discountTable ?? NO_DISCOUNT;
    this.batchTimeoutMs = deps.batchTimeoutMs;
    this.sessions =
      deps.sessions ??
      new SessionProvider({
        credentials: deps.credentials,
        fetch: deps.fetch,
        timeoutMs: deps.requestTimeoutMs,
        authRetries: deps.authRetries,
        sessionMaxAgeMs: deps.sessionMaxAgeMs,
        urls: deps.urls,
        markup: deps.markup?.login,
      });
    this.fetcher =
      deps.fetcher ??
      createProductFetcher({
        credentials: deps.credentials,
        urls: deps.urls,
        markup: deps.markup,
      });
  }

  async fetchOne(sku: string): Promise<ProductResult> {
    const batch = await this.fetchMany([sku], 1);
    return batch.results[0];
  }

  async fetchMany(skus: readonly string[], maxWorkers = DEFAULT_MAX_WORKERS): Promise<BatchResult> {
    return runBatch(skus, {
      sessions: this.sessions,
      discountTable: this.discountTable,
      fetcher: this.fetcher,
      maxWorkers,
      timeoutMs: this.batchTimeoutMs,
    });
  }

  async login(): Promise<boolean> {
    try {
      await this.sessions.refresh();
      return true;
    } catch (error) {
      if (error instanceof AuthError) {
        return false;
      }
      throw error;
    }
  }

  get currentDiscountTable(): DiscountTable {
    return this.discountTable;
  }

  /** Later batches use `table`; a batch already running keeps the one it started with. */
  setDiscountTable(table: DiscountTable) {
    this.discountTable = table;
    this.logger.info({ brands: table.brandRatio.size, defaultRatio: table.defaultRatio }, "Discount table replaced");
  }
}

/** Builds a service from environment settings and the discount file they point to. */
export async function createCatalogService(env: NodeJS.ProcessEnv = process.env): Promise<CatalogService> {
  const config = loadConfig(env);
  const discountTable = await loadDiscountTable(config.discountConfigPath);

  return new CatalogService({
    credentials: config.credentials,
    discountTable,
    requestTimeoutMs: config.requestTimeoutMs,
    authRetries: config.authRetries,
    sessionMaxAgeMs: config.sessionMaxAgeMs,
    batchTimeoutMs: config.batchTimeoutMs,
  });
}
