import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";

import { createLogger, type Logger } from "@sku-lookup/catalog";

const logger = createLogger("http");

const SKU_LOG_LIMIT = 10;
const SKU_LOG_EDGE = 5;

export type RouteContext<P extends Record<string, string> = Record<string, never>> = {
  params: Promise<P>;
};

type LoggedHandler<P extends Record<string, string>> = (
  request: Request,
  context: RouteContext<P>,
  log: Logger,
) => Promise<Response>;

/**
 * Wraps a route handler with a per-request child logger and a completion line
 * carrying status and elapsed time. The request id is echoed in `x-request-id`.
 */
export function withRequestLog<P extends Record<string, string> = Record<string, never>>(handler: LoggedHandler<P>) {
  return async (request: Request, context: RouteContext<P>): Promise<Response> => {
    const requestId = request.headers.get("x-request-id") ?? randomUUID();
    const log = logger.child({ requestId, method: request.method, path: new URL(request.url).pathname });
    const startedAt = performance.now();

    log.info("Request received");
    const response = await handler(request, context, log);
    response.headers.set("x-request-id", requestId);
    log.info({ status: response.status, elapsedMs: Math.round(performance.now() - startedAt) }, "Request completed");
    return response;
  };
}

/** SKU list for log lines; long lists keep only their first and last five entries. */
export function summarizeSkus(skus: readonly string[]): string[] {
  if (skus.length <= SKU_LOG_LIMIT) {
    return [...skus];
  }
  const hidden = skus.length - SKU_LOG_EDGE * 2;
  return [...skus.slice(0, SKU_LOG_EDGE), `... ${hidden} more ...`, ...skus.slice(-SKU_LOG_EDGE)];
}
