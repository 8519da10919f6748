import { AuthError, BatchTimeoutError, ConfigError, describeError, type Logger } from "@sku-lookup/catalog";
import { NextResponse } from "next/server";
import { ZodError } from "zod";

export function errorResponse(error: unknown, logger: Logger): NextResponse {
  if (error instanceof ZodError) {
    return NextResponse.json(
      { error: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ") },
      { status: 400 },
    );
  }

  // request.json() on a malformed body
  if (error instanceof SyntaxError) {
    return NextResponse.json({ error: "Request body must be valid JSON" }, { status: 400 });
  }

  if (error instanceof AuthError) {
    logger.error({ error: describeError(error) }, "Shop login failed");
    return NextResponse.json({ error: "Login failed", detail: error.message }, { status: 502 });
  }

  if (error instanceof BatchTimeoutError) {
    logger.warn({ timeoutMs: error.timeoutMs }, "Batch timed out");
    return NextResponse.json({ error: error.message }, { status: 504 });
  }

  if (error instanceof ConfigError) {
    logger.error({ issues: error.issues }, "Service misconfigured");
    return NextResponse.json({ error: "Service misconfigured" }, { status: 500 });
  }

  logger.error({ error: describeError(error) }, "Unhandled route error");
  return NextResponse.json({ error: error instanceof Error ? error.message : "Internal error" }, { status: 500 });
}
