import { timingSafeEqual } from "node:crypto";

import { NextResponse } from "next/server";

const BASIC_PREFIX = "Basic ";

export function isAuthorized(request: Request, expectedToken = process.env.API_BASIC_AUTH_TOKEN): boolean {
  if (!expectedToken) {
    return false;
  }

  const header = request.headers.get("authorization");
  if (!header?.startsWith(BASIC_PREFIX)) {
    return false;
  }

  const provided = Buffer.from(header.slice(BASIC_PREFIX.length).trim());
  const expected = Buffer.from(expectedToken);
  return provided.length === expected.length && timingSafeEqual(provided, expected);
}

/** `null` when the request may proceed, otherwise the 401 to send back. */
export function requireBasicAuth(request: Request): NextResponse | null {
  if (isAuthorized(request)) {
    return null;
  }

  return NextResponse.json(
    { message: "Invalid or missing credentials", error: "Unauthorized" },
    { status: 401, headers: { "www-authenticate": 'Basic realm="sku-lookup"' } },
  );
}
