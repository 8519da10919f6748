import { getSetCookies, fetch as undiciFetch, type Headers } from "undici";

import { createLogger, type Logger } from "./logger";

export type FetchLike = typeof undiciFetch;

export type PageResponse = {
  status: number;
  ok: boolean;
  url: string;
  html: string;
};

export type RequestOptions = {
  method?: "GET" | "POST";
  form?: Record<string, string>;
  headers?: Record<string, string>;
};

export type SessionOptions = {
  fetch?: FetchLike;
  timeoutMs?: number;
  maxRedirects?: number;
  logger?: Logger;
  now?: () => number;
};

const REQUEST_HEADERS = {
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36",
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "accept-language": "th-TH,th;q=0.9,en-US;q=0.8,en;q=0.5",
  "cache-control": "no-cache",
  pragma: "no-cache",
};

type StoredCookie = {
  name: string;
  value: string;
  domain: string;
  hostOnly: boolean;
  path: string;
  expiresAt: number | null;
};

const DEFAULT_TIMEOUT_MS = 20000;
const DEFAULT_MAX_REDIRECTS = 5;

/**
 * Cookie-carrying HTTP context shared by the workers of a batch.
 *
 * A session is created by the session provider for one login and is never
 * re-authenticated in place: a refresh produces a new session. Workers only read
 * the jar, except for cookies the hosts set on ordinary page loads.
 */
export class CatalogSession {
  readonly createdAt: number;
  private readonly cookies = new Map<string, StoredCookie>();
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private stale = false;

  constructor(options: SessionOptions = {}) {
    this.fetchImpl = options.fetch ?? undiciFetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.logger = options.logger ?? createLogger("http");
    this.now = options.now ?? Date.now;
    this.createdAt = this.now();
  }

  get isStale(): boolean {
    return this.stale;
  }

  markStale(): void {
    this.stale = true;
  }

  /** `Cookie` header for `url`, or `undefined` when no stored cookie applies. */
  cookieHeader(url: string): string | undefined {
    const { hostname, pathname } = new URL(url);
    const now = this.now();
    const matching = [...this.cookies.values()].filter(
      (cookie) =>
        (cookie.expiresAt === null || cookie.expiresAt > now) &&
        domainMatches(hostname, cookie) &&
        pathMatches(pathname, cookie.path),
    );
    if (matching.length === 0) {
      return undefined;
    }
    return matching.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
  }

  async get(url: string, headers?: Record<string, string>): Promise<PageResponse> {
    return this.request(url, { method: "GET", headers });
  }

  async post(url: string, form: Record<string, string>, headers?: Record<string, string>): Promise<PageResponse> {
    return this.request(url, { method: "POST", form, headers });
  }

  async request(url: string, options: RequestOptions = {}): Promise<PageResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let currentUrl = url;
    let method = options.method ?? "GET";
    let body = options.form ? new URLSearchParams(options.form).toString() : undefined;

    try {
      for (let hop = 0; hop <= this.maxRedirects; hop += 1) {
        const cookie = this.cookieHeader(currentUrl);
        const response = await this.fetchImpl(currentUrl, {
          method,
          redirect: "manual",
          signal: controller.signal,
          body,
          headers: {
            ...REQUEST_HEADERS,
            ...(body ? { "content-type": "application/x-www-form-urlencoded" } : {}),
            ...(cookie ? { cookie } : {}),
            ...options.headers,
          },
        });

        this.storeCookies(currentUrl, response.headers);

        const location = response.headers.get("location");
        if (isRedirectStatus(response.status) && location) {
          await response.body?.cancel();
          currentUrl = new URL(location, currentUrl).toString();
          // 307/308 keep the method; everything else continues as a GET.
          if (response.status !== 307 && response.status !== 308) {
            method = "GET";
            body = undefined;
          }
          this.logger.debug({ status: response.status, location: currentUrl }, "Following redirect");
          continue;
        }

        const html = await response.text();
        return {
          status: response.status,
          ok: response.ok,
          url: currentUrl,
          html,
        };
      }

      throw new Error(`Too many redirects (>${this.maxRedirects}) starting at ${url}`);
    } finally {
      clearTimeout(timeout);
    }
  }

  private storeCookies(url: string, headers: Headers) {
    const { hostname, pathname } = new URL(url);
    const now = this.now();

    for (const cookie of getSetCookies(headers)) {
      const domain = cookie.domain ? cookie.domain.replace(/^\./, "").toLowerCase() : hostname;
      if (cookie.domain && !domainMatches(hostname, { domain, hostOnly: false })) {
        this.logger.debug({ name: cookie.name, domain, host: hostname }, "Ignoring cookie for a foreign domain");
        continue;
      }

      const stored: StoredCookie = {
        name: cookie.name,
        value: cookie.value,
        domain,
        hostOnly: !cookie.domain,
        path: cookie.path?.startsWith("/") ? cookie.path : defaultPath(pathname),
        expiresAt: expiryOf(cookie.maxAge, cookie.expires, now),
      };
      const key = `${stored.domain};${stored.path};${stored.name}`;

      if (stored.expiresAt !== null && stored.expiresAt <= now) {
        this.cookies.delete(key);
      } else {
        this.cookies.set(key, stored);
      }
    }
  }
}

function domainMatches(hostname: string, cookie: Pick<StoredCookie, "domain" | "hostOnly">): boolean {
  const host = hostname.toLowerCase();
  if (cookie.hostOnly) {
    return host === cookie.domain;
  }
  return host === cookie.domain || host.endsWith(`.${cookie.domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) {
    return true;
  }
  return requestPath.startsWith(cookiePath) && (cookiePath.endsWith("/") || requestPath[cookiePath.length] === "/");
}

function defaultPath(requestPath: string): string {
  const lastSlash = requestPath.lastIndexOf("/");
  return lastSlash <= 0 ? "/" : requestPath.slice(0, lastSlash);
}

// Max-Age wins over Expires.
function expiryOf(maxAge: number | undefined, expires: Date | number | undefined, now: number): number | null {
  if (typeof maxAge === "number") {
    return now + maxAge * 1000;
  }
  if (expires === undefined) {
    return null;
  }
  return typeof expires === "number" ? expires : expires.getTime();
}

function isRedirectStatus(status: number): boolean {
  return status >= 300 && status < 400;
}
