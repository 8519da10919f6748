import { Headers, Response } from "undici";

import type { FetchLike } from "../http";
import type { Credentials } from "../types";

export const TEST_CREDENTIALS: Credentials = {
  username: "test-user",
  password: "test-secret",
  stockBaseUrl: "https://shop.example.test/th/THB",
  catalogBaseUrl: "https://catalog.example.test",
};

export type FakeRequest = {
  url: string;
  method: string;
  headers: Headers;
  body?: string;
};

export type FakeHandler = (request: FakeRequest) => Response | Promise<Response>;

export type FakeSite = {
  fetch: FetchLike;
  requests: FakeRequest[];
};

/**
 * In-process stand-in for the two remote hosts. Handlers are matched by
 * `METHOD url-without-query` first, then by the full URL.
 */
export function createFakeSite(routes: Record<string, FakeHandler>): FakeSite {
  const requests: FakeRequest[] = [];

  const fetch: FetchLike = async (input, init) => {
    const url = typeof input === "string" ? input : "url" in input ? input.url : input.toString();
    const request: FakeRequest = {
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    requests.push(request);

    const withoutQuery = url.split("?")[0];
    const handler = routes[`${request.method} ${withoutQuery}`] ?? routes[`${request.method} ${url}`];
    if (!handler) {
      return html("<html><body>missing</body></html>", 404);
    }
    return handler(request);
  };

  return { fetch, requests };
}

export function html(body: string, status = 200, setCookies: string[] = []): Response {
  const headers = new Headers({ "content-type": "text/html; charset=utf-8" });
  for (const cookie of setCookies) {
    headers.append("set-cookie", cookie);
  }
  return new Response(body, { status, headers });
}

export function redirect(location: string, setCookies: string[] = [], status = 302): Response {
  const headers = new Headers({ location });
  for (const cookie of setCookies) {
    headers.append("set-cookie", cookie);
  }
  return new Response(null, { status, headers });
}

export function loginPage(token = "csrf-123"): string {
  return `
    <html><body>
      <form id="loginForm" method="post">
        <input type="hidden" name="CSRFToken" value="${token}" />
        <input name="j_username" /><input name="j_password" type="password" />
      </form>
    </body></html>
  `;
}

export function accountPage(): string {
  return `
    <html><body>
      <span class="header__user-name">test-user</span>
      <a href="/th/THB/logout">ออกจากระบบ</a>
      <form id="updateProfileForm"></form>
    </body></html>
  `;
}

export function stockPage(rows: Array<[string, string]>, header = "ในสต๊อก"): string {
  const body = rows.map(([branch, stock]) => `<tr><td>${branch}</td><td>${stock}</td></tr>`).join("\n");
  return `
    <html><body>
      <div class="product-details">
        <div class="table-responsive stock-striped">
          <table>
            <thead><tr><th>สาขา</th><th>${header}</th></tr></thead>
            <tbody>${body}</tbody>
          </table>
        </div>
      </div>
    </body></html>
  `;
}

export type CatalogItem = {
  sku: string;
  brand?: string;
  salePrice?: string;
  wasPrice?: string;
};

export function catalogPage(items: CatalogItem[]): string {
  const grid = items
    .map(
      (item) => `
        <div class="grid-item">
          <div class="grid-item__sku">${item.sku}</div>
          ${item.brand !== undefined ? `<div class="grid-item__brand">${item.brand}</div>` : ""}
          ${item.salePrice !== undefined ? `<span class="grid-item__saleprice">${item.salePrice}</span>` : ""}
          ${item.wasPrice !== undefined ? `<span class="grid-item__wasprice">${item.wasPrice}</span>` : ""}
        </div>`,
    )
    .join("\n");

  return `<html><body><div class="search-result"><div class="product-grid">${grid}</div></div></body></html>`;
}

export function emptyCatalogPage(): string {
  return `<html><body><div class="search-result"><p class="search-empty">ไม่พบสินค้าที่ค้นหา</p></div></body></html>`;
}

/** Routes for a shop that accepts the test credentials. */
export function loginRoutes(base = TEST_CREDENTIALS.stockBaseUrl): Record<string, FakeHandler> {
  return {
    [`GET ${base}/login`]: () => html(loginPage(), 200, ["JSESSIONID=anon; Path=/; HttpOnly"]),
    [`POST ${base}/j_spring_security_check`]: () =>
      redirect(`${base}/`, ["JSESSIONID=authed; Path=/; HttpOnly", "acceleratorSecureGUID=guid-1; Path=/; Secure"]),
    [`GET ${base}/`]: () => html("<html><body>home</body></html>"),
    [`GET ${base}/my-account/update-profile`]: (request) =>
      request.headers.get("cookie")?.includes("JSESSIONID=authed")
        ? html(accountPage())
        : redirect(`${base}/login`),
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type FakeProduct = {
  stock?: string | (() => Response | Promise<Response>);
  catalog?: CatalogItem | (() => Response | Promise<Response>);
  latencyMs?: number;
};

/** Stock and catalog routes for a set of SKUs; unknown SKUs get an empty search page. */
export function productRoutes(
  products: Record<string, FakeProduct>,
  credentials: Pick<Credentials, "stockBaseUrl" | "catalogBaseUrl"> = TEST_CREDENTIALS,
): Record<string, FakeHandler> {
  const routes: Record<string, FakeHandler> = {
    [`GET ${credentials.catalogBaseUrl}/search/`]: async (request) => {
      const sku = new URL(request.url).searchParams.get("text") ?? "";
      const product = products[sku];
      if (!product) {
        return html(emptyCatalogPage());
      }
      if (product.latencyMs) {
        await delay(product.latencyMs);
      }
      if (typeof product.catalog === "function") {
        return product.catalog();
      }
      return html(catalogPage(product.catalog ? [product.catalog] : []));
    },
  };

  for (const [sku, product] of Object.entries(products)) {
    routes[`GET ${credentials.stockBaseUrl}/p/${encodeURIComponent(sku)}`] = async () => {
      if (product.latencyMs) {
        await delay(product.latencyMs);
      }
      if (typeof product.stock === "function") {
        return product.stock();
      }
      return html(product.stock ?? stockPage([["สาขาบางนา", "0"]]));
    };
  }

  return routes;
}

export type ExpiringShop = {
  routes: Record<string, FakeHandler>;
  /** Invalidates every session cookie handed out so far. */
  endSessions(): void;
};

/**
 * Shop whose logins issue a cookie per generation. Requests carrying an older
 * cookie are redirected to the login page, both for the account page and for the
 * stock pages of `stock` (SKU to quantity).
 */
export function expiringShop(stock: Record<string, string> = {}, base = TEST_CREDENTIALS.stockBaseUrl): ExpiringShop {
  let generation = 1;
  const loggedIn = (request: FakeRequest) =>
    request.headers.get("cookie")?.split("; ").includes(`JSESSIONID=authed-${generation}`) ?? false;

  const routes: Record<string, FakeHandler> = {
    ...loginRoutes(base),
    [`POST ${base}/j_spring_security_check`]: () =>
      redirect(`${base}/`, [`JSESSIONID=authed-${generation}; Path=/; HttpOnly`]),
    [`GET ${base}/my-account/update-profile`]: (request) =>
      loggedIn(request) ? html(accountPage()) : redirect(`${base}/login`),
  };

  for (const [sku, quantity] of Object.entries(stock)) {
    routes[`GET ${base}/p/${encodeURIComponent(sku)}`] = (request) =>
      loggedIn(request) ? html(stockPage([["บางนา", quantity]])) : redirect(`${base}/login`);
  }

  return {
    routes,
    endSessions: () => {
      generation += 1;
    },
  };
}
