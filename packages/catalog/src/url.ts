export type UrlTemplates = {
  stockProduct: string;
  catalogSearch: string;
  login: string;
  loginSubmit: string;
  account: string;
};

export const DEFAULT_URL_TEMPLATES: UrlTemplates = {
  stockProduct: "{base}/p/{sku}",
  catalogSearch: "{base}/search/?searchType=All&viewType=grid&text={sku}",
  login: "{base}/login",
  loginSubmit: "{base}/j_spring_security_check",
  account: "{base}/my-account/update-profile",
};

export function buildUrl(template: string, base: string, sku = ""): string {
  const url = template.replace("{base}", trimTrailingSlash(base)).replace("{sku}", encodeURIComponent(sku.trim()));
  return new URL(url).toString();
}

export function isLoginUrl(rawUrl: string, loginUrl: string): boolean {
  try {
    const url = new URL(rawUrl);
    const login = new URL(loginUrl);
    return url.host === login.host && trimTrailingSlash(url.pathname) === trimTrailingSlash(login.pathname);
  } catch {
    return false;
  }
}

export function trimTrailingSlash(value: string): string {
  return value.length > 1 && value.endsWith("/") ? value.slice(0, -1) : value;
}
