import { AuthError, CredentialsRejectedError, describeError } from "./errors";
import { extractCsrfToken, hasLoggedInIndicator } from "./extract";
import { CatalogSession, type FetchLike, type PageResponse } from "./http";
import { createLogger, type Logger } from "./logger";
import { DEFAULT_MARKUP, type LoginMarkup } from "./markup";
import { withRetry } from "./retry";
import type { Credentials } from "./types";
import { buildUrl, DEFAULT_URL_TEMPLATES, isLoginUrl, type UrlTemplates } from "./url";

export type SessionProviderOptions = {
  credentials: Credentials;
  fetch?: FetchLike;
  timeoutMs?: number;
  authRetries?: number;
  retryDelayMs?: number;
  sessionMaxAgeMs?: number;
  urls?: UrlTemplates;
  markup?: LoginMarkup;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export interface SessionSource {
  /** A session the shop still accepts, logging in when needed. */
  acquire(): Promise<CatalogSession>;
  /** The successor of a session found stale; concurrent callers share one login. */
  renew(stale: CatalogSession): Promise<CatalogSession>;
  refresh(): Promise<CatalogSession>;
  invalidate(session: CatalogSession): void;
}

/**
 * Owns the authenticated shop session.
 *
 * Logins are single-flight: callers arriving while a login is in progress await
 * the same promise. Every login produces a fresh {@link CatalogSession}, so a
 * session already handed to a worker is never modified by a refresh.
 */
export class SessionProvider implements SessionSource {
  private current: CatalogSession | null = null;
  private pending: Promise<CatalogSession> | null = null;
  private readonly credentials: Credentials;
  private readonly urls: UrlTemplates;
  private readonly markup: LoginMarkup;
  private readonly logger: Logger;
  private readonly authRetries: number;
  private readonly retryDelayMs: number;
  private readonly sessionMaxAgeMs: number;
  private readonly now: () => number;

  constructor(private readonly options: SessionProviderOptions) {
    this.credentials = options.credentials;
    this.urls = options.urls ?? DEFAULT_URL_TEMPLATES;
    this.markup = options.markup ?? DEFAULT_MARKUP.login;
    this.logger = options.logger ?? createLogger("session");
    this.authRetries = options.authRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 800;
    this.sessionMaxAgeMs = options.sessionMaxAgeMs ?? 30 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  async acquire(): Promise<CatalogSession> {
    const session = this.current;
    if (session && this.isUsable(session)) {
      if (await this.isLoggedIn(session)) {
        return session;
      }
      this.logger.info({ ageMs: this.now() - session.createdAt }, "Shop ended the session, logging in again");
      this.invalidate(session);
    }

    return this.refresh();
  }

  async renew(stale: CatalogSession): Promise<CatalogSession> {
    const session = this.current;
    if (session && session !== stale && this.isUsable(session)) {
      return session;
    }

    return this.refresh();
  }

  async refresh(): Promise<CatalogSession> {
    if (this.pending) {
      return this.pending;
    }

    this.pending = this.authenticate().finally(() => {
      this.pending = null;
    });

    return this.pending;
  }

  invalidate(session: CatalogSession): void {
    session.markStale();
    if (this.current === session) {
      this.current = null;
    }
  }

  get loginUrl(): string {
    return buildUrl(this.urls.login, this.credentials.stockBaseUrl);
  }

  private isUsable(session: CatalogSession): boolean {
    return !session.isStale && this.now() - session.createdAt < this.sessionMaxAgeMs;
  }

  private async isLoggedIn(session: CatalogSession): Promise<boolean> {
    try {
      const account = await session.get(buildUrl(this.urls.account, this.credentials.stockBaseUrl));
      return this.isAccountPage(account);
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, "Session check failed");
      return false;
    }
  }

  private isAccountPage(page: PageResponse): boolean {
    return !isLoginUrl(page.url, this.loginUrl) && page.ok && hasLoggedInIndicator(page.html, this.markup);
  }

  private async authenticate(): Promise<CatalogSession> {
    const startedAt = this.now();
    this.logger.info({ username: this.credentials.username }, "Logging in to shop");

    try {
      const session = await withRetry(() => this.login(), {
        retries: this.authRetries,
        baseDelayMs: this.retryDelayMs,
        sleep: this.options.sleep,
        shouldRetry: (error) => !(error instanceof CredentialsRejectedError),
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({ attempt, delayMs, error: describeError(error) }, "Login attempt failed, retrying");
        },
      });

      this.current = session;
      this.logger.info({ elapsedMs: this.now() - startedAt }, "Login succeeded");
      return session;
    } catch (error) {
      this.current = null;
      this.logger.error({ error: describeError(error) }, "Login failed");
      if (error instanceof AuthError) {
        throw error;
      }
      throw new AuthError(`Login failed: ${describeError(error)}`, { stage: "session", cause: error });
    }
  }

  private async login(): Promise<CatalogSession> {
    const session = new CatalogSession({
      fetch: this.options.fetch,
      timeoutMs: this.options.timeoutMs,
      logger: this.logger,
      now: this.now,
    });

    const loginUrl = this.loginUrl;
    const loginPage = await session.get(loginUrl);
    if (!loginPage.ok) {
      throw new AuthError(`Login page responded with ${loginPage.status}`, { stage: "session" });
    }

    const csrfToken = extractCsrfToken(loginPage.html, this.markup);
    if (!csrfToken) {
      throw new AuthError("CSRF token not found on login page", { stage: "session" });
    }

    const origin = new URL(loginUrl).origin;
    await session.post(
      buildUrl(this.urls.loginSubmit, this.credentials.stockBaseUrl),
      {
        j_username: this.credentials.username,
        j_password: this.credentials.password,
        CSRFToken: csrfToken,
        _csrf: csrfToken,
      },
      {
        origin,
        referer: loginUrl,
      },
    );

    const account = await session.get(buildUrl(this.urls.account, this.credentials.stockBaseUrl));
    if (!this.isAccountPage(account)) {
      throw new CredentialsRejectedError("Shop rejected the credentials", { stage: "session" });
    }

    return session;
  }
}
