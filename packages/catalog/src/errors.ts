import type { ErrorKind, FetchStage } from "./types";

type CatalogErrorOptions = {
  stage?: FetchStage;
  cause?: unknown;
};

export abstract class CatalogError extends Error {
  abstract readonly kind: ErrorKind;
  readonly stage?: FetchStage;

  constructor(message: string, options: CatalogErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.stage = options.stage;
  }
}

/** Credentials rejected or the shop host unreachable. Fatal for a whole batch. */
export class AuthError extends CatalogError {
  readonly kind = "AuthError";
}

/** The shop answered the login but did not accept the credentials. Never retried. */
export class CredentialsRejectedError extends AuthError {}

export class NetworkError extends CatalogError {
  readonly kind = "NetworkError";
}

export class NotFoundError extends CatalogError {
  readonly kind = "NotFoundError";
}

/** The page did not look like anything the markup contract knows about. */
export class ParseError extends CatalogError {
  readonly kind = "ParseError";
}

export class BatchTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Batch did not finish within ${timeoutMs}ms`);
    this.name = "BatchTimeoutError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return "request aborted (timeout)";
    }
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}
