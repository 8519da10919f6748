import pino, { type Logger } from "pino";

const usePretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

export const rootLogger: Logger = pino({
  name: "sku-lookup",
  level: process.env.LOG_LEVEL ?? "info",
  redact: ["headers.authorization", "headers.Authorization", "password"],
  transport: usePretty
    ? {
        target: "pino-pretty",
        options: { colorize: true },
      }
    : undefined,
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export type { Logger };
