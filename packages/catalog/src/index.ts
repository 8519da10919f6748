export * from "./batch";
export * from "./config";
export * from "./discount";
export * from "./errors";
export * from "./extract";
export * from "./fetcher";
export * from "./http";
export * from "./logger";
export * from "./markup";
export * from "./price";
export * from "./service";
export * from "./session";
export * from "./url";
export * from "./verify";
export * from "./wire";
export type * from "./types";
