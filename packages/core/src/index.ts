/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the workspace should depend on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./time";
export * from "./config";
export * from "./env";
export * from "./utils/logger";
export * from "./utils/cliArgs";
