/**
 * Shared contracts, errors, logging and configuration for the trading
 * pipeline. Every other workspace package depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export { createLogger, log, sanitizeLogPayload } from "./utils/logger";
export type { BaseLogPayload, LogLevel, ModuleLogger } from "./utils/logger";
