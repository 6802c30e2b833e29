/**
 * a2a-probe - Barrel export for the A2A client helpers, streaming aggregator,
 * task poller, demo server assembly and configuration.
 */

export * from "./core";
export * from "./config";
export * from "./a2a";
export { logger } from "./utils/logger";
