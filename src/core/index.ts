/**
 * a2a-probe Core - Barrel export for shared types and utilities.
 */

export * from "./types";
export * from "./utils";
