/**
 * Core utilities for a2a-probe.
 * Exported via the core barrel for use by the clients, the server and the demos.
 */

import type { Sleep } from "./types";

export const sleep: Sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Reduce any thrown value to a single log-safe line.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
