/**
 * Core Types for a2a-probe
 */

export interface Logger {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

/** Awaitable delay used between polls; injectable so tests never wait. */
export type Sleep = (ms: number) => Promise<void>;
