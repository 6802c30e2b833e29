import type { Logger } from "../core/types";
import winston from "winston";

const LEVELS = ["error", "warn", "info", "debug"];

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  return JSON.stringify(arg) ?? String(arg);
}

/**
 * Winston-based logger shared by the clients, the server and the demo scripts.
 * Every level goes to stderr so script output on stdout stays readable.
 */
const winstonLogger = winston.createLogger({
  level: process.env.A2A_PROBE_LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `[A2AProbe][${level.toUpperCase()}] ${timestamp} ${message}`;
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
});

const join = (args: unknown[]): string => args.map(formatArg).join(" ");

export const logger: Logger = {
  debug: (...args: unknown[]) => winstonLogger.debug(join(args)),
  log: (...args: unknown[]) => winstonLogger.info(join(args)),
  error: (...args: unknown[]) => winstonLogger.error(join(args)),
  warn: (...args: unknown[]) => winstonLogger.warn(join(args)),
};
