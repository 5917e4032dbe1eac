/**
 * Pino Logger Implementation
 *
 * Default logger implementation using pino, with pretty output in
 * development.
 */
import pino from "pino";
import type { Logger, LoggerFactory } from "./types.ts";

const ROOT_NAME = "eventsource";

export interface PinoLoggerOptions {
  /** Log level (default: process.env.LOG_LEVEL || 'info') */
  level?: string;
  /** Use pretty printing (default: true outside production) */
  pretty?: boolean;
}

/**
 * Create a pino-based logger factory. Each namespace becomes a child logger
 * bound to `{ module: name }`.
 *
 * @example
 * ```ts
 * const factory = createPinoLoggerFactory({ level: "debug" });
 * const log = factory("eventsource:controller");
 * log.debug({ url }, "connecting");
 * ```
 */
export function createPinoLoggerFactory(
  options: PinoLoggerOptions = {}
): LoggerFactory {
  const {
    level = process.env["LOG_LEVEL"] || "info",
    pretty = process.env["NODE_ENV"] !== "production",
  } = options;

  const rootLogger = pretty
    ? pino({
        name: ROOT_NAME,
        level,
        transport: { target: "pino-pretty", options: { colorize: true } },
      })
    : pino({
        name: ROOT_NAME,
        level,
      });

  return (name: string): Logger => {
    return rootLogger.child({ module: name }) as Logger;
  };
}

/**
 * Wrap an existing logger as a factory, binding each namespace as `module`.
 */
export function createChildLoggerFactory(logger: Logger): LoggerFactory {
  return (name: string): Logger => logger.child({ module: name });
}
