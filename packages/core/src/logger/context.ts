/**
 * Logger Context
 *
 * Effection-based dependency injection for loggers. Set a factory with
 * `setupLogger()` (or `LoggerFactoryContext.set()`), then get namespaced
 * loggers with `useLogger()`.
 */
import { createContext, type Operation } from "effection";
import type { Logger, LoggerFactory } from "./types.ts";
import { createNoopLogger } from "./noop-logger.ts";

export const LoggerFactoryContext =
  createContext<LoggerFactory>("eventsource.logger");

/**
 * Get a logger for the given namespace. Returns a no-op logger when no
 * factory is configured in the current scope.
 *
 * @example
 * ```ts
 * const log = yield* useLogger("eventsource:controller");
 * log.debug({ delay }, "waiting before reconnect");
 * ```
 */
export function* useLogger(name: string): Operation<Logger> {
  const factory = yield* LoggerFactoryContext.get();
  if (!factory) {
    return createNoopLogger();
  }
  return factory(name);
}
