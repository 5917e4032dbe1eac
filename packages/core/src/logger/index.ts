/**
 * Logger Module
 *
 * - pino-based default implementation
 * - effection context-based injection
 * - no-op fallback when nothing is configured
 */
export type { Logger, LoggerFactory } from "./types.ts";
export { LoggerFactoryContext, useLogger } from "./context.ts";
export { createNoopLogger } from "./noop-logger.ts";
export {
  createPinoLoggerFactory,
  createChildLoggerFactory,
  type PinoLoggerOptions,
} from "./pino-logger.ts";
export { setupLogger } from "./setup.ts";
