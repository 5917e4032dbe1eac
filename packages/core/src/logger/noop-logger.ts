import type { Logger } from "./types.ts";

const noop = () => {};

/**
 * Create a logger that discards everything. Used when logging is not
 * configured.
 */
export function createNoopLogger(): Logger {
  const logger: Logger = {
    trace: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
