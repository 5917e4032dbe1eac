import type { Operation } from "effection";
import { LoggerFactoryContext } from "./context.ts";
import {
  createPinoLoggerFactory,
  type PinoLoggerOptions,
} from "./pino-logger.ts";

/**
 * Install a pino logger factory in the current scope.
 *
 * @example
 * ```ts
 * await run(function* () {
 *   yield* setupLogger({ level: "debug" });
 *   const source = yield* useEventSource({ url, callback });
 *   yield* suspend();
 * });
 * ```
 */
export function* setupLogger(options?: PinoLoggerOptions): Operation<void> {
  const factory = createPinoLoggerFactory(options);
  yield* LoggerFactoryContext.set(factory);
}
