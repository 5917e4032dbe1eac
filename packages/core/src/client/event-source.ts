/**
 * Lifecycle Manager
 *
 * Runs the reconnect controller on its own effection task and hands back a
 * handle whose `close()` resolves only after that task has fully exited.
 * Once `close()` has been called the callback is never invoked again.
 *
 * Two entry points:
 * - `createEventSource()` for plain async code; the task gets its own root
 * - `useEventSource()` as a resource inside an existing effection scope; the
 *   task is a child of that scope and inherits its contexts (e.g. logger)
 */
import { resource, run, spawn, type Operation, type Task } from "effection";
import { LoggerFactoryContext } from "../logger/context.ts";
import { createNoopLogger } from "../logger/noop-logger.ts";
import { createChildLoggerFactory } from "../logger/pino-logger.ts";
import type { ConnectionState } from "../types/event.ts";
import { runEventSource } from "./controller.ts";
import { resolveOptions, type EventSourceOptions } from "./options.ts";
import { Session } from "./session.ts";

export interface EventSource {
  /** Where the reconnect cycle currently is. */
  readonly state: ConnectionState;
  /** Id that will be sent as `Last-Event-Id` on the next connection. */
  readonly lastEventId: string | undefined;
  /** Current reconnect delay in milliseconds. */
  readonly retryDelay: number;
  /**
   * Stop the event source and wait for the worker to exit. Safe to call more
   * than once; every call returns the same promise.
   */
  close(): Promise<void>;
}

/**
 * Start an event source in the background.
 *
 * @example
 * ```ts
 * const source = createEventSource({
 *   url: "https://example.com/events",
 *   callback(event) {
 *     if (event.type === "message") {
 *       queue.push(decodeMessage(event.message));
 *     } else {
 *       console.warn(event.error.message);
 *     }
 *   },
 * });
 *
 * // later
 * await source.close();
 * ```
 *
 * @throws EventSourceConfigError on invalid options
 */
export function createEventSource(options: EventSourceOptions): EventSource {
  const session = new Session(resolveOptions(options));
  const { signal, logger } = session.options;
  const log = logger ?? createNoopLogger();

  let task: Task<void> | undefined;
  const source = createHandle(session, async () => {
    await task?.halt();
  });

  const onAbort = () => {
    source.close().catch((error: unknown) => {
      log.error({ err: error }, "event source failed while closing");
    });
  };

  if (signal?.aborted) {
    session.close();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  task = run(function* () {
    try {
      if (logger) {
        yield* LoggerFactoryContext.set(createChildLoggerFactory(logger));
      }
      yield* runEventSource(session);
    } catch (error) {
      log.error({ err: error }, "event source worker failed");
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  });

  return source;
}

/**
 * Run an event source for the lifetime of the current scope.
 *
 * @example
 * ```ts
 * await main(function* () {
 *   yield* setupLogger();
 *   yield* useEventSource({ url, callback });
 *   yield* suspend();
 * });
 * ```
 */
export function useEventSource(
  options: EventSourceOptions
): Operation<EventSource> {
  return resource(function* (provide) {
    const session = new Session(resolveOptions(options));
    const { signal, logger } = session.options;

    if (logger) {
      yield* LoggerFactoryContext.set(createChildLoggerFactory(logger));
    }

    if (signal?.aborted) {
      session.close();
    }

    const task = yield* spawn(() => runEventSource(session));
    const source = createHandle(session, async () => {
      await task.halt();
    });

    const onAbort = () => {
      source.close().catch((error: unknown) => {
        (logger ?? createNoopLogger()).error(
          { err: error },
          "event source failed while closing"
        );
      });
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      yield* provide(source);
    } finally {
      session.close();
      signal?.removeEventListener("abort", onAbort);
    }
  });
}

function createHandle(
  session: Session,
  halt: () => Promise<void>
): EventSource {
  const decoder = new TextDecoder();
  let closing: Promise<void> | undefined;

  return {
    get state() {
      return session.state;
    },
    get lastEventId() {
      const id = session.resumption.lastEventId;
      return id ? decoder.decode(id) : undefined;
    },
    get retryDelay() {
      return session.resumption.retryDelay;
    },
    close() {
      if (!closing) {
        session.close();
        closing = halt();
      }
      return closing;
    },
  };
}
