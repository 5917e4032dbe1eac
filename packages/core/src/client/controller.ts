/**
 * Reconnect Controller
 *
 * Drives the connect → stream → back off cycle until the session is
 * cancelled:
 *
 *   connecting ──ok──▶ streaming ──end/error──▶ backing-off ──▶ connecting
 *       │                  │
 *       └──error───────────┼────────────────────▶ backing-off
 *                          │
 *   cancellation anywhere ─┴─▶ stopped
 *
 * Each attempt runs in its own scope, so its abort signal, response body
 * reader and line buffer are released as soon as the attempt ends.
 * Cancellation is the halting of the task running `runEventSource`, which
 * interrupts a pending request, read or backoff sleep immediately.
 */
import {
  call,
  scoped,
  sleep,
  until,
  useAbortSignal,
  type Operation,
} from "effection";
import { LineReader } from "../buffer/line-reader.ts";
import { useReadableSource } from "../buffer/source.ts";
import {
  InvalidContentTypeError,
  InvalidStatusError,
  TransportError,
} from "../errors.ts";
import { useLogger } from "../logger/context.ts";
import type { Logger } from "../logger/types.ts";
import { MessageAssembler } from "../parse/assembler.ts";
import { buildRequest, isEventStream } from "./request.ts";
import type { Session } from "./session.ts";

type AttemptOutcome = "retry" | "stop";

/**
 * Run the session until it is cancelled. Never fails for recoverable
 * conditions: those are dispatched and followed by a reconnect.
 */
export function* runEventSource(session: Session): Operation<void> {
  const log = yield* useLogger("eventsource:controller");
  const assembler = new MessageAssembler(
    session.options.limits,
    session.resumption,
    yield* useLogger("eventsource:assembler")
  );

  try {
    while (!session.closed) {
      const outcome = yield* attempt(session, assembler, log);
      if (outcome === "stop" || session.closed) {
        return;
      }

      session.transition("backing-off", log);
      log.debug({ delay: session.resumption.retryDelay }, "waiting before reconnect");
      yield* sleep(session.resumption.retryDelay);
    }
  } finally {
    session.transition("stopped", log);
  }
}

function attempt(
  session: Session,
  assembler: MessageAssembler,
  log: Logger
): Operation<AttemptOutcome> {
  return scoped(function* (): Operation<AttemptOutcome> {
    const { options } = session;
    session.transition("connecting", log);

    const signal = yield* useAbortSignal();

    let request: Request;
    try {
      request = buildRequest(
        options.request,
        session.resumption.lastEventId,
        signal
      );
    } catch (error) {
      session.dispatch(
        {
          type: "error",
          error: new TransportError("http request error", { cause: error }),
        },
        log
      );
      return "retry";
    }

    log.debug(
      { url: request.url, lastEventId: request.headers.get("last-event-id") },
      "connecting"
    );

    let response: Response;
    try {
      response = yield* until(options.fetch(request));
    } catch (error) {
      if (isCancelled(session, signal)) {
        return "stop";
      }
      session.dispatch(
        {
          type: "error",
          error: new TransportError("http response error", { cause: error }),
        },
        log
      );
      return "retry";
    }

    if (response.status !== 200) {
      yield* discard(response, log);
      session.dispatch(
        { type: "error", error: new InvalidStatusError(response.status) },
        log
      );
      return "retry";
    }

    const contentType = response.headers.get("content-type");
    if (!isEventStream(contentType)) {
      yield* discard(response, log);
      session.dispatch(
        { type: "error", error: new InvalidContentTypeError(contentType) },
        log
      );
      return "retry";
    }

    const body = response.body;
    if (!body) {
      session.dispatch(
        {
          type: "error",
          error: new TransportError("http response has no body", {
            cause: undefined,
          }),
        },
        log
      );
      return "retry";
    }

    const source = yield* useReadableSource(body);
    const reader = new LineReader(source, options.limits.maxLine);
    // the resumption id is already in the request headers
    assembler.reset();
    session.transition("streaming", log);
    log.info({ url: request.url }, "connected");

    while (true) {
      const result = yield* reader.readLine();

      if (result.kind === "line") {
        const event = assembler.push(result.line);
        if (event) {
          session.dispatch(event, log);
        }
        continue;
      }

      if (result.kind === "end") {
        // closing the stream is how servers end a session; reconnect quietly
        log.debug("stream ended");
        return "retry";
      }

      if (isCancelled(session, signal)) {
        return "stop";
      }
      session.dispatch(
        {
          type: "error",
          error: new TransportError("http response body read error", {
            cause: result.error,
          }),
        },
        log
      );
      return "retry";
    }
  });
}

function isCancelled(session: Session, signal: AbortSignal): boolean {
  return (
    session.closed ||
    signal.aborted ||
    (session.options.signal?.aborted ?? false)
  );
}

function* discard(response: Response, log: Logger): Operation<void> {
  const body = response.body;
  if (!body) {
    return;
  }
  yield* call(async () => {
    try {
      await body.cancel();
    } catch (error) {
      log.debug({ err: error }, "response body cancel failed");
    }
  });
}
