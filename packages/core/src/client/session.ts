import type { Logger } from "../logger/types.ts";
import type { ResumptionState } from "../parse/assembler.ts";
import type { ConnectionState, EventSourceEvent } from "../types/event.ts";
import type { ResolvedOptions } from "./options.ts";

/**
 * State that lives for the whole event source: the resumption id, the
 * reconnect delay, and the connection state. Connections come and go; the
 * session does not.
 */
export class Session {
  readonly resumption: ResumptionState;
  private connection: ConnectionState = "connecting";
  private closing = false;

  constructor(readonly options: ResolvedOptions) {
    this.resumption = {
      lastEventId: options.lastEventId,
      retryDelay: options.retryDelay,
    };
  }

  get state(): ConnectionState {
    return this.connection;
  }

  /** True once `close()` has been called. */
  get closed(): boolean {
    return this.closing;
  }

  /**
   * Stop delivering to the callback. The worker is halted separately; this
   * flag covers the window between the request and its completion.
   */
  close(): void {
    this.closing = true;
  }

  transition(next: ConnectionState, log: Logger): void {
    if (next === this.connection) {
      return;
    }
    log.debug({ from: this.connection, to: next }, "state changed");
    this.connection = next;
  }

  /**
   * The single dispatch point. A throwing callback is logged and does not
   * stop the worker.
   */
  dispatch(event: EventSourceEvent, log: Logger): void {
    if (this.closing) {
      return;
    }
    if (event.type === "error") {
      log.warn({ code: event.error.code, err: event.error }, event.error.message);
    }
    try {
      this.options.callback(event);
    } catch (error) {
      log.error({ err: error }, "callback threw");
    }
  }
}
