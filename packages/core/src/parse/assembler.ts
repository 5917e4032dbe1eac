/**
 * Message Assembler
 *
 * Accumulates field lines into the current message and hands out the
 * completed message (or the error that spoiled it) at each blank line.
 *
 * Per message:
 * - `id` and `event` replace their previous value; a non-empty `id` also
 *   becomes the resumption id as soon as it is read
 * - `data` values are joined with LF
 * - `retry` updates the reconnect delay right away
 * - a value over its limit spoils the message: remaining lines up to the
 *   boundary are skipped and the boundary yields the error instead
 */
import { FieldTooLongError, type LimitedField } from "../errors.ts";
import type { Logger } from "../logger/types.ts";
import type { EventSourceEvent, Message } from "../types/event.ts";
import { parseLine, type FieldName } from "./field.ts";

const LF = 0x0a;
const NUL = 0x00;

const EMPTY: Uint8Array = new Uint8Array(0);

// largest delay a timer can wait for
export const MAX_RETRY_DELAY = 2_147_483_647;

export interface FieldLimits {
  maxId: number;
  maxEvent: number;
  maxData: number;
}

/**
 * Session values the assembler updates as a side effect of parsing.
 */
export interface ResumptionState {
  /** Last non-empty id read from the stream, whether or not its message completed. */
  lastEventId: Uint8Array | undefined;
  /** Milliseconds to wait before reconnecting. */
  retryDelay: number;
}

/**
 * A growable byte buffer with a hard limit and a "was set" flag.
 */
export class FieldBuffer {
  private bytes: Uint8Array = EMPTY;
  private size = 0;
  private present = false;

  constructor(readonly limit: number) {}

  get length(): number {
    return this.size;
  }

  /** Replace the content. Returns false, leaving the buffer as is, when over the limit. */
  replace(value: Uint8Array): boolean {
    if (value.length > this.limit) {
      return false;
    }
    this.reserve(value.length);
    this.bytes.set(value, 0);
    this.size = value.length;
    this.present = true;
    return true;
  }

  /** Append, separated by LF from existing content. Returns false when over the limit. */
  append(value: Uint8Array): boolean {
    const separator = this.size > 0 ? 1 : 0;
    const next = this.size + separator + value.length;
    if (next > this.limit) {
      return false;
    }
    this.reserve(next);
    if (separator) {
      this.bytes[this.size] = LF;
    }
    this.bytes.set(value, this.size + separator);
    this.size = next;
    this.present = true;
    return true;
  }

  /** The content, or `undefined` if nothing was set since the last reset. */
  view(): Uint8Array | undefined {
    return this.present ? this.bytes.subarray(0, this.size) : undefined;
  }

  /** Truncate, keeping the allocation. */
  reset(): void {
    this.size = 0;
    this.present = false;
  }

  /** Truncate and drop the allocation. */
  release(): void {
    this.bytes = EMPTY;
    this.reset();
  }

  private reserve(required: number): void {
    if (this.bytes.length >= required) {
      return;
    }
    const capacity = Math.min(
      this.limit,
      Math.max(required, this.bytes.length * 2)
    );
    const next = new Uint8Array(capacity);
    next.set(this.bytes.subarray(0, this.size));
    this.bytes = next;
  }
}

export class MessageAssembler {
  private readonly id: FieldBuffer;
  private readonly event: FieldBuffer;
  private readonly data: FieldBuffer;
  private error: FieldTooLongError | undefined;

  constructor(
    limits: FieldLimits,
    private readonly state: ResumptionState,
    private readonly log: Logger
  ) {
    this.id = new FieldBuffer(limits.maxId);
    this.event = new FieldBuffer(limits.maxEvent);
    this.data = new FieldBuffer(limits.maxData);
  }

  /**
   * Feed one line. Returns what to dispatch when the line ends a message.
   *
   * A returned message views the assembler's buffers and stays valid until
   * the next call to `push`.
   */
  push(line: Uint8Array): EventSourceEvent | undefined {
    const parsed = parseLine(line);

    if (parsed.kind === "blank") {
      return this.complete();
    }

    if (this.error) {
      return undefined;
    }

    switch (parsed.kind) {
      case "comment":
        this.log.trace({ length: parsed.text.length }, "comment");
        return undefined;
      case "ignored":
        return undefined;
      case "field":
        this.apply(parsed.name, parsed.value);
        return undefined;
    }
  }

  /**
   * Drop the buffers' allocations and any message in progress. Used when a
   * new connection starts streaming.
   */
  reset(): void {
    this.id.release();
    this.event.release();
    this.data.release();
    this.error = undefined;
  }

  private apply(name: FieldName, value: Uint8Array): void {
    switch (name) {
      case "id":
        if (!this.id.replace(value)) {
          this.fail("id", this.id.limit);
        } else if (value.length > 0 && !value.includes(NUL)) {
          this.state.lastEventId = value.slice();
        }
        break;
      case "event":
        if (!this.event.replace(value)) this.fail("event", this.event.limit);
        break;
      case "data":
        if (!this.data.append(value)) this.fail("data", this.data.limit);
        break;
      case "retry": {
        const delay = parseRetry(value);
        if (delay !== undefined) {
          this.state.retryDelay = delay;
          this.log.debug({ delay }, "retry delay updated");
        }
        break;
      }
    }
  }

  private fail(field: LimitedField, limit: number): void {
    this.error = new FieldTooLongError(field, limit);
    this.log.warn({ field, limit }, "field too long, skipping message");
  }

  private complete(): EventSourceEvent {
    let event: EventSourceEvent;

    if (this.error) {
      event = { type: "error", error: this.error };
    } else {
      const message: Message = {};
      const id = this.id.view();
      const type = this.event.view();
      const data = this.data.view();
      if (id) message.id = id;
      if (type) message.event = type;
      if (data) message.data = data;
      event = { type: "message", message };
    }

    // truncation leaves the bytes in place, so the views above survive
    // until the next field is written
    this.id.reset();
    this.event.reset();
    this.data.reset();
    this.error = undefined;

    return event;
  }
}

/**
 * Parse a `retry` value: ASCII digits only, no sign, at most
 * `MAX_RETRY_DELAY`.
 */
export function parseRetry(value: Uint8Array): number | undefined {
  if (value.length === 0) {
    return undefined;
  }
  let delay = 0;
  for (const byte of value) {
    if (byte < 0x30 || byte > 0x39) {
      return undefined;
    }
    delay = delay * 10 + (byte - 0x30);
    if (delay > MAX_RETRY_DELAY) {
      return undefined;
    }
  }
  return delay;
}
