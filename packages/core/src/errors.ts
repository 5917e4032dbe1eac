/**
 * Error taxonomy.
 *
 * Everything a consumer can receive through the callback extends
 * `EventSourceError` and carries a `code` to switch on. Clean stream end and
 * cancellation are never reported.
 */

// ============================================================================
// Line reader conditions
// ============================================================================

/** The line buffer reached its maximum size without finding a terminator. */
export class BufferFullError extends Error {
  constructor() {
    super("eventsource: buffer full");
    this.name = "BufferFullError";
  }
}

/** The byte source kept returning nothing without signalling the end. */
export class NoProgressError extends Error {
  constructor(attempts: number) {
    super(`eventsource: ${attempts} consecutive reads returned no data`);
    this.name = "NoProgressError";
  }
}

// ============================================================================
// Dispatched errors
// ============================================================================

export type EventSourceErrorCode =
  | "transport"
  | "invalid-status"
  | "invalid-content-type"
  | "field-too-long";

export abstract class EventSourceError extends Error {
  abstract readonly code: EventSourceErrorCode;
}

/**
 * Connecting or reading the response body failed for a reason other than
 * cancellation. The connection is retried after the reconnect delay.
 */
export class TransportError extends EventSourceError {
  readonly code = "transport" as const;

  constructor(message: string, options: { cause: unknown }) {
    super(`eventsource: ${message}`, options);
    this.name = "TransportError";
  }
}

export class InvalidStatusError extends EventSourceError {
  readonly code = "invalid-status" as const;

  constructor(readonly status: number) {
    super(`eventsource: http response status code is not 200 (got ${status})`);
    this.name = "InvalidStatusError";
  }
}

export class InvalidContentTypeError extends EventSourceError {
  readonly code = "invalid-content-type" as const;

  constructor(readonly contentType: string | null) {
    super(
      `eventsource: http response content type is not text/event-stream (got ${contentType ?? "none"})`
    );
    this.name = "InvalidContentTypeError";
  }
}

export type LimitedField = "id" | "event" | "data";

/**
 * A field of the current message exceeded its buffer limit. Reported in
 * place of that message; the connection stays open.
 */
export class FieldTooLongError extends EventSourceError {
  readonly code = "field-too-long" as const;

  constructor(
    readonly field: LimitedField,
    readonly limit: number
  ) {
    super(`eventsource: ${field} field is too long`, {
      cause: new BufferFullError(),
    });
    this.name = "FieldTooLongError";
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class EventSourceConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`eventsource: invalid options: ${issues.join("; ")}`);
    this.name = "EventSourceConfigError";
  }
}
