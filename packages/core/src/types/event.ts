import type { EventSourceError } from "../errors.ts";

/**
 * A message assembled from the stream.
 *
 * Each field is `undefined` when the message did not carry it, and an empty
 * array when it carried it with no value.
 *
 * The arrays are views into buffers that are reused for the next message:
 * they are only valid until the callback returns. Use `copyMessage` or
 * `decodeMessage` to keep anything.
 */
export interface Message {
  /** The `id` field. */
  id?: Uint8Array;
  /** The `event` field (message type). */
  event?: Uint8Array;
  /** All `data` fields of the message, joined with LF. */
  data?: Uint8Array;
}

/**
 * A message with its fields decoded as UTF-8.
 */
export interface DecodedMessage {
  id?: string;
  event?: string;
  data?: string;
}

/**
 * What the callback receives: either a message or an error.
 */
export type EventSourceEvent =
  | { type: "message"; message: Message }
  | { type: "error"; error: EventSourceError };

/**
 * Invoked on the worker for every message and error. It must return quickly;
 * hand longer work off after copying what it needs.
 */
export type EventSourceCallback = (event: EventSourceEvent) => void;

export type ConnectionState =
  | "connecting"
  | "streaming"
  | "backing-off"
  | "stopped";
