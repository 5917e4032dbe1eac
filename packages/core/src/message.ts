import type { DecodedMessage, Message } from "./types/event.ts";

const decoder = new TextDecoder();

/**
 * Copy a message out of the reader's buffers so it can outlive the callback.
 */
export function copyMessage(message: Message): Message {
  const copy: Message = {};
  if (message.id) copy.id = message.id.slice();
  if (message.event) copy.event = message.event.slice();
  if (message.data) copy.data = message.data.slice();
  return copy;
}

/**
 * Decode a message's fields as UTF-8. The result owns its strings.
 */
export function decodeMessage(message: Message): DecodedMessage {
  const decoded: DecodedMessage = {};
  if (message.id) decoded.id = decoder.decode(message.id);
  if (message.event) decoded.event = decoder.decode(message.event);
  if (message.data) decoded.data = decoder.decode(message.data);
  return decoded;
}
