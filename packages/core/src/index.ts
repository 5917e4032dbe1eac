// Client
export {
  createEventSource,
  useEventSource,
  type EventSource,
} from "./client/event-source.ts";
export { runEventSource } from "./client/controller.ts";
export {
  resolveOptions,
  resolveLimits,
  BufferLimitsSchema,
  EventSourceSettingsSchema,
  DEFAULT_MAX_ID,
  DEFAULT_MAX_EVENT,
  DEFAULT_MAX_DATA,
  DEFAULT_RETRY_DELAY,
  type EventSourceOptions,
  type EventSourceSettings,
  type BufferLimits,
  type HttpClient,
  type ResolvedOptions,
  type ResolvedLimits,
} from "./client/options.ts";
export { Session } from "./client/session.ts";
export { buildRequest, isEventStream } from "./client/request.ts";

// Messages
export type {
  Message,
  DecodedMessage,
  EventSourceEvent,
  EventSourceCallback,
  ConnectionState,
} from "./types/event.ts";
export { copyMessage, decodeMessage } from "./message.ts";

// Parsing
export { LineReader, type LineResult } from "./buffer/line-reader.ts";
export {
  useReadableSource,
  type ByteSource,
  type ReadResult,
} from "./buffer/source.ts";
export {
  splitLine,
  parseLine,
  type FieldName,
  type ParsedLine,
  type SplitLine,
} from "./parse/field.ts";
export {
  MessageAssembler,
  FieldBuffer,
  parseRetry,
  type FieldLimits,
  type ResumptionState,
} from "./parse/assembler.ts";

// Errors
export {
  EventSourceError,
  TransportError,
  InvalidStatusError,
  InvalidContentTypeError,
  FieldTooLongError,
  BufferFullError,
  NoProgressError,
  EventSourceConfigError,
  type EventSourceErrorCode,
  type LimitedField,
} from "./errors.ts";

// Logging
export * from "./logger/index.ts";
