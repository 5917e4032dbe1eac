import { z } from "zod";
import { EventSourceConfigError } from "../errors.ts";
import type { Logger } from "../logger/types.ts";
import type { EventSourceCallback } from "../types/event.ts";

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MAX_ID = 256;
export const DEFAULT_MAX_EVENT = 256;
export const DEFAULT_MAX_DATA = 4 * 1024 * 1024;
export const DEFAULT_RETRY_DELAY = 1000;

// room for the longest field name, its separator, and a CRLF
const LINE_OVERHEAD = "event: \r\n".length + 1;

// ============================================================================
// Types
// ============================================================================

/**
 * Sends a request and resolves with the response. The global `fetch` fits.
 */
export type HttpClient = (request: Request) => Promise<Response>;

/**
 * Size limits for the per-message field buffers and the line buffer. A
 * value of 0 (or leaving it out) selects the default.
 */
export interface BufferLimits {
  /** Default 256 bytes. */
  maxId?: number;
  /** Default 256 bytes. */
  maxEvent?: number;
  /** Default 4 MiB. */
  maxData?: number;
  /** Default: the largest field limit plus framing overhead. */
  maxLine?: number;
}

export interface EventSourceOptions {
  /** Endpoint to GET. Ignored when `request` is given. */
  url?: string;
  /** Request prototype, copied for every connection attempt. */
  request?: Request;
  /** Receives every message and error. */
  callback: EventSourceCallback;
  /** Defaults to the global `fetch`. */
  fetch?: HttpClient;
  /** Closes the event source when aborted. */
  signal?: AbortSignal;
  limits?: BufferLimits;
  /** Initial reconnect delay in milliseconds (default 1000). */
  retryDelay?: number;
  /** Resume from this id: sent as `Last-Event-Id` on the first request. */
  lastEventId?: string;
  /** Logger for this event source; otherwise the scope's or a no-op one. */
  logger?: Logger;
}

export interface ResolvedLimits {
  maxId: number;
  maxEvent: number;
  maxData: number;
  maxLine: number;
}

export interface ResolvedOptions {
  request: Request;
  callback: EventSourceCallback;
  fetch: HttpClient;
  signal: AbortSignal | undefined;
  limits: ResolvedLimits;
  retryDelay: number;
  lastEventId: Uint8Array | undefined;
  logger: Logger | undefined;
}

// ============================================================================
// Schemas
// ============================================================================

const LimitSchema = z.number().int().nonnegative().optional();

export const BufferLimitsSchema = z
  .object({
    maxId: LimitSchema,
    maxEvent: LimitSchema,
    maxData: LimitSchema,
    maxLine: LimitSchema,
  })
  .strict();

export const EventSourceSettingsSchema = z.object({
  url: z.string().url().optional(),
  limits: BufferLimitsSchema.optional(),
  retryDelay: z.number().int().nonnegative().optional(),
  lastEventId: z
    .string()
    .refine((id) => !/[\0\r\n]/.test(id), "must not contain NUL, CR or LF")
    .optional(),
});

export type EventSourceSettings = z.infer<typeof EventSourceSettingsSchema>;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Fill in the limits left at 0 or unset. The line buffer default is derived
 * from the resolved field limits.
 */
export function resolveLimits(limits: BufferLimits = {}): ResolvedLimits {
  const maxId = limits.maxId || DEFAULT_MAX_ID;
  const maxEvent = limits.maxEvent || DEFAULT_MAX_EVENT;
  const maxData = limits.maxData || DEFAULT_MAX_DATA;
  const maxLine =
    limits.maxLine || Math.max(maxId, maxEvent, maxData) + LINE_OVERHEAD;
  return { maxId, maxEvent, maxData, maxLine };
}

/**
 * Validate options and apply defaults.
 *
 * @throws EventSourceConfigError when a value is invalid or neither `url`
 *   nor `request` is given
 */
export function resolveOptions(options: EventSourceOptions): ResolvedOptions {
  const parsed = EventSourceSettingsSchema.safeParse({
    url: options.url,
    limits: options.limits,
    retryDelay: options.retryDelay,
    lastEventId: options.lastEventId,
  });

  if (!parsed.success) {
    throw new EventSourceConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`
      )
    );
  }

  const settings = parsed.data;
  const request = options.request ?? toRequest(settings.url);

  return {
    request,
    callback: options.callback,
    fetch: options.fetch ?? ((req) => fetch(req)),
    signal: options.signal,
    limits: resolveLimits(settings.limits),
    retryDelay: settings.retryDelay ?? DEFAULT_RETRY_DELAY,
    lastEventId: settings.lastEventId
      ? new TextEncoder().encode(settings.lastEventId)
      : undefined,
    logger: options.logger,
  };
}

function toRequest(url: string | undefined): Request {
  if (url === undefined) {
    throw new EventSourceConfigError(["options: either url or request is required"]);
  }
  return new Request(url, { method: "GET" });
}
