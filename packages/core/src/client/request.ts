const decoder = new TextDecoder();

export const EVENT_STREAM_MEDIA_TYPE = "text/event-stream";

/**
 * Build the request for one connection attempt from the prototype.
 *
 * Each attempt works on a clone, so the prototype's headers and body stay
 * usable for the next one. `Accept` and `Cache-Control` are only set when
 * the caller did not set them.
 *
 * @throws TypeError when the prototype's body has already been read
 */
export function buildRequest(
  prototype: Request,
  lastEventId: Uint8Array | undefined,
  signal: AbortSignal
): Request {
  const source = prototype.clone();
  const headers = new Headers(source.headers);

  if (!headers.has("accept")) {
    headers.set("Accept", EVENT_STREAM_MEDIA_TYPE);
  }
  if (!headers.has("cache-control")) {
    headers.set("Cache-Control", "no-cache");
  }
  if (lastEventId && lastEventId.length > 0) {
    headers.set("Last-Event-Id", decoder.decode(lastEventId));
  }

  return new Request(source, { headers, signal });
}

/**
 * Whether a Content-Type header names the event stream media type.
 * Parameters such as `charset` are accepted.
 */
export function isEventStream(contentType: string | null): boolean {
  if (!contentType) {
    return false;
  }
  const [essence = ""] = contentType.split(";");
  return essence.trim().toLowerCase() === EVENT_STREAM_MEDIA_TYPE;
}
