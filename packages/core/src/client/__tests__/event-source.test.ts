import { describe, it, expect, vi, afterEach } from "vitest";
import { run, until } from "effection";
import { createEventSource, useEventSource, type EventSource } from "../event-source.ts";
import type { EventSourceOptions } from "../options.ts";
import {
  BufferFullError,
  EventSourceConfigError,
  FieldTooLongError,
  InvalidContentTypeError,
  InvalidStatusError,
  TransportError,
  type EventSourceError,
} from "../../errors.ts";
import { decodeMessage } from "../../message.ts";
import type { DecodedMessage, EventSourceEvent } from "../../types/event.ts";
import {
  createFetchStub,
  createMockStream,
  createOpenStream,
  createRecordingLogger,
  createTickingStream,
  sseResponse,
  type Responder,
} from "../../__tests__/test-utils.ts";

const ENDPOINT = "http://localhost/events";

interface Harness {
  source: EventSource;
  messages: DecodedMessage[];
  errors: EventSourceError[];
  requests: Request[];
}

const sources: EventSource[] = [];

afterEach(async () => {
  await Promise.all(sources.splice(0).map((source) => source.close()));
});

function collect(messages: DecodedMessage[], errors: EventSourceError[]) {
  return (event: EventSourceEvent) => {
    if (event.type === "message") {
      messages.push(decodeMessage(event.message));
    } else {
      errors.push(event.error);
    }
  };
}

function start(
  responders: Responder[],
  options: Partial<EventSourceOptions> = {}
): Harness {
  const messages: DecodedMessage[] = [];
  const errors: EventSourceError[] = [];
  const { fetch, requests } = createFetchStub(responders);

  const source = createEventSource({
    url: ENDPOINT,
    fetch,
    retryDelay: 10,
    callback: collect(messages, errors),
    ...options,
  });
  sources.push(source);

  return { source, messages, errors, requests };
}

function stream(...chunks: string[]): Responder {
  return () => sseResponse(createMockStream(chunks));
}

describe("createEventSource", () => {
  it("should deliver messages and resume with the last event id", async () => {
    const { source, messages, errors, requests } = start([
      stream("id: 1\ndata: hello\n\n"),
    ]);

    await vi.waitFor(() => expect(requests).toHaveLength(2));

    expect(messages).toEqual([{ id: "1", data: "hello" }]);
    expect(errors).toEqual([]);
    expect(requests[0]?.headers.get("last-event-id")).toBeNull();
    expect(requests[0]?.headers.get("accept")).toBe("text/event-stream");
    expect(requests[1]?.headers.get("last-event-id")).toBe("1");
    expect(source.lastEventId).toBe("1");
  });

  it("should deliver messages split across chunks in order", async () => {
    const { messages, requests } = start([
      stream("event: up", "date\ndata: a\r", "\ndata: b\r\n\r\n", "data: c\n\n"),
    ]);

    await vi.waitFor(() => expect(requests).toHaveLength(2));

    expect(messages).toEqual([
      { event: "update", data: "a\nb" },
      { data: "c" },
    ]);
  });

  it("should discard an unterminated message at the end of the stream", async () => {
    const { messages, requests } = start([stream("data: a\n\ndata: partial\n")]);

    await vi.waitFor(() => expect(requests).toHaveLength(2));

    expect(messages).toEqual([{ data: "a" }]);
  });

  it("should resume from the id of a message cut off by the stream end", async () => {
    const { source, messages, requests } = start([
      stream("id: 1\ndata: a\n\nid: 7\ndata: b\n"),
    ]);

    await vi.waitFor(() => expect(requests).toHaveLength(2));

    expect(messages).toEqual([{ id: "1", data: "a" }]);
    expect(requests[1]?.headers.get("last-event-id")).toBe("7");
    expect(source.lastEventId).toBe("7");
  });

  it("should reuse a request prototype with a body on every attempt", async () => {
    const prototype = new Request(ENDPOINT, { method: "POST", body: "sub=1" });
    const { messages, errors, requests } = start(
      [stream("data: a\n\n"), stream("data: b\n\n")],
      { request: prototype }
    );

    await vi.waitFor(() => expect(requests).toHaveLength(3));

    expect(errors).toEqual([]);
    expect(messages).toEqual([{ data: "a" }, { data: "b" }]);
    expect(requests.map((request) => request.method)).toEqual([
      "POST",
      "POST",
      "POST",
    ]);
    expect(await Promise.all(requests.map((request) => request.text()))).toEqual([
      "sub=1",
      "sub=1",
      "sub=1",
    ]);
    expect(prototype.bodyUsed).toBe(false);
  });

  it("should send the seeded last event id on the first request", async () => {
    const { source, requests } = start([], { lastEventId: "seed-7" });

    expect(source.lastEventId).toBe("seed-7");
    await vi.waitFor(() => expect(requests).toHaveLength(1));
    expect(requests[0]?.headers.get("last-event-id")).toBe("seed-7");
  });

  it("should report the connection state", async () => {
    const { source } = start([() => sseResponse(createOpenStream(["data: a\n\n"]))]);

    await vi.waitFor(() => expect(source.state).toBe("streaming"));

    await source.close();
    expect(source.state).toBe("stopped");
  });

  describe("errors", () => {
    it("should reject a status other than 200 and retry", async () => {
      const { errors, requests } = start([
        () => new Response("unavailable", { status: 503 }),
      ]);

      await vi.waitFor(() => expect(requests).toHaveLength(2));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(InvalidStatusError);
      expect(errors[0]?.code).toBe("invalid-status");
      expect(errors[0]?.message).toBe(
        "eventsource: http response status code is not 200 (got 503)"
      );
    });

    it("should reject a 2xx status that is not 200", async () => {
      const { errors, messages } = start([
        () =>
          sseResponse(createMockStream(["data: a\n\n"]), {
            status: 201,
            headers: { "Content-Type": "text/event-stream" },
          }),
      ]);

      await vi.waitFor(() => expect(errors).toHaveLength(1));
      expect(errors[0]).toBeInstanceOf(InvalidStatusError);
      expect(messages).toEqual([]);
    });

    it("should reject another content type", async () => {
      const { errors, messages } = start([
        () =>
          new Response("data: a\n\n", {
            status: 200,
            headers: { "Content-Type": "text/plain" },
          }),
      ]);

      await vi.waitFor(() => expect(errors).toHaveLength(1));

      const [error] = errors;
      expect(error).toBeInstanceOf(InvalidContentTypeError);
      if (error instanceof InvalidContentTypeError) {
        expect(error.contentType).toBe("text/plain");
      }
      expect(messages).toEqual([]);
    });

    it("should accept a content type with parameters", async () => {
      const { messages, errors } = start([
        () =>
          sseResponse(createMockStream(["data: hi\n\n"]), {
            headers: { "Content-Type": "text/event-stream; charset=utf-8" },
          }),
      ]);

      await vi.waitFor(() => expect(messages).toEqual([{ data: "hi" }]));
      expect(errors).toEqual([]);
    });

    it("should report a failed request with its cause", async () => {
      const cause = new Error("connection refused");
      const { errors, requests } = start([
        () => {
          throw cause;
        },
      ]);

      await vi.waitFor(() => expect(requests).toHaveLength(2));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(TransportError);
      expect(errors[0]?.message).toBe("eventsource: http response error");
      expect(errors[0]?.cause).toBe(cause);
    });

    it("should report a request that cannot be built and keep retrying", async () => {
      const prototype = new Request(ENDPOINT, { method: "POST", body: "sub=1" });
      await prototype.text();

      const { source, errors, requests } = start([], { request: prototype });

      await vi.waitFor(() => expect(errors.length).toBeGreaterThanOrEqual(2));

      expect(requests).toEqual([]);
      expect(errors[0]).toBeInstanceOf(TransportError);
      expect(errors[0]?.message).toBe("eventsource: http request error");
      expect(errors[0]?.cause).toBeInstanceOf(TypeError);
      expect(source.state).not.toBe("stopped");
    });

    it("should report an oversized field and keep streaming", async () => {
      const { errors, messages } = start(
        [stream("data: hello\n\ndata: ok\n\n")],
        { limits: { maxData: 4 } }
      );

      await vi.waitFor(() => expect(messages).toEqual([{ data: "ok" }]));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(FieldTooLongError);
      expect(errors[0]?.message).toBe("eventsource: data field is too long");
    });

    it("should report a line longer than the line buffer and reconnect", async () => {
      const { errors, requests } = start(
        [stream(`data: ${"x".repeat(40)}\n\n`)],
        { limits: { maxLine: 16 } }
      );

      await vi.waitFor(() => expect(requests).toHaveLength(2));

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(TransportError);
      expect(errors[0]?.message).toBe("eventsource: http response body read error");
      expect(errors[0]?.cause).toBeInstanceOf(BufferFullError);
    });

    it("should keep running when the callback throws", async () => {
      const data: string[] = [];
      const logger = createRecordingLogger();
      const { requests } = start([stream("data: a\n\ndata: b\n\n")], {
        logger,
        callback(event) {
          if (event.type === "message") {
            data.push(decodeMessage(event.message).data ?? "");
            throw new Error("callback failure");
          }
        },
      });

      await vi.waitFor(() => expect(requests).toHaveLength(2));

      expect(data).toEqual(["a", "b"]);
      const failures = logger.records.filter(
        (record) => record.level === "error" && record.args[1] === "callback threw"
      );
      expect(failures).toHaveLength(2);
      expect(failures[0]?.bindings).toEqual({ module: "eventsource:controller" });
    });

    it("should throw synchronously on invalid options", () => {
      expect(() =>
        createEventSource({ url: "not a url", callback: () => {} })
      ).toThrow(EventSourceConfigError);
    });
  });

  describe("retry", () => {
    it("should wait for the delay sent by the server", async () => {
      const { source, requests } = start([stream("retry: 5000\n\n")]);

      await vi.waitFor(() => expect(source.state).toBe("backing-off"));
      expect(source.retryDelay).toBe(5000);
      expect(requests).toHaveLength(1);

      const started = Date.now();
      await source.close();

      expect(Date.now() - started).toBeLessThan(1000);
      expect(source.state).toBe("stopped");
      expect(requests).toHaveLength(1);
    });
  });

  describe("close", () => {
    it("should stop callbacks once close resolves", async () => {
      let count = 0;
      const { source } = start([() => sseResponse(createTickingStream())], {
        callback: () => {
          count++;
        },
      });

      await vi.waitFor(() => expect(count).toBeGreaterThanOrEqual(3));
      await source.close();
      const closedAt = count;

      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(count).toBe(closedAt);
      expect(source.state).toBe("stopped");
    });

    it("should return the same promise from every call", () => {
      const { source } = start([]);

      expect(source.close()).toBe(source.close());
    });

    it("should interrupt a pending request", async () => {
      const { source, requests, errors } = start([]);

      await vi.waitFor(() => expect(requests).toHaveLength(1));
      await source.close();

      expect(requests[0]?.signal.aborted).toBe(true);
      expect(errors).toEqual([]);
    });

    it("should stop when the signal aborts", async () => {
      const controller = new AbortController();
      const { source, messages } = start(
        [() => sseResponse(createOpenStream(["data: a\n\n"]))],
        { signal: controller.signal }
      );

      await vi.waitFor(() => expect(messages).toHaveLength(1));
      controller.abort();

      await vi.waitFor(() => expect(source.state).toBe("stopped"));
      expect(messages).toEqual([{ data: "a" }]);
    });

    it("should not connect with an already aborted signal", async () => {
      const { source, requests } = start([stream("data: a\n\n")], {
        signal: AbortSignal.abort(),
      });

      await source.close();

      expect(requests).toEqual([]);
      expect(source.state).toBe("stopped");
    });
  });
});

describe("useEventSource", () => {
  it("should run for the lifetime of the scope", async () => {
    const messages: DecodedMessage[] = [];
    const errors: EventSourceError[] = [];
    const { fetch } = createFetchStub([
      () => sseResponse(createOpenStream(["id: 3\ndata: scoped\n\n"])),
    ]);

    const source = await run(function* () {
      const source = yield* useEventSource({
        url: ENDPOINT,
        fetch,
        callback: collect(messages, errors),
      });
      yield* until(
        vi.waitFor(() => expect(messages).toEqual([{ id: "3", data: "scoped" }]))
      );
      expect(source.state).toBe("streaming");
      return source;
    });

    expect(source.state).toBe("stopped");
    expect(source.lastEventId).toBe("3");
    expect(errors).toEqual([]);
  });
});
