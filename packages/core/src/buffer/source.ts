import { resource, call, until, type Operation } from "effection";
import { useLogger } from "../logger/context.ts";

/**
 * Outcome of a single read. `done` is only set together with zero bytes.
 */
export interface ReadResult {
  bytesRead: number;
  done: boolean;
}

/**
 * A sequential byte source, read into caller-owned memory.
 *
 * A read may return fewer bytes than requested, including zero. It may throw
 * to report a failure of the underlying stream.
 */
export interface ByteSource {
  read(into: Uint8Array): Operation<ReadResult>;
}

/**
 * Adapt a `ReadableStream` (typically a response body) into a `ByteSource`.
 *
 * Chunks larger than the space offered by a read are kept and handed out by
 * the following reads. The stream reader is cancelled when the surrounding
 * scope exits, which also releases the underlying connection.
 */
export function useReadableSource(
  stream: ReadableStream<Uint8Array>
): Operation<ByteSource> {
  return resource(function* (provide) {
    const log = yield* useLogger("eventsource:source");
    const reader = stream.getReader();
    let pending: Uint8Array = new Uint8Array(0);
    let done = false;

    const source: ByteSource = {
      *read(into: Uint8Array): Operation<ReadResult> {
        if (pending.length === 0) {
          if (done) {
            return { bytesRead: 0, done: true };
          }
          const next = yield* until(reader.read());
          if (next.done) {
            done = true;
            return { bytesRead: 0, done: true };
          }
          pending = next.value;
        }

        const count = Math.min(into.length, pending.length);
        into.set(pending.subarray(0, count));
        pending = pending.subarray(count);
        return { bytesRead: count, done: false };
      },
    };

    try {
      yield* provide(source);
    } finally {
      yield* call(async () => {
        try {
          await reader.cancel();
        } catch (error) {
          // an errored stream rejects cancel with its stored error
          log.debug({ err: error }, "response body cancel failed");
        }
      });
    }
  });
}
