/**
 * Growable Line Reader
 *
 * Buffered reading of protocol lines from a `ByteSource`. A line ends with
 * LF, CR, or CRLF, so the usual line splitters that only know LF (or only
 * CRLF) cannot be used here.
 *
 * The backing buffer starts small and doubles on demand, but never beyond
 * `maxSize`. A line that does not fit is reported with `BufferFullError`
 * instead of growing further.
 */
import type { Operation } from "effection";
import { BufferFullError, NoProgressError } from "../errors.ts";
import type { ByteSource, ReadResult } from "./source.ts";

const CR = 0x0d;
const LF = 0x0a;

const DEFAULT_BUFFER_SIZE = 4096;

export const MAX_CONSECUTIVE_EMPTY_READS = 100;

const END: unique symbol = Symbol("end");

/**
 * Result of `LineReader.readLine()`.
 *
 * `line` is a view into the reader's buffer and is only valid until the next
 * call. With `end` or `error`, `line` holds whatever was buffered before the
 * condition (possibly empty).
 */
export type LineResult =
  | { kind: "line"; line: Uint8Array }
  | { kind: "end"; line: Uint8Array }
  | { kind: "error"; line: Uint8Array; error: Error };

export class LineReader {
  private buf: Uint8Array;
  private r = 0;
  private w = 0;
  private pending: Error | typeof END | undefined;
  // previous line ended with a bare CR; an LF right after it belongs to it
  private crLine = false;

  constructor(
    private readonly source: ByteSource,
    private readonly maxSize: number
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`eventsource: invalid line buffer size ${maxSize}`);
    }
    this.buf = new Uint8Array(Math.min(maxSize, DEFAULT_BUFFER_SIZE));
  }

  /** Current size of the backing buffer. */
  get capacity(): number {
    return this.buf.length;
  }

  *readLine(): Operation<LineResult> {
    // bytes already searched for a terminator
    let scanned = 0;

    while (true) {
      if (this.crLine && this.w > this.r) {
        // only reached with scanned === 0: either the buffer had data on
        // entry, or the fill below just produced the first bytes
        this.crLine = false;
        if (this.buf[this.r] === LF) {
          this.r++;
        }
      }

      const end = findLineEnd(this.buf, this.r + scanned, this.w);
      if (end >= 0) {
        const line = this.buf.subarray(this.r, end);
        this.crLine = this.buf[end] === CR;
        this.r = end + 1;
        return { kind: "line", line };
      }

      if (this.pending !== undefined) {
        const line = this.buf.subarray(this.r, this.w);
        this.r = this.w;
        const pending = this.pending;
        if (pending === END) {
          // end of stream is sticky
          return { kind: "end", line };
        }
        this.pending = undefined;
        return { kind: "error", line, error: pending };
      }

      scanned = this.w - this.r;
      yield* this.fill();
    }
  }

  private *fill(): Operation<void> {
    if (this.r > 0) {
      this.buf.copyWithin(0, this.r, this.w);
      this.w -= this.r;
      this.r = 0;
    }

    if (this.w >= this.buf.length && !this.grow()) {
      this.pending = new BufferFullError();
      return;
    }

    for (let attempts = MAX_CONSECUTIVE_EMPTY_READS; attempts > 0; attempts--) {
      let result: ReadResult;
      try {
        result = yield* this.source.read(this.buf.subarray(this.w));
      } catch (error) {
        this.pending = error instanceof Error ? error : new Error(String(error));
        return;
      }

      if (result.bytesRead < 0) {
        throw new Error("eventsource: source returned negative count from read");
      }

      this.w += result.bytesRead;
      if (result.done) {
        this.pending = END;
        return;
      }
      if (result.bytesRead > 0) {
        return;
      }
    }

    this.pending = new NoProgressError(MAX_CONSECUTIVE_EMPTY_READS);
  }

  private grow(): boolean {
    if (this.buf.length >= this.maxSize) {
      return false;
    }
    const next = new Uint8Array(Math.min(this.maxSize, this.buf.length * 2));
    next.set(this.buf.subarray(0, this.w));
    this.buf = next;
    return true;
  }
}

function findLineEnd(buf: Uint8Array, from: number, to: number): number {
  for (let i = from; i < to; i++) {
    const byte = buf[i];
    if (byte === CR || byte === LF) {
      return i;
    }
  }
  return -1;
}
