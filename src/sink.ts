/**
 * Output sinks. Writers depend only on {@link OutputSink}; two implementations
 * are provided: an in-memory buffer and a buffered file descriptor.
 */

import { writeSync } from 'node:fs';
import { SinkError } from './errors.js';

export interface OutputSink {
  /** Write `byte` once, or `count` times. */
  put(byte: number, count?: number): void;
  /** Write `length` bytes of `data` starting at `offset`. */
  putn(data: Uint8Array, offset: number, length: number): void;
  flush(): void;
  /** Total number of bytes accepted so far. */
  outpos(): number;
}

const INITIAL = 4096;

/** Growable in-memory sink. */
export class BufferSink implements OutputSink {
  private buf: Uint8Array;
  private off = 0;

  constructor(initialCapacity = INITIAL) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  put(byte: number, count = 1): void {
    this.ensure(count);
    this.buf.fill(byte, this.off, this.off + count);
    this.off += count;
  }

  putn(data: Uint8Array, offset: number, length: number): void {
    this.ensure(length);
    this.buf.set(data.subarray(offset, offset + length), this.off);
    this.off += length;
  }

  flush(): void {}

  outpos(): number {
    return this.off;
  }

  /** View of the bytes written so far. */
  bytes(): Uint8Array {
    return this.buf.subarray(0, this.off);
  }

  toString(): string {
    return new TextDecoder().decode(this.bytes());
  }

  /** Drop the contents, keeping the capacity. */
  reset(): void {
    this.off = 0;
  }

  private ensure(n: number): void {
    if (this.off + n > this.buf.length) {
      const next = new Uint8Array(Math.max(this.buf.length * 2, this.off + n));
      next.set(this.buf.subarray(0, this.off));
      this.buf = next;
    }
  }
}

export interface FdSinkOptions {
  /** Bytes buffered before a write to the descriptor (default 8192) */
  bufferSize?: number;
}

const DEFAULT_FD_BUFFER = 8192;

/**
 * Buffered sink over an open file descriptor. Writes are synchronous; the
 * descriptor is not closed by the sink.
 */
export class FdSink implements OutputSink {
  private readonly buf: Uint8Array;
  private used = 0;
  private written = 0;

  constructor(
    private readonly fd: number,
    options: FdSinkOptions = {}
  ) {
    this.buf = new Uint8Array(Math.max(1, options.bufferSize ?? DEFAULT_FD_BUFFER));
  }

  put(byte: number, count = 1): void {
    let left = count;
    while (left > 0) {
      if (this.used === this.buf.length) this.drain();
      const n = Math.min(left, this.buf.length - this.used);
      this.buf.fill(byte, this.used, this.used + n);
      this.used += n;
      left -= n;
    }
  }

  putn(data: Uint8Array, offset: number, length: number): void {
    let pos = offset;
    const end = offset + length;
    while (pos < end) {
      if (this.used === this.buf.length) this.drain();
      const n = Math.min(end - pos, this.buf.length - this.used);
      this.buf.set(data.subarray(pos, pos + n), this.used);
      this.used += n;
      pos += n;
    }
  }

  flush(): void {
    this.drain();
  }

  outpos(): number {
    return this.written + this.used;
  }

  private drain(): void {
    let start = 0;
    while (start < this.used) {
      let n: number;
      try {
        n = writeSync(this.fd, this.buf, start, this.used - start);
      } catch (err) {
        throw new SinkError(`Write to file descriptor ${this.fd} failed`, {
          byteOffset: this.written + start,
          cause: err,
        });
      }
      start += n;
    }
    this.written += this.used;
    this.used = 0;
  }
}
