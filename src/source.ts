/**
 * Bounded, one-pass byte sources consumed by the string escaper.
 */

import { InvalidValueError } from './errors.js';

export interface CharSource {
  /** True once every byte has been taken. */
  end(): boolean;
  /** Next byte. Only valid while `end()` is false. */
  take(): number;
}

/**
 * UTF-8 bytes of a JS string, encoded lazily. Lone surrogates become U+FFFD,
 * the same substitution `TextEncoder` makes.
 */
export class StringSource implements CharSource {
  private index = 0;
  // continuation bytes still owed for the current code point, in order
  private pending = 0;
  private b1 = 0;
  private b2 = 0;
  private b3 = 0;

  constructor(private readonly text: string) {}

  end(): boolean {
    return this.pending === 0 && this.index >= this.text.length;
  }

  take(): number {
    if (this.pending > 0) return this.shift();

    let cp = this.text.charCodeAt(this.index++);
    if (cp < 0x80) return cp;
    if (cp < 0x800) {
      this.queue(1, 0x80 | (cp & 0x3f));
      return 0xc0 | (cp >> 6);
    }
    if (cp >= 0xd800 && cp <= 0xdfff) {
      const next = this.index < this.text.length ? this.text.charCodeAt(this.index) : 0;
      if (cp <= 0xdbff && next >= 0xdc00 && next <= 0xdfff) {
        this.index++;
        cp = 0x10000 + ((cp - 0xd800) << 10) + (next - 0xdc00);
        this.queue(3, 0x80 | ((cp >> 12) & 0x3f), 0x80 | ((cp >> 6) & 0x3f), 0x80 | (cp & 0x3f));
        return 0xf0 | (cp >> 18);
      }
      cp = 0xfffd;
    }
    this.queue(2, 0x80 | ((cp >> 6) & 0x3f), 0x80 | (cp & 0x3f));
    return 0xe0 | (cp >> 12);
  }

  private queue(count: number, b1: number, b2 = 0, b3 = 0): void {
    this.pending = count;
    this.b1 = b1;
    this.b2 = b2;
    this.b3 = b3;
  }

  private shift(): number {
    const b = this.b1;
    this.b1 = this.b2;
    this.b2 = this.b3;
    this.pending--;
    return b;
  }
}

/** Bytes of a buffer, verbatim. No encoding checks. */
export class BytesSource implements CharSource {
  private pos: number;
  private readonly limit: number;

  constructor(
    private readonly data: Uint8Array,
    offset = 0,
    length = data.length - offset
  ) {
    if (
      !Number.isSafeInteger(offset) ||
      !Number.isSafeInteger(length) ||
      offset < 0 ||
      length < 0 ||
      offset + length > data.length
    ) {
      throw new InvalidValueError(
        `Window ${offset}+${length} is outside a buffer of ${data.length} bytes`
      );
    }
    this.pos = offset;
    this.limit = offset + length;
  }

  end(): boolean {
    return this.pos >= this.limit;
  }

  take(): number {
    return this.data[this.pos++] ?? 0;
  }
}
