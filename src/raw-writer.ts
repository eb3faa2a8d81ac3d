/**
 * Low-level JSON token emitter. Writes exactly what it is asked to write;
 * grammar is the caller's concern (see {@link JsonWriter}).
 */

import { InvalidValueError } from './errors.js';
import { writeEscaped } from './escape.js';
import {
  writeFloat32,
  writeFloat64,
  writeSigned,
  writeTaggedNumber,
  writeUnsigned,
} from './format-number.js';
import type { IntegerLike, JsonNumber } from './number.js';
import type { OutputSink } from './sink.js';
import { BytesSource, StringSource, type CharSource } from './source.js';
import { classifyScalar, type ClassifiedScalar, type JsonScalar } from './value.js';

const LBRACE = 0x7b;
const RBRACE = 0x7d;
const LBRACKET = 0x5b;
const RBRACKET = 0x5d;
const COLON = 0x3a;
const COMMA = 0x2c;
const NEWLINE = 0x0a;
const SPACE = 0x20;

const ascii = (s: string): Uint8Array => Uint8Array.from(s, (c) => c.charCodeAt(0));
const TRUE = ascii('true');
const FALSE = ascii('false');
const NULL = ascii('null');

export class RawJsonWriter {
  constructor(readonly sink: OutputSink) {}

  writeStartObject(): void {
    this.sink.put(LBRACE);
  }
  writeEndObject(): void {
    this.sink.put(RBRACE);
  }
  writeStartArray(): void {
    this.sink.put(LBRACKET);
  }
  writeEndArray(): void {
    this.sink.put(RBRACKET);
  }
  writeKeySeparator(): void {
    this.sink.put(COLON);
  }
  writeItemSeparator(): void {
    this.sink.put(COMMA);
  }

  /** Signed 64-bit integer. */
  writeInt(value: IntegerLike): void {
    writeSigned(this.sink, value, 64);
  }
  /** Unsigned 64-bit integer. */
  writeUint(value: IntegerLike): void {
    writeUnsigned(this.sink, value, 64);
  }
  writeInt32(value: number): void {
    writeSigned(this.sink, value, 32);
  }
  writeUint32(value: number): void {
    writeUnsigned(this.sink, value, 32);
  }
  /** Rounded to 32-bit, printed with float32 round-trip digits. */
  writeFloat(value: number): void {
    writeFloat32(this.sink, value);
  }
  writeDouble(value: number): void {
    writeFloat64(this.sink, value);
  }
  writeNumber(value: JsonNumber): void {
    writeTaggedNumber(this.sink, value);
  }

  writeBool(value: boolean): void {
    const lit = value ? TRUE : FALSE;
    this.sink.putn(lit, 0, lit.length);
  }

  writeNull(): void {
    this.sink.putn(NULL, 0, NULL.length);
  }

  /**
   * Escaped string from a source. With `quoted` false the surrounding quotes
   * are left out, for callers assembling a string from several fragments.
   */
  writeStringFrom(source: CharSource, quoted = true): void {
    writeEscaped(this.sink, source, quoted);
  }

  /** Escaped, quoted string; `null` for null or undefined. */
  writeString(value: string | Uint8Array | null | undefined): void {
    if (value === null || value === undefined) {
      this.writeNull();
    } else if (typeof value === 'string') {
      this.writeStringFrom(new StringSource(value));
    } else {
      this.writeStringFrom(new BytesSource(value));
    }
  }

  write(value: JsonScalar): void {
    this.writeClassified(classifyScalar(value, this.outpos()));
  }

  writeNewline(): void {
    this.sink.put(NEWLINE);
  }

  writeWhitespace(count: number): void {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new InvalidValueError(`Whitespace count must be a non-negative integer, got ${count}`, {
        byteOffset: this.outpos(),
      });
    }
    if (count > 0) this.sink.put(SPACE, count);
  }

  outpos(): number {
    return this.sink.outpos();
  }

  /** Emits a scalar already resolved by {@link classifyScalar}. */
  writeClassified(scalar: ClassifiedScalar): void {
    switch (scalar.category) {
      case 'null':
        return this.writeNull();
      case 'double':
        return this.writeDouble(scalar.value);
      case 'int':
        return this.writeInt(scalar.value);
      case 'number':
        return this.writeNumber(scalar.value);
      case 'bool':
        return this.writeBool(scalar.value);
      case 'string':
      case 'bytes':
        return this.writeString(scalar.value);
    }
  }
}
