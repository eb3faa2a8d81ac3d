/**
 * Decimal formatting of integers and floats into a sink.
 *
 * Digits are produced into one module-level scratch buffer and handed to the
 * sink with a single `putn`; no per-value buffer is allocated. Capacities are
 * the maximum decimal character counts for each category.
 */

import { InvalidValueError, NonFiniteNumberError } from './errors.js';
import {
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  UINT32_MAX,
  UINT64_MAX,
  checkSigned,
  type IntegerLike,
  type JsonNumber,
} from './number.js';
import type { OutputSink } from './sink.js';

export type IntWidth = 32 | 64;

/** Maximum characters per category, sign included. */
export const MAX_CHARS = {
  uint32: 10,
  int32: 11,
  uint64: 20,
  int64: 20,
  // "-" + 21 integer digits (below 1e21 no exponent is used)
  float32: 22,
  // "-0.00000" + 17 significant digits
  float64: 25,
} as const;

/** Significant digits that always round-trip a float32. */
export const FLOAT32_ROUND_TRIP_DIGITS = 9;

const MINUS = 0x2d;
const ZERO = 0x30;

const scratch = new Uint8Array(32);

function overflow(capacity: number): never {
  throw new InvalidValueError(`Formatted number exceeds ${capacity} characters`);
}

/** Fills digits of `magnitude` backward ending at `end`; returns the start index. */
function fillDigits(magnitude: IntegerLike, end: number): number {
  let pos = end;
  if (typeof magnitude === 'number') {
    let v = magnitude;
    do {
      if (pos === 0) overflow(end);
      // units first
      scratch[--pos] = ZERO + (v % 10);
      v = Math.floor(v / 10);
    } while (v !== 0);
  } else {
    let v = magnitude;
    do {
      if (pos === 0) overflow(end);
      scratch[--pos] = ZERO + Number(v % 10n);
      v /= 10n;
    } while (v !== 0n);
  }
  return pos;
}

export function writeUnsigned(sink: OutputSink, value: IntegerLike, width: IntWidth = 64): void {
  const capacity = width === 32 ? MAX_CHARS.uint32 : MAX_CHARS.uint64;
  checkSigned(value, 0n, width === 32 ? BigInt(UINT32_MAX) : UINT64_MAX, 'Unsigned integer');
  const start = fillDigits(value, capacity);
  sink.putn(scratch, start, capacity - start);
}

export function writeSigned(sink: OutputSink, value: IntegerLike, width: IntWidth = 64): void {
  const capacity = width === 32 ? MAX_CHARS.int32 : MAX_CHARS.int64;
  if (width === 32) checkSigned(value, BigInt(INT32_MIN), BigInt(INT32_MAX), 'Signed integer');
  else checkSigned(value, INT64_MIN, INT64_MAX, 'Signed integer');

  // safe integers and bigints both negate without overflow
  const negative = value < 0;
  const magnitude = typeof value === 'bigint' ? (negative ? -value : value) : Math.abs(value);
  let start = fillDigits(magnitude, capacity);
  if (negative) {
    if (start === 0) overflow(capacity);
    scratch[--start] = MINUS;
  }
  sink.putn(scratch, start, capacity - start);
}

function assertFinite(sink: OutputSink, value: number): void {
  if (!Number.isFinite(value)) {
    throw new NonFiniteNumberError(undefined, { byteOffset: sink.outpos() });
  }
}

function writeAscii(sink: OutputSink, text: string, capacity: number): void {
  if (text.length > capacity) overflow(capacity);
  for (let i = 0; i < text.length; i++) scratch[i] = text.charCodeAt(i);
  sink.putn(scratch, 0, text.length);
}

/**
 * Shortest text that reads back as the same double. ECMAScript number
 * formatting is locale-independent, so the decimal point is always '.'.
 */
export function float64Text(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

/** Shortest text that reads back as the same float32 (after `Math.fround`). */
export function float32Text(value: number): string {
  const v = Math.fround(value);
  if (Object.is(v, -0)) return '-0';
  for (let p = 1; p < FLOAT32_ROUND_TRIP_DIGITS; p++) {
    const candidate = Number(v.toPrecision(p));
    if (Math.fround(candidate) === v) return String(candidate);
  }
  return String(Number(v.toPrecision(FLOAT32_ROUND_TRIP_DIGITS)));
}

export function writeFloat64(sink: OutputSink, value: number): void {
  assertFinite(sink, value);
  writeAscii(sink, float64Text(value), MAX_CHARS.float64);
}

/** Rounds to 32-bit first; doubles beyond float32 range become infinite and are rejected. */
export function writeFloat32(sink: OutputSink, value: number): void {
  assertFinite(sink, Math.fround(value));
  writeAscii(sink, float32Text(value), MAX_CHARS.float32);
}

export function writeTaggedNumber(sink: OutputSink, value: JsonNumber): void {
  switch (value.kind) {
    case 'float32':
      writeFloat32(sink, value.asFloat32());
      break;
    case 'float64':
      writeFloat64(sink, value.asFloat64());
      break;
    case 'int':
      writeSigned(sink, value.asInt(), 64);
      break;
    case 'uint':
      writeUnsigned(sink, value.asUint(), 64);
      break;
    default:
      throw new InvalidValueError(`Unknown number kind: ${String(value)}`);
  }
}
