/**
 * Tagged numeric value: exactly one of a 32/64-bit float or a 64-bit
 * signed/unsigned integer. Ranges are checked when the value is built.
 */

import { InvalidValueError } from './errors.js';

export type NumberKind = 'float32' | 'float64' | 'int' | 'uint';

export const INT32_MIN = -0x8000_0000;
export const INT32_MAX = 0x7fff_ffff;
export const UINT32_MAX = 0xffff_ffff;
export const INT64_MIN = -0x8000_0000_0000_0000n;
export const INT64_MAX = 0x7fff_ffff_ffff_ffffn;
export const UINT64_MAX = 0xffff_ffff_ffff_ffffn;

/** Integer given as a JS number (must be a safe integer) or a bigint. */
export type IntegerLike = number | bigint;

function toBigInt(value: IntegerLike, what: string, byteOffset?: number): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidValueError(`${what} must be a safe integer or a bigint, got ${value}`, {
      byteOffset,
    });
  }
  return BigInt(value);
}

export function checkSigned(
  value: IntegerLike,
  min: bigint,
  max: bigint,
  what: string,
  byteOffset?: number
): void {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= min && value <= max) return;
  const big = toBigInt(value, what, byteOffset);
  if (big < min || big > max) {
    throw new InvalidValueError(`${what} out of range: ${big}`, { byteOffset });
  }
}

export class JsonNumber {
  private constructor(
    readonly kind: NumberKind,
    private readonly float: number,
    private readonly integer: bigint
  ) {}

  /** Stores `Math.fround(value)`. */
  static float32(value: number): JsonNumber {
    return new JsonNumber('float32', Math.fround(value), 0n);
  }

  static float64(value: number): JsonNumber {
    return new JsonNumber('float64', value, 0n);
  }

  static int(value: IntegerLike): JsonNumber {
    checkSigned(value, INT64_MIN, INT64_MAX, 'Signed integer');
    return new JsonNumber('int', 0, BigInt(value));
  }

  static uint(value: IntegerLike): JsonNumber {
    checkSigned(value, 0n, UINT64_MAX, 'Unsigned integer');
    return new JsonNumber('uint', 0, BigInt(value));
  }

  isFloat(): boolean {
    return this.kind === 'float32' || this.kind === 'float64';
  }

  asFloat32(): number {
    return this.expect('float32', this.float);
  }

  asFloat64(): number {
    return this.expect('float64', this.float);
  }

  asInt(): bigint {
    return this.expect('int', this.integer);
  }

  asUint(): bigint {
    return this.expect('uint', this.integer);
  }

  /** Value converted to a JS number; 64-bit integers may lose precision. */
  toNumber(): number {
    return this.isFloat() ? this.float : Number(this.integer);
  }

  toString(): string {
    return this.isFloat() ? String(this.float) : this.integer.toString();
  }

  private expect<T>(kind: NumberKind, value: T): T {
    if (this.kind !== kind) {
      throw new InvalidValueError(`Number holds ${this.kind}, not ${kind}`);
    }
    return value;
  }
}
