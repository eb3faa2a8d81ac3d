import { describe, expect, it } from 'vitest';
import { InvalidValueError, NonFiniteNumberError } from '../src/errors.js';
import {
  MAX_CHARS,
  float32Text,
  float64Text,
  writeFloat32,
  writeFloat64,
  writeSigned,
  writeTaggedNumber,
  writeUnsigned,
} from '../src/format-number.js';
import {
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  JsonNumber,
  UINT32_MAX,
  UINT64_MAX,
} from '../src/number.js';
import { BufferSink } from '../src/sink.js';

function text(fn: (sink: BufferSink) => void): string {
  const sink = new BufferSink();
  fn(sink);
  return sink.toString();
}

describe('integers', () => {
  it('formats zero without a sign', () => {
    expect(text((s) => writeUnsigned(s, 0))).toBe('0');
    expect(text((s) => writeSigned(s, 0))).toBe('0');
    expect(text((s) => writeSigned(s, -0))).toBe('0');
    expect(text((s) => writeSigned(s, 0n))).toBe('0');
  });

  it('formats the edges of each width', () => {
    expect(text((s) => writeUnsigned(s, UINT32_MAX, 32))).toBe('4294967295');
    expect(text((s) => writeSigned(s, INT32_MIN, 32))).toBe('-2147483648');
    expect(text((s) => writeSigned(s, INT32_MAX, 32))).toBe('2147483647');
    expect(text((s) => writeUnsigned(s, UINT64_MAX))).toBe('18446744073709551615');
    expect(text((s) => writeSigned(s, INT64_MIN))).toBe('-9223372036854775808');
    expect(text((s) => writeSigned(s, INT64_MAX))).toBe('9223372036854775807');
  });

  it('formats ordinary values', () => {
    expect(text((s) => writeSigned(s, -42))).toBe('-42');
    expect(text((s) => writeUnsigned(s, 1000))).toBe('1000');
    expect(text((s) => writeSigned(s, Number.MIN_SAFE_INTEGER))).toBe('-9007199254740991');
  });

  it('reads back to the same value', () => {
    const values = [0n, 7n, -7n, 10n, -1000000n, INT64_MIN, INT64_MAX, 123456789012345678n];
    for (const v of values) {
      const out = text((s) => writeSigned(s, v));
      expect(BigInt(out)).toBe(v);
      expect(text((s) => writeSigned(s, BigInt(out)))).toBe(out);
    }
  });

  it('rejects values outside the width', () => {
    expect(() => writeUnsigned(new BufferSink(), UINT32_MAX + 1, 32)).toThrow(InvalidValueError);
    expect(() => writeUnsigned(new BufferSink(), -1)).toThrow(InvalidValueError);
    expect(() => writeSigned(new BufferSink(), INT32_MAX + 1, 32)).toThrow(InvalidValueError);
    expect(() => writeSigned(new BufferSink(), INT64_MAX + 1n)).toThrow(InvalidValueError);
    expect(() => writeUnsigned(new BufferSink(), UINT64_MAX + 1n)).toThrow(InvalidValueError);
  });

  it('rejects non-integral and unsafe numbers', () => {
    expect(() => writeSigned(new BufferSink(), 1.5)).toThrow(InvalidValueError);
    expect(() => writeSigned(new BufferSink(), 2 ** 53)).toThrow(InvalidValueError);
    expect(text((s) => writeSigned(s, BigInt(2 ** 53)))).toBe('9007199254740992');
  });

  it('writes only the digits', () => {
    const sink = new BufferSink();
    writeSigned(sink, -5);
    writeUnsigned(sink, 12);
    expect(sink.outpos()).toBe(4);
    expect(sink.toString()).toBe('-512');
  });
});

describe('doubles', () => {
  it('uses the shortest round-trip form', () => {
    expect(float64Text(0.1)).toBe('0.1');
    expect(float64Text(1)).toBe('1');
    expect(float64Text(-1.5)).toBe('-1.5');
    expect(float64Text(123.456)).toBe('123.456');
    expect(float64Text(1234567.5)).toBe('1234567.5');
    expect(float64Text(Number.MAX_VALUE)).toBe('1.7976931348623157e+308');
    expect(float64Text(5e-324)).toBe('5e-324');
  });

  it('uses an exponent only for very large or small magnitudes', () => {
    expect(float64Text(1e20)).toBe('100000000000000000000');
    expect(float64Text(1e21)).toBe('1e+21');
    expect(float64Text(0.000001)).toBe('0.000001');
    expect(float64Text(1e-7)).toBe('1e-7');
  });

  it('keeps the sign of negative zero', () => {
    expect(text((s) => writeFloat64(s, -0))).toBe('-0');
    expect(text((s) => writeFloat64(s, 0))).toBe('0');
  });

  it('is stable across a parse and re-format', () => {
    const values = [0.1, 1 / 3, Math.PI, -2.5e-8, 6.02214076e23, 9007199254740993, -1.2345678901234567e-6];
    for (const v of values) {
      const out = float64Text(v);
      expect(Number(out)).toBe(v);
      expect(float64Text(Number(out))).toBe(out);
      expect(out.length).toBeLessThanOrEqual(MAX_CHARS.float64);
    }
  });

  it('rejects NaN and infinities without writing', () => {
    for (const v of [NaN, Infinity, -Infinity]) {
      const sink = new BufferSink();
      expect(() => writeFloat64(sink, v)).toThrow(NonFiniteNumberError);
      expect(sink.outpos()).toBe(0);
    }
  });
});

describe('floats', () => {
  it('uses the fewest digits that round-trip at 32 bits', () => {
    expect(float32Text(0.1)).toBe('0.1');
    expect(float32Text(1.5)).toBe('1.5');
    expect(float32Text(1 / 3)).toBe('0.33333334');
    expect(float32Text(16777216)).toBe('16777216');
    expect(float32Text(3.4028234663852886e38)).toBe('3.4028235e+38');
    expect(float32Text(-0)).toBe('-0');
  });

  it('is stable across a parse and re-format', () => {
    const values = [0.1, 1 / 3, Math.PI, -2.5e-8, 65504, 1.17549435e-38];
    for (const v of values) {
      const out = float32Text(v);
      expect(Math.fround(Number(out))).toBe(Math.fround(v));
      expect(float32Text(Number(out))).toBe(out);
      expect(out.length).toBeLessThanOrEqual(MAX_CHARS.float32);
    }
  });

  it('rejects values that overflow 32 bits', () => {
    const sink = new BufferSink();
    expect(() => writeFloat32(sink, 1e39)).toThrow(NonFiniteNumberError);
    expect(() => writeFloat32(sink, NaN)).toThrow(NonFiniteNumberError);
    expect(sink.outpos()).toBe(0);
  });

  it('writes through the sink', () => {
    expect(text((s) => writeFloat32(s, 0.25))).toBe('0.25');
  });
});

describe('tagged numbers', () => {
  it('dispatches on the active kind', () => {
    expect(text((s) => writeTaggedNumber(s, JsonNumber.float32(0.1)))).toBe('0.1');
    expect(text((s) => writeTaggedNumber(s, JsonNumber.float64(0.1)))).toBe(
      '0.1'
    );
    expect(text((s) => writeTaggedNumber(s, JsonNumber.int(-3)))).toBe('-3');
    expect(text((s) => writeTaggedNumber(s, JsonNumber.uint(UINT64_MAX)))).toBe(
      '18446744073709551615'
    );
  });

  it('rejects a non-finite float', () => {
    expect(() => writeTaggedNumber(new BufferSink(), JsonNumber.float64(NaN))).toThrow(
      NonFiniteNumberError
    );
  });
});
