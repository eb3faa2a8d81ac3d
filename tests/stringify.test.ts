import { describe, expect, it } from 'vitest';
import {
  InvalidValueError,
  NonFiniteNumberError,
  StructuralViolationError,
} from '../src/errors.js';
import { JsonNumber } from '../src/number.js';
import { BufferSink } from '../src/sink.js';
import { stringify, writeDocument } from '../src/stringify.js';
import { JsonWriter } from '../src/writer.js';

describe('stringify', () => {
  it('writes compact JSON by default', () => {
    expect(stringify({ a: 1, b: [true, null, 'x'], c: {} })).toBe(
      '{"a":1,"b":[true,null,"x"],"c":{}}'
    );
  });

  it('writes scalars and the extra number categories', () => {
    expect(stringify('hi')).toBe('"hi"');
    expect(stringify([1n, JsonNumber.float32(0.1), new Uint8Array([0x41])])).toBe('[1,0.1,"A"]');
    expect(stringify({ a: undefined })).toBe('{"a":null}');
  });

  it('indents one child per line', () => {
    const value = { a: 1, b: [1, 2], c: [], d: { e: 'f' } };
    const expected = [
      '{',
      '  "a": 1,',
      '  "b": [',
      '    1,',
      '    2',
      '  ],',
      '  "c": [],',
      '  "d": {',
      '    "e": "f"',
      '  }',
      '}',
    ].join('\n');
    expect(stringify(value, { indent: 2 })).toBe(expected);
    expect(stringify(value, { indent: 2 })).toBe(JSON.stringify(value, null, 2));
  });

  it('writes holes in sparse arrays as null in both modes', () => {
    const sparse = [, 1];
    expect(stringify(sparse)).toBe('[null,1]');
    expect(stringify(sparse, { indent: 2 })).toBe('[\n  null,\n  1\n]');
    expect(JSON.parse(stringify(sparse, { indent: 2 }))).toEqual([null, 1]);
  });

  it('rejects an indent that is not a non-negative integer', () => {
    expect(() => stringify({ a: 1 }, { indent: 1.5 })).toThrow(InvalidValueError);
    expect(() => stringify({ a: 1 }, { indent: -2 })).toThrow(
      'indent must be a non-negative integer, got -2'
    );
  });

  it('applies the depth limit in both modes', () => {
    expect(() => stringify([[[]]], { maxDepth: 2 })).toThrow(StructuralViolationError);
    expect(() => stringify([[[]]], { maxDepth: 2, indent: 2 })).toThrow(StructuralViolationError);
    expect(stringify([[]], { maxDepth: 2 })).toBe('[[]]');
  });

  it('rejects non-finite numbers', () => {
    expect(() => stringify({ n: NaN })).toThrow(NonFiniteNumberError);
  });
});

describe('writeDocument', () => {
  it('streams a tree after a key', () => {
    const sink = new BufferSink();
    const w = new JsonWriter(sink);
    w.startObject();
    w.writeKeyValue('first', 0);
    w.writeKey('k');
    writeDocument(w, [1, { x: 'y' }]);
    w.endObject();
    expect(sink.toString()).toBe('{"first":0,"k":[1,{"x":"y"}]}');
    expect(w.isComplete()).toBe(true);
  });
});
