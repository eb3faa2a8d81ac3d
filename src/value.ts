/**
 * Value categories the writers accept, and the plain value tree used by
 * `stringify`.
 */

import { InvalidValueError, NonFiniteNumberError } from './errors.js';
import { INT64_MAX, INT64_MIN, JsonNumber, checkSigned } from './number.js';

/**
 * Closed set of scalars:
 * number is a double, bigint a signed 64-bit integer, Uint8Array a string
 * given as raw bytes, undefined is written as null.
 */
export type JsonScalar =
  | number
  | bigint
  | JsonNumber
  | boolean
  | string
  | Uint8Array
  | null
  | undefined;

export type JsonValue = JsonScalar | JsonObject | JsonArray;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

/** A scalar tagged with its category; resolved once per write. */
export type ClassifiedScalar =
  | { category: 'null' }
  | { category: 'double'; value: number }
  | { category: 'int'; value: bigint }
  | { category: 'number'; value: JsonNumber }
  | { category: 'bool'; value: boolean }
  | { category: 'string'; value: string }
  | { category: 'bytes'; value: Uint8Array };

function assertFinite(value: number, byteOffset: number | undefined): void {
  if (!Number.isFinite(value)) throw new NonFiniteNumberError(undefined, { byteOffset });
}

/**
 * Resolves the category of a scalar and checks that it can be encoded, so
 * that a rejected value is caught before anything reaches the sink.
 * `byteOffset` is the sink position recorded on the error.
 */
export function classifyScalar(value: JsonScalar, byteOffset?: number): ClassifiedScalar {
  if (value === null || value === undefined) return { category: 'null' };
  switch (typeof value) {
    case 'number':
      assertFinite(value, byteOffset);
      return { category: 'double', value };
    case 'bigint':
      checkSigned(value, INT64_MIN, INT64_MAX, 'Signed integer', byteOffset);
      return { category: 'int', value };
    case 'boolean':
      return { category: 'bool', value };
    case 'string':
      return { category: 'string', value };
  }
  if (value instanceof JsonNumber) {
    if (value.isFloat()) assertFinite(value.toNumber(), byteOffset);
    return { category: 'number', value };
  }
  if (value instanceof Uint8Array) return { category: 'bytes', value };
  throw new InvalidValueError(`Unsupported value of type ${typeof value}`, { byteOffset });
}

export function isJsonScalar(v: JsonValue): v is JsonScalar {
  return (
    v === null ||
    typeof v !== 'object' ||
    v instanceof JsonNumber ||
    v instanceof Uint8Array
  );
}

export function isJsonArray(v: JsonValue): v is JsonArray {
  return Array.isArray(v);
}

/** Type guard for object (and not array or one of the object-shaped scalars) */
export function isJsonObject(v: JsonValue): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v) && !isJsonScalar(v);
}
