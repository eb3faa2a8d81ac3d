/**
 * Plain value tree to JSON text.
 * Compact output goes through the structured writer; pretty output is laid
 * out directly on the raw emitter, since separators must precede line breaks.
 */

import { resolveWriterOptions, type WriterOptions } from './config.js';
import { InvalidValueError, StructuralViolationError } from './errors.js';
import { RawJsonWriter } from './raw-writer.js';
import { BufferSink } from './sink.js';
import { isJsonArray, isJsonObject, type JsonValue } from './value.js';
import { JsonWriter } from './writer.js';

export interface StringifyOptions extends WriterOptions {
  /** Spaces per nesting level for pretty-print (default 0: single line) */
  indent?: number;
}

/**
 * Stream a value tree into `writer` at its current position. Any position
 * where a value may start is valid, including right after `writeKey`.
 */
export function writeDocument(writer: JsonWriter, value: JsonValue): void {
  if (isJsonArray(value)) {
    writer.startArray();
    for (const item of value) writeDocument(writer, item);
    writer.endArray();
  } else if (isJsonObject(value)) {
    writer.startObject();
    for (const [key, item] of Object.entries(value)) {
      writer.writeKey(key);
      writeDocument(writer, item);
    }
    writer.endObject();
  } else {
    writer.writeValue(value);
  }
}

function writePretty(
  raw: RawJsonWriter,
  value: JsonValue,
  indent: number,
  level: number,
  maxDepth: number
): void {
  let entries: [string | null, JsonValue][];
  let array: boolean;
  if (isJsonArray(value)) {
    entries = [];
    // holes in sparse arrays are written as null, as in compact mode
    for (let i = 0; i < value.length; i++) entries.push([null, value[i]]);
    array = true;
  } else if (isJsonObject(value)) {
    entries = Object.entries(value);
    array = false;
  } else {
    raw.write(value);
    return;
  }
  if (level >= maxDepth) {
    throw new StructuralViolationError('Maximum nesting depth exceeded', {
      byteOffset: raw.outpos(),
    });
  }

  if (array) raw.writeStartArray();
  else raw.writeStartObject();
  entries.forEach(([key, item], i) => {
    if (i > 0) raw.writeItemSeparator();
    raw.writeNewline();
    raw.writeWhitespace(indent * (level + 1));
    if (key !== null) {
      raw.writeString(key);
      raw.writeKeySeparator();
      raw.writeWhitespace(1);
    }
    writePretty(raw, item, indent, level + 1, maxDepth);
  });
  if (entries.length > 0) {
    raw.writeNewline();
    raw.writeWhitespace(indent * level);
  }
  if (array) raw.writeEndArray();
  else raw.writeEndObject();
}

/**
 * Serialize a value tree to JSON text.
 */
export function stringify(value: JsonValue, options: StringifyOptions = {}): string {
  const { indent = 0, ...writerOptions } = options;
  if (!Number.isSafeInteger(indent) || indent < 0) {
    throw new InvalidValueError(`indent must be a non-negative integer, got ${indent}`);
  }
  const sink = new BufferSink();
  if (indent > 0) {
    const { maxDepth } = resolveWriterOptions(writerOptions);
    writePretty(new RawJsonWriter(sink), value, indent, 0, maxDepth);
  } else {
    const writer = new JsonWriter(sink, writerOptions);
    writeDocument(writer, value);
    writer.close();
  }
  return sink.toString();
}
