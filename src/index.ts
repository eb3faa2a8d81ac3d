export { JsonWriter, type DocNode, type DocNodeKind, type JsonKey } from './writer.js';
export { RawJsonWriter } from './raw-writer.js';
export { BufferSink, FdSink, type FdSinkOptions, type OutputSink } from './sink.js';
export { BytesSource, StringSource, type CharSource } from './source.js';
export { writeEscaped } from './escape.js';
export {
  FLOAT32_ROUND_TRIP_DIGITS,
  MAX_CHARS,
  float32Text,
  float64Text,
  writeFloat32,
  writeFloat64,
  writeSigned,
  writeTaggedNumber,
  writeUnsigned,
  type IntWidth,
} from './format-number.js';
export {
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  JsonNumber,
  UINT32_MAX,
  UINT64_MAX,
  type IntegerLike,
  type NumberKind,
} from './number.js';
export {
  classifyScalar,
  isJsonArray,
  isJsonObject,
  isJsonScalar,
  type ClassifiedScalar,
  type JsonArray,
  type JsonObject,
  type JsonScalar,
  type JsonValue,
} from './value.js';
export { stringify, writeDocument, type StringifyOptions } from './stringify.js';
export {
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_DEPTH,
  resolveLogLevel,
  resolveWriterOptions,
  type LogLevel,
  type ResolvedWriterOptions,
  type WriterOptions,
} from './config.js';
export { resetLogger, setLogLevel } from './logger.js';
export {
  InvalidValueError,
  JsonWriterError,
  NonFiniteNumberError,
  NullKeyError,
  SinkError,
  StructuralViolationError,
} from './errors.js';
