/**
 * JSON writer errors. Each carries the sink position at which it was detected.
 */

type ConstructorOptions = { byteOffset?: number; cause?: unknown };

export class JsonWriterError extends Error {
  override readonly name: string = 'JsonWriterError';
  readonly byteOffset?: number;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.byteOffset = options?.byteOffset;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, JsonWriterError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.byteOffset !== undefined) {
      return `byte offset ${this.byteOffset}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

/** Operation not allowed by the JSON grammar in the writer's current state. */
export class StructuralViolationError extends JsonWriterError {
  override readonly name = 'StructuralViolationError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, StructuralViolationError.prototype);
  }
}

export class NullKeyError extends JsonWriterError {
  override readonly name = 'NullKeyError';
  constructor(message = 'Key is null', options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, NullKeyError.prototype);
  }
}

/** NaN and infinities have no JSON token. */
export class NonFiniteNumberError extends JsonWriterError {
  override readonly name = 'NonFiniteNumberError';
  constructor(message = 'Value is NaN or infinity', options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, NonFiniteNumberError.prototype);
  }
}

export class InvalidValueError extends JsonWriterError {
  override readonly name = 'InvalidValueError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, InvalidValueError.prototype);
  }
}

/** Thrown by sinks; writers let it through untouched. */
export class SinkError extends JsonWriterError {
  override readonly name = 'SinkError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, SinkError.prototype);
  }
}
