/**
 * Structured JSON writer. Tracks open containers on a node stack, rejects
 * operations the JSON grammar does not allow at that point, and inserts the
 * `,` and `:` separators.
 */

import { resolveWriterOptions, type WriterOptions } from './config.js';
import { NullKeyError, StructuralViolationError } from './errors.js';
import { log } from './logger.js';
import { RawJsonWriter } from './raw-writer.js';
import type { OutputSink } from './sink.js';
import { classifyScalar, type JsonScalar } from './value.js';

export type DocNodeKind = 'root' | 'object' | 'array' | 'key';

export interface DocNode {
  readonly kind: DocNodeKind;
  hasChildren: boolean;
}

export type JsonKey = string | Uint8Array;

/** What an operation is about to add; `value` is never pushed. */
type Rule = 'object' | 'array' | 'key' | 'value';

export class JsonWriter {
  readonly rawWriter: RawJsonWriter;
  private readonly maxDepth: number;
  // nodes below `top`; the root is never popped
  private readonly parents: DocNode[] = [];
  private top: DocNode = { kind: 'root', hasChildren: false };
  private containers = 0;
  private closed = false;

  constructor(sink: OutputSink, options: WriterOptions = {}) {
    this.rawWriter = new RawJsonWriter(sink);
    this.maxDepth = resolveWriterOptions(options).maxDepth;
  }

  /**
   * Kind of the innermost open node. After `startObject()` this is `object`
   * until the matching `endObject()` or a nested start.
   */
  parentNode(): DocNodeKind {
    return this.top.kind;
  }

  /** Number of open objects and arrays. */
  depth(): number {
    return this.containers;
  }

  /** True once the root value has been fully written. */
  isComplete(): boolean {
    return this.parents.length === 0 && this.top.hasChildren;
  }

  startObject(): void {
    this.assertRule('object');
    this.writeSeparator();
    this.rawWriter.writeStartObject();
    this.push('object');
  }

  startArray(): void {
    this.assertRule('array');
    this.writeSeparator();
    this.rawWriter.writeStartArray();
    this.push('array');
  }

  endObject(): void {
    this.assertEnd('object');
    this.rawWriter.writeEndObject();
    this.popContainer();
  }

  endArray(): void {
    this.assertEnd('array');
    this.rawWriter.writeEndArray();
    this.popContainer();
  }

  writeKey(key: JsonKey | null | undefined): void {
    if (key === null || key === undefined) throw new NullKeyError(undefined, this.at());
    this.assertRule('key');
    this.writeSeparator();
    this.rawWriter.writeString(key);
    // the pair completes with the next value
    this.push('key');
  }

  writeValue(value: JsonScalar): void {
    const scalar = classifyScalar(value, this.outpos());
    this.assertRule('value');
    this.writeSeparator();
    this.rawWriter.writeClassified(scalar);
    this.completeChild();
  }

  writeKeyValue(entry: readonly [JsonKey, JsonScalar]): void;
  writeKeyValue(key: JsonKey | null | undefined, value: JsonScalar): void;
  writeKeyValue(
    keyOrEntry: JsonKey | null | undefined | readonly [JsonKey, JsonScalar],
    value?: JsonScalar
  ): void {
    let key: JsonKey | null | undefined;
    if (
      keyOrEntry === null ||
      keyOrEntry === undefined ||
      typeof keyOrEntry === 'string' ||
      keyOrEntry instanceof Uint8Array
    ) {
      key = keyOrEntry;
    } else {
      [key, value] = keyOrEntry;
    }
    if (key === null || key === undefined) throw new NullKeyError(undefined, this.at());
    const scalar = classifyScalar(value, this.outpos());
    this.assertRule('key');

    if (this.top.hasChildren) this.rawWriter.writeItemSeparator();
    this.rawWriter.writeString(key);
    this.rawWriter.writeKeySeparator();
    this.rawWriter.writeClassified(scalar);
    this.top.hasChildren = true;
  }

  writeNewline(): void {
    this.assertOpen();
    this.rawWriter.writeNewline();
  }

  writeWhitespace(count: number): void {
    this.assertOpen();
    this.rawWriter.writeWhitespace(count);
  }

  outpos(): number {
    return this.rawWriter.outpos();
  }

  /**
   * Flush the sink and stop accepting writes. Flush failures propagate.
   * Closing an incomplete document is allowed but logged.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.isComplete()) {
      log.warn('Closing an incomplete JSON document', {
        depth: this.containers,
        outpos: this.outpos(),
      });
    }
    try {
      this.rawWriter.sink.flush();
    } catch (err) {
      log.error('Final flush failed', { error: String(err) });
      throw err;
    }
    log.debug('Writer closed', { outpos: this.outpos() });
  }

  private at(): { byteOffset: number } {
    return { byteOffset: this.outpos() };
  }

  private violation(message: string): StructuralViolationError {
    return new StructuralViolationError(message, this.at());
  }

  private assertOpen(): void {
    if (this.closed) throw this.violation('Writer is closed');
  }

  private assertRule(rule: Rule): void {
    this.assertOpen();
    const { kind, hasChildren } = this.top;
    if (rule === 'key') {
      if (kind !== 'object') throw this.violation(`Cannot write a key inside ${kind}`);
      return;
    }
    if (kind === 'object') throw this.violation(`Expected a key before ${rule} inside object`);
    if (kind === 'root' && hasChildren) throw this.violation('Multiple root values');
    if (rule !== 'value' && this.containers >= this.maxDepth) {
      throw this.violation('Maximum nesting depth exceeded');
    }
  }

  private assertEnd(kind: 'object' | 'array'): void {
    this.assertOpen();
    if (this.top.kind !== kind) {
      throw this.violation(`Cannot end ${kind} while inside ${this.top.kind}`);
    }
  }

  private writeSeparator(): void {
    if (this.top.hasChildren) {
      switch (this.top.kind) {
        case 'object':
        case 'array':
          this.rawWriter.writeItemSeparator();
          break;
        case 'root':
          throw this.violation('Multiple root values');
        case 'key':
          break;
      }
    } else if (this.top.kind === 'key') {
      // key node is popped before it can have children
      this.rawWriter.writeKeySeparator();
    }
  }

  private push(kind: DocNodeKind): void {
    this.parents.push(this.top);
    this.top = { kind, hasChildren: false };
    if (kind !== 'key') this.containers++;
  }

  private pop(): void {
    const parent = this.parents.pop();
    if (!parent) throw this.violation('Root node cannot be closed');
    this.top = parent;
  }

  private popContainer(): void {
    this.pop();
    this.containers--;
    this.completeChild();
  }

  private completeChild(): void {
    if (this.top.kind === 'key') this.pop();
    this.top.hasChildren = true;
  }
}
