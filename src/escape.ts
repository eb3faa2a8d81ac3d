/**
 * JSON string escaping from a {@link CharSource} straight into a sink.
 * Only the seven short escapes are produced; every other byte is copied as is.
 */

import type { OutputSink } from './sink.js';
import type { CharSource } from './source.js';

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

/** Second byte of the escape for each escaped input byte, 0 if none. */
const ESCAPES = new Uint8Array(0x60);
ESCAPES[0x08] = 0x62; // \b
ESCAPES[0x0c] = 0x66; // \f
ESCAPES[0x0a] = 0x6e; // \n
ESCAPES[0x0d] = 0x72; // \r
ESCAPES[0x09] = 0x74; // \t
ESCAPES[QUOTE] = QUOTE;
ESCAPES[BACKSLASH] = BACKSLASH;

function escapeFor(byte: number): number {
  return byte < ESCAPES.length ? ESCAPES[byte] ?? 0 : 0;
}

export function writeEscaped(sink: OutputSink, source: CharSource, quoted = true): void {
  if (quoted) sink.put(QUOTE);
  while (!source.end()) {
    const c = source.take();
    const e = escapeFor(c);
    if (e !== 0) {
      sink.put(BACKSLASH);
      sink.put(e);
    } else {
      sink.put(c);
    }
  }
  if (quoted) sink.put(QUOTE);
}
