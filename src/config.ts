/**
 * Writer configuration. Explicit options win over the environment, which
 * wins over the defaults.
 *
 * Environment variables:
 * - JSON_WRITER_MAX_DEPTH: maximum container nesting (default 256)
 * - JSON_WRITER_LOG_LEVEL: winston log level (default "warn")
 */

import { InvalidValueError } from './errors.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

export interface WriterOptions {
  /** Max nesting depth of objects and arrays (default 256) */
  maxDepth?: number;
}

export interface ResolvedWriterOptions {
  maxDepth: number;
}

export const DEFAULT_MAX_DEPTH = 256;
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

type Env = Record<string, string | undefined>;

function parseDepth(raw: string | number, source: string): number {
  const n = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidValueError(`${source} must be a positive integer, got ${String(raw)}`);
  }
  return n;
}

export function resolveWriterOptions(
  options: WriterOptions = {},
  env: Env = process.env
): ResolvedWriterOptions {
  if (options.maxDepth !== undefined) {
    return { maxDepth: parseDepth(options.maxDepth, 'maxDepth') };
  }
  const fromEnv = env.JSON_WRITER_MAX_DEPTH;
  if (fromEnv !== undefined && fromEnv !== '') {
    return { maxDepth: parseDepth(fromEnv, 'JSON_WRITER_MAX_DEPTH') };
  }
  return { maxDepth: DEFAULT_MAX_DEPTH };
}

function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

/** Unknown values fall back to the default level. */
export function resolveLogLevel(env: Env = process.env): LogLevel {
  const raw = env.JSON_WRITER_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}
