import winston from 'winston';
import { resolveLogLevel, type LogLevel } from './config.js';

let logger: winston.Logger | null = null;
let levelOverride: LogLevel | null = null;

function createLogger(): winston.Logger {
  return winston.createLogger({
    level: levelOverride ?? resolveLogLevel(),
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss',
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack }) => {
        const prefix = `[${String(timestamp)}] [json-writer] [${level.toUpperCase()}]`;
        if (stack) {
          return `${prefix} ${String(message)}\n${String(stack)}`;
        }
        return `${prefix} ${String(message)}`;
      })
    ),
    transports: [new winston.transports.Console()],
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

type Meta = Record<string, unknown>;

export const log = {
  error: (message: string, meta?: Meta) => getLogger().error(message, meta),
  warn: (message: string, meta?: Meta) => getLogger().warn(message, meta),
  info: (message: string, meta?: Meta) => getLogger().info(message, meta),
  debug: (message: string, meta?: Meta) => getLogger().debug(message, meta),
};

export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  if (logger) logger.level = level;
}

export function resetLogger(): void {
  logger = null;
  levelOverride = null;
}
