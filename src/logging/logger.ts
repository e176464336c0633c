/**
 * Winston logger creation.
 */

import * as winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  /** Suppresses all output; used by tests. */
  silent?: boolean;
  /** Colorized single-line output instead of JSON. */
  pretty?: boolean;
}

function resolveLevel(level: string | undefined): string {
  if (level) return level;
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

export function createLogger(options: LoggerOptions = {}): Logger {
  const pretty = options.pretty ?? process.env.NODE_ENV === 'development';
  return winston.createLogger({
    level: resolveLevel(options.level),
    silent: options.silent ?? false,
    defaultMeta: { service: 'lineproto-exporter' },
    format: pretty ? prettyFormat : jsonFormat,
    transports: [new winston.transports.Console()],
  });
}
