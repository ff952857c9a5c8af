import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** Append records to this file as well. Empty means console only. */
  file?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'info';
  const targets: TransportTargetOptions[] = [
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', level, options: { colorize: true } }
      : { target: 'pino/file', level, options: { destination: 1 } },
  ];
  if (options.file) {
    targets.push({ target: 'pino/file', level, options: { destination: options.file, mkdir: true } });
  }

  return pino({
    level,
    transport: { targets },
    redact: {
      paths: ['password', 'secret', 'token', '*.password', '*.token'],
      censor: '***REDACTED***',
    },
  });
}

export const logger = createLogger();
