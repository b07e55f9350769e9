// .env must be loaded before the level is read below
import 'dotenv/config';
import winston from 'winston';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? 'info';
}

const rawLevel = process.env.LOG_LEVEL;

const baseLogger = winston.createLogger({
  level: resolveLevel(rawLevel),
  silent: rawLevel === 'silent',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
      const tag = typeof module === 'string' ? ` [${module}]` : '';
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} ${level}${tag}: ${String(message)}${extra}`;
    })
  ),
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;

/**
 * Create a logger whose entries are tagged with the module name.
 *
 * @example
 * const logger = createModuleLogger('indexer');
 * logger.info('Starting indexing run...');
 */
export function createModuleLogger(module: string): Logger {
  return baseLogger.child({ module });
}
