import pino from 'pino';
import { config } from '../config';

const baseLogger = pino({
  level: config.nodeEnv === 'test' ? 'silent' : config.logLevel,
  base: { service: 'membership-gate' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Fold trailing arguments into one pino object: errors go under `err` so the
 * standard serializer keeps their stack, plain objects are merged, anything
 * else is kept under `args`.
 */
function toFields(args: unknown[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  const extra: unknown[] = [];

  for (const arg of args) {
    if (arg instanceof Error) {
      fields.err = arg;
    } else if (arg !== null && typeof arg === 'object' && !Array.isArray(arg)) {
      Object.assign(fields, arg);
    } else if (arg !== undefined) {
      extra.push(arg);
    }
  }

  if (extra.length > 0) {
    fields.args = extra;
  }
  return fields;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  baseLogger[level](toFields(args), message);
}

export const logger = {
  debug: (message: string, ...args: unknown[]): void => write('debug', message, args),
  info: (message: string, ...args: unknown[]): void => write('info', message, args),
  warn: (message: string, ...args: unknown[]): void => write('warn', message, args),
  error: (message: string, ...args: unknown[]): void => write('error', message, args),
};
