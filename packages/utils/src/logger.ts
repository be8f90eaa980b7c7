/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Credentials never reach the output: token and authorization fields are redacted.
 */

import { destination, pino, type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

export const REDACTED_PATHS = [
  'token',
  '*.token',
  'authorization',
  '*.authorization',
  'headers.authorization',
  'headers.Authorization',
];

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: REDACTED_PATHS,
    censor: '[redacted]',
  },
  base: {
    service: 'packpub',
    env: NODE_ENV,
  },
};

// stdout belongs to command output, logs go to stderr
export const logger = NODE_ENV === 'development'
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, destination(2));

export type Logger = typeof logger;

// weak so short-lived children can be collected
const children = new Set<WeakRef<Logger>>();

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  const child = logger.child(context);
  children.add(new WeakRef(child));
  return child;
}

/**
 * Change the level of the root logger and every child created so far
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const ref of children) {
    const child = ref.deref();
    if (child) {
      child.level = level;
    } else {
      children.delete(ref);
    }
  }
}
