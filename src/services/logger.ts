import { pino } from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

function resolveLevel(): LogLevel {
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

const rootLogger = pino({
  name: 'upgrade-fs-toolkit',
  level: resolveLevel(),
});

/**
 * Create a logger scoped to one component. Every line carries `component`.
 */
export function createLogger(component: string): Logger {
  const child = rootLogger.child({ component });

  return {
    debug(message, context) {
      child.debug(context ?? {}, message);
    },
    info(message, context) {
      child.info(context ?? {}, message);
    },
    warn(message, context) {
      child.warn(context ?? {}, message);
    },
    error(message, error, context) {
      child.error({ ...context, err: error }, message);
    },
  };
}
