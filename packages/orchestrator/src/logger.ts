import pino from 'pino';

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return isTest ? 'silent' : 'info';
}

/**
 * Structured logger. Every event carries a message and an optional context
 * object (`event`, `sessionId`, `stage`, ...) so production output stays
 * queryable JSON.
 */
export class Logger {
  private pino: pino.Logger;

  constructor(options: LoggerOptions = {}) {
    const pretty = options.pretty ?? (!isProduction && !isTest);
    this.pino = pino({
      level: options.level ?? defaultLevel(),
      base: { service: 'orchestrator' },
      transport: pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
    });
  }

  info(message: string, context?: LogContext): void {
    if (context) this.pino.info(context, message);
    else this.pino.info(message);
  }

  warn(message: string, context?: LogContext): void {
    if (context) this.pino.warn(context, message);
    else this.pino.warn(message);
  }

  error(message: string, context?: LogContext): void {
    if (context) this.pino.error(context, message);
    else this.pino.error(message);
  }

  debug(message: string, context?: LogContext): void {
    if (context) this.pino.debug(context, message);
    else this.pino.debug(message);
  }
}

export const logger = new Logger();
