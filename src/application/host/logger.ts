/**
 * spanline - Logger
 *
 * Logging port used by the collector, sinks and pipeline host, with a pino
 * implementation as the default.
 */

import pino, { DestinationStream, Logger as PinoInstance } from 'pino';
import { LOG_LEVELS, LogLevel } from '../../infrastructure/config';

/**
 * Logger interface for pipeline components
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;

  /** Logger that adds `bindings` to every entry */
  child(bindings: Record<string, unknown>): ILogger;
}

export interface LoggerOptions {
  /** Logger name (default `spanline`) */
  name?: string;

  /** Minimum level; falls back to `SPANLINE_LOG_LEVEL`, then `info` */
  level?: LogLevel;

  /** Output stream; pino writes to stdout when omitted */
  destination?: DestinationStream;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ILogger backed by a pino instance.
 */
export class PinoLogger implements ILogger {
  constructor(private readonly pino: PinoInstance) {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (context) {
      this.pino.debug(context, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (context) {
      this.pino.info(context, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (context) {
      this.pino.warn(context, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (context) {
      this.pino.error(context, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(this.pino.child(bindings));
  }
}

/**
 * Create the default pino-backed logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'checkout-api', level: 'debug' });
 * const collector = new AsyncCollector(sink, { logger });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): ILogger {
  const envLevel = process.env.SPANLINE_LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pinoOptions: pino.LoggerOptions = {
    name: options.name ?? 'spanline',
    level,
  };

  const instance = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  return new PinoLogger(instance);
}
