/**
 * grpc-record-store - Logging
 *
 * pino-backed structured logger. Logging is best-effort: a failing sink is
 * reported once on stderr and never reaches the caller.
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Destination stream (default: stdout) */
  destination?: pino.DestinationStream;
}

export type LogData = Record<string, unknown>;

function createPinoLogger(options: LoggerOptions): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    name: options.name ?? 'record-store',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

export class Logger {
  private sinkFailed = false;

  constructor(private readonly instance: pino.Logger) {}

  /**
   * Create a child logger with additional bindings
   */
  child(bindings: LogData): Logger {
    return new Logger(this.instance.child(bindings));
  }

  trace(msg: string, data?: LogData): void {
    this.emit(() => this.instance.trace(data ?? {}, msg));
  }

  debug(msg: string, data?: LogData): void {
    this.emit(() => this.instance.debug(data ?? {}, msg));
  }

  info(msg: string, data?: LogData): void {
    this.emit(() => this.instance.info(data ?? {}, msg));
  }

  warn(msg: string, data?: LogData): void {
    this.emit(() => this.instance.warn(data ?? {}, msg));
  }

  error(msg: string, error?: Error | LogData): void {
    if (error instanceof Error) {
      this.emit(() => this.instance.error({ err: error }, msg));
    } else {
      this.emit(() => this.instance.error(error ?? {}, msg));
    }
  }

  get level(): string {
    return this.instance.level;
  }

  private emit(write: () => void): void {
    try {
      write();
    } catch (error) {
      if (!this.sinkFailed) {
        this.sinkFailed = true;
        process.stderr.write(`[record-store] log sink failed: ${String(error)}\n`);
      }
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(createPinoLogger(options));
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
