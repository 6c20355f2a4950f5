/**
 * Structured logging utility for the ISMR downloader
 *
 * Console-based structured logging with levels, timestamps and per-module
 * service names. JSON lines in production, readable lines otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  readonly context?: LogMetadata;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const merged = { ...this.config.context, ...metadata };
    const hasMeta = Object.keys(merged).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(merged)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? merged : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }

  /**
   * Derive a logger whose entries always carry the given metadata
   */
  with(context: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

export const logger = new Logger({
  level: getLogLevel(),
  service: 'ismr-downloader',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a module-scoped logger (service name `ismr-downloader:<module>`)
 */
export function createLogger(context: { readonly module: string } & LogMetadata): Logger {
  const { module, ...rest } = context;
  return new Logger({
    level: getLogLevel(),
    service: `ismr-downloader:${module}`,
    pretty: process.env.NODE_ENV !== 'production',
    context: rest,
  });
}
