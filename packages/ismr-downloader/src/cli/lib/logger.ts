/**
 * ismr-downloader CLI Logging
 *
 * Human-readable (colored) or JSON-lines output for commands, with command
 * duration tracking, a progress bar for chunk processing and a table
 * helper for `plan`.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON lines */
  readonly json: boolean;
  readonly service?: string;
}

export interface ProgressOptions {
  readonly total: number;
  readonly current: number;
  readonly label?: string;
  readonly metadata?: LogMetadata;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  /** True while a progress bar occupies the current terminal line */
  private progressOpen = false;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'ismr-downloader',
      ...config,
    };
    this.startTime = Date.now();
  }

  get json(): boolean {
    return this.config.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    // Log lines start on a fresh line below an unfinished progress bar
    if (this.progressOpen) {
      process.stdout.write('\n');
      this.progressOpen = false;
    }

    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start and reset the duration timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Render chunk progress (a bar on terminals, debug entries in JSON mode)
   */
  progress(options: ProgressOptions): void {
    const { total, current, label, metadata } = options;
    const percent = total > 0 ? Math.round((current / total) * 100) : 100;

    if (this.config.json) {
      this.debug('Progress', { current, total, percent, label, ...metadata });
      return;
    }

    if (!process.stdout.isTTY) return;

    const barWidth = 30;
    const filled = total > 0 ? Math.round((current / total) * barWidth) : barWidth;
    const bar = `[${'='.repeat(filled)}${' '.repeat(barWidth - filled)}]`;
    const labelStr = label ? ` ${label}` : '';

    process.stdout.write(
      `\r${COLORS.dim}${bar}${COLORS.reset} ${percent}% (${current}/${total})${labelStr}`
    );
    this.progressOpen = current < total;

    if (current >= total) {
      process.stdout.write('\n');
    }
  }

  /**
   * Print rows as an aligned table (JSON array in JSON mode)
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      console.log(JSON.stringify(data));
      return;
    }

    if (data.length === 0) {
      this.info('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(data[0]);

    const widths: Record<string, number> = {};
    for (const col of cols) {
      widths[col] = col.length;
      for (const row of data) {
        widths[col] = Math.max(widths[col], String(row[col] ?? '').length);
      }
    }

    console.log(cols.map((col) => col.padEnd(widths[col])).join(' | '));
    console.log(cols.map((col) => '-'.repeat(widths[col])).join('-+-'));

    for (const row of data) {
      console.log(cols.map((col) => String(row[col] ?? '').padEnd(widths[col])).join(' | '));
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'ismr-downloader',
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Format a byte count for display
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  } else if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(2)} KB`;
  } else if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
  } else {
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
  }
}
