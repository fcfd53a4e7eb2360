/**
 * Structured logging utility for the dataset profiler
 *
 * Console-based structured logger with levels, timestamps and contextual
 * metadata. Emits one JSON object per line for machines, or a coloured
 * single line for interactive use.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  /** Emit JSON lines instead of human-readable output */
  readonly json: boolean;
  /** Context merged into every entry */
  readonly context?: LogMetadata;
}

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

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  get json(): boolean {
    return this.config.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private merge(metadata?: LogMetadata): LogMetadata {
    return { ...this.config.context, ...metadata };
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const meta = this.merge(metadata);
    const hasMeta = Object.keys(meta).length > 0;

    if (this.config.json) {
      return JSON.stringify({
        timestamp,
        level,
        service: this.config.service,
        message,
        ...(hasMeta ? meta : {}),
      });
    }

    let line = `${COLORS.dim}${timestamp}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${COLORS.reset} ${message}`;
    if (hasMeta) {
      const metaStr = Object.entries(meta)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }
    return line;
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
   * Create a child logger whose entries carry additional context
   */
  child(context: LogMetadata): Logger {
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

/**
 * Create a logger for the given level and output format
 */
export function createLogger(options: Partial<Omit<LoggerConfig, 'service'>> = {}): Logger {
  return new Logger({
    level: options.level ?? getLogLevel(),
    service: 'dataset-profiler',
    json: options.json ?? process.env.NODE_ENV === 'production',
    context: options.context,
  });
}

// Default logger instance
export const logger = createLogger();
