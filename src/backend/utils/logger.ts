/**
 * Backend logger: leveled console output with per-service context.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  includeTimestamp: boolean;
}

/**
 * Parse a LOG_LEVEL value ("debug", "info", "warn", "error", "silent").
 * Returns null for anything unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return null;
  }
}

class Logger {
  private config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    const isProduction = process.env.NODE_ENV === 'production';

    const defaultConfig: LoggerConfig = {
      level:
        parseLogLevel(process.env.LOG_LEVEL) ??
        (isProduction ? LogLevel.INFO : LogLevel.DEBUG),
      includeTimestamp: true,
    };

    this.config = { ...defaultConfig, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  private stringifyData(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data instanceof Error) return `${data.name}: ${data.message}`;

    try {
      return JSON.stringify(data, null, 2);
    } catch {
      return String(data);
    }
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: string
  ): string {
    const timestamp = this.config.includeTimestamp
      ? new Date().toISOString()
      : '';

    const levelName = LogLevel[level];
    const contextStr = context ? `[${context}]` : '';

    return `${timestamp} ${levelName} ${contextStr} ${message}`.trim();
  }

  private log(
    level: LogLevel,
    message: string,
    data?: unknown,
    context?: string
  ): void {
    if (level < this.config.level) return;

    const fullMessage =
      data !== undefined ? `${message}\n${this.stringifyData(data)}` : message;

    const formattedMessage = this.formatMessage(level, fullMessage, context);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage);
        break;
    }
  }

  debug(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.DEBUG, message, data, context);
  }

  info(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.INFO, message, data, context);
  }

  warn(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.WARN, message, data, context);
  }

  error(message: string, data?: unknown, context?: string): void {
    this.log(LogLevel.ERROR, message, data, context);
  }

  child(context: string): ContextLogger {
    return new ContextLogger(this, context);
  }
}

/**
 * Context logger that automatically includes context in all log messages
 */
export class ContextLogger {
  constructor(
    private parent: Logger,
    private context: string
  ) {}

  debug(message: string, data?: unknown): void {
    this.parent.debug(message, data, this.context);
  }

  info(message: string, data?: unknown): void {
    this.parent.info(message, data, this.context);
  }

  warn(message: string, data?: unknown): void {
    this.parent.warn(message, data, this.context);
  }

  error(message: string, data?: unknown): void {
    this.parent.error(message, data, this.context);
  }
}

export const logger = new Logger();

export const createLogger = (context: string) => logger.child(context);
