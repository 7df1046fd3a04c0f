/**
 * Logger for RigMotion
 *
 * Supports different log levels and timing operations.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent'
}

type PrintedLevel = Exclude<LogLevel, LogLevel.SILENT>;

/**
 * Terminal colour and label per printed level
 */
const LEVEL_STYLES: Record<PrintedLevel, { color: string; label: string }> = {
  [LogLevel.DEBUG]: { color: '\x1b[90m', label: 'DEBUG' },
  [LogLevel.INFO]: { color: '\x1b[36m', label: 'INFO' },
  [LogLevel.WARN]: { color: '\x1b[33m', label: 'WARN' },
  [LogLevel.ERROR]: { color: '\x1b[31m', label: 'ERROR' },
};

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];

const RESET = '\x1b[0m';

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  layerName?: string | undefined;
  boneIdentifier?: string | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

/**
 * Internal Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || 'RigMotion',
    };
  }

  /**
   * Current minimum level
   */
  get level(): LogLevel {
    return this.options.level;
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().substring(11, 23);
  }

  /**
   * Check if should log based on level
   */
  isLevelEnabled(level: LogLevel): boolean {
    if (level === LogLevel.SILENT) return false;
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: PrintedLevel, message: string, context?: LoggerContext): void {
    if (!this.isLevelEnabled(level)) return;

    const timestamp = this.formatTimestamp();
    const { color, label } = LEVEL_STYLES[level];
    const timeStr = timestamp ? ` @ ${timestamp}` : '';

    const logMessage = `${color}${this.options.prefix} [${label}]${timeStr} ${message}${RESET}`;

    if (context) {
      console.log(logMessage, context);
    } else {
      console.log(logMessage);
    }
  }

  /**
   * Debug level logging
   */
  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  /**
   * Info level logging
   */
  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  /**
   * Warning level logging
   */
  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Error level logging
   */
  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    if (!this.startTimes.has(operation)) return;
    this.info(`Completed operation: ${operation}`, {
      operation,
      ...this.takeDuration(operation),
      ...context
    });
  }

  /**
   * Run a synchronous operation with timing.
   * A failure is logged at error level and rethrown.
   */
  withTiming<T>(operation: string, fn: () => T, context?: LoggerContext): T {
    this.startTiming(operation);
    try {
      const result = fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.error(`Failed operation: ${operation}`, {
        operation,
        ...this.takeDuration(operation),
        ...context,
        success: false,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  private takeDuration(operation: string): { duration?: number } {
    const startTime = this.startTimes.get(operation);
    this.startTimes.delete(operation);
    if (startTime === undefined || !this.options.duration) return {};
    return { duration: Date.now() - startTime };
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: LogLevel.INFO,
  timestamp: true,
  duration: true,
  prefix: 'RigMotion'
});

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
