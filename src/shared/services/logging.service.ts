/**
 * Logging Service
 *
 * Structured logging for the coordinator and its detectors.
 * Entries are kept in a bounded in-memory ring and forwarded to an optional
 * sink (the host application's log pipeline); stderr is the fallback.
 */


/**
 * Log level type (RFC 5424 severities)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

const LOG_LEVEL_NAMES: readonly LogLevel[] = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
];

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  component?: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Destination for log entries owned by the embedding application
 */
export interface LogSink {
  write(entry: LogEntry): Promise<void>;
}

/**
 * Logging Service
 *
 * Centralized logging with a configurable minimum level.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private maxEntries: number;
  private sink: LogSink | null = null;

  // Log level hierarchy matching RFC 5424 severity levels
  private static readonly LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    notice: 2,
    warning: 3,
    error: 4,
    critical: 5,
    alert: 6,
    emergency: 7,
  };

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000) {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
  }

  /**
   * Route entries to an application-owned sink instead of stderr
   */
  setSink(sink: LogSink | null): void {
    this.sink = sink;
  }

  /**
   * Set minimum log level
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  /**
   * Internal logging method, also used by component loggers
   */
  log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    component?: string
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      component,
      context,
      error,
    };

    this.logEntries.push(entry);

    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    if (this.sink) {
      void this.forwardToSink(this.sink, entry);
    } else {
      this.outputToConsole(entry);
    }
  }

  private async forwardToSink(sink: LogSink, entry: LogEntry): Promise<void> {
    try {
      await sink.write(entry);
    } catch (error) {
      // Don't use this.log to avoid infinite recursion
      console.error('[LoggingService] Failed to forward log entry:', error);
      this.outputToConsole(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LoggingService.LOG_LEVELS[level] >= LoggingService.LOG_LEVELS[this.minLevel];
  }

  /**
   * Output log entry to stderr
   */
  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(8);
    const scope = entry.component ? `[${entry.component}] ` : '';

    let output = `[${timestamp}] ${levelStr} ${scope}${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }

  /**
   * Get recent log entries
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minLevelValue = LoggingService.LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LoggingService.LOG_LEVELS[entry.level] >= minLevelValue);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }
}

/**
 * Parse a LOG_LEVEL value, falling back to the given default
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const match = LOG_LEVEL_NAMES.find((level) => level === value?.toLowerCase());
  return match ?? fallback;
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  globalLogger ??= new LoggingService(parseLogLevel(process.env.LOG_LEVEL));
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}

/**
 * Create a logger scoped to one component.
 *
 * Resolves the global service on every call so that tests and embedders can
 * swap it with setLogger() after modules are loaded.
 */
export function createLogger(component: string): Logger {
  const emit = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void => {
    getLogger().log(level, message, context, error, component);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    notice: (message, context) => emit('notice', message, context),
    warning: (message, context) => emit('warning', message, context),
    error: (message, error, context) => emit('error', message, context, error),
    critical: (message, error, context) => emit('critical', message, context, error),
  };
}
