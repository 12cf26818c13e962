import { performance } from 'perf_hooks';
import * as fs from 'fs';
import * as path from 'path';
import { isErrorWithCode } from '../types/index.js';

/**
 * Structured JSON logger for the coordination core.
 * One JSON object per line; warnings and errors go to stderr.
 */

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface LogContext {
  agentId?: string;
  projectId?: string;
  key?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
  metrics?: {
    [key: string]: number;
  };
}

// State shared by a root logger and all of its children
export interface LoggerSink {
  level: LogLevel;
  serviceName: string;
  environment: string;
  version: string;
  testLogFile?: string;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

class Logger {
  private sink: LoggerSink;
  private baseContext: LogContext;

  constructor(
    serviceName: string = 'agent-coord',
    logLevel: LogLevel = 'info',
    environment: string = process.env.NODE_ENV || 'development',
    version: string = process.env.npm_package_version || '0.1.0',
    inherited?: { sink: LoggerSink; context: LogContext }
  ) {
    if (inherited) {
      this.sink = inherited.sink;
      this.baseContext = inherited.context;
      return;
    }

    this.sink = { level: logLevel, serviceName, environment, version };
    this.baseContext = {};

    // Set up test log file if running tests
    if (environment === 'test' && process.env.TEST_LOG_FILE !== 'false') {
      const logDir = path.join(process.cwd(), 'test-logs');
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.sink.testLogFile = path.join(logDir, `test-${Date.now()}-${process.pid}.log`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.sink.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);
    return messageLevelIndex <= currentLevelIndex;
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    metrics?: { [key: string]: number }
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.sink.serviceName,
        environment: this.sink.environment,
        version: this.sink.version,
      },
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: isErrorWithCode(error) ? error.code : undefined
      };
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = JSON.stringify(logEntry);

    if (this.sink.testLogFile) {
      try {
        fs.appendFileSync(this.sink.testLogFile, output + '\n');
        return;
      } catch (error) {
        console.error('Failed to write to test log file:', error);
      }
    }

    if (logEntry.level === 'error' || logEntry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    if (!this.shouldLog('error')) return;
    const logEntry = this.formatLogEntry('error', message, context, error === undefined ? undefined : toError(error));
    this.writeLog(logEntry);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    const logEntry = this.formatLogEntry('warn', message, context);
    this.writeLog(logEntry);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    const logEntry = this.formatLogEntry('info', message, context);
    this.writeLog(logEntry);
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    const logEntry = this.formatLogEntry('debug', message, context);
    this.writeLog(logEntry);
  }

  trace(message: string, context?: LogContext): void {
    if (!this.shouldLog('trace')) return;
    const logEntry = this.formatLogEntry('trace', message, context);
    this.writeLog(logEntry);
  }

  /**
   * Log with custom metrics
   */
  metric(message: string, metrics: { [key: string]: number }, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    const logEntry = this.formatLogEntry('info', message, context, undefined, metrics);
    this.writeLog(logEntry);
  }

  /**
   * Time a function execution and log the result
   */
  async timeAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const startTime = performance.now();
    const operationContext = { ...context, operation };

    this.debug(`Starting operation: ${operation}`, operationContext);

    try {
      const result = await fn();
      const duration = performance.now() - startTime;

      this.metric(`Operation completed: ${operation}`,
        { duration, success: 1 },
        { ...operationContext, duration }
      );

      return result;
    } catch (error) {
      const duration = performance.now() - startTime;

      this.error(`Operation failed: ${operation}`,
        { ...operationContext, duration },
        error
      );

      this.metric(`Operation failed: ${operation}`,
        { duration, success: 0, error: 1 },
        { ...operationContext, duration }
      );

      throw error;
    }
  }

  /**
   * Create a child logger with additional context.
   * Children share the parent's level and output.
   */
  child(additionalContext: LogContext): Logger {
    const { serviceName, level, environment, version } = this.sink;
    return new Logger(serviceName, level, environment, version, {
      sink: this.sink,
      context: { ...this.baseContext, ...additionalContext },
    });
  }

  /**
   * Set log level dynamically
   */
  setLogLevel(level: LogLevel): void {
    this.sink.level = level;
  }

  /**
   * Get current log level
   */
  getLogLevel(): LogLevel {
    return this.sink.level;
  }
}

// Create default logger instance
export const logger = new Logger();

// Export Logger class for custom instances
export { Logger };

/**
 * Helper function to create component-specific loggers
 */
export function createComponentLogger(component: string, context?: LogContext): Logger {
  return logger.child({ component, ...context });
}
