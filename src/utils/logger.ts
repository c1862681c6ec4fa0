/**
 * Structured logger for the SAS analyzer
 * Emits one JSON object per line, filtered by the configured log level
 */

import { getConfigInstance, LOG_LEVELS, type LogLevel } from '../config/analyzer-config.js';

interface LogContext {
  [key: string]: unknown;
}

interface OperationHandle {
  (): void;
}

export class Logger {
  private component: string;
  private threshold?: LogLevel;

  constructor(component: string, threshold?: LogLevel) {
    this.component = component;
    this.threshold = threshold;
  }

  private isEnabled(level: LogLevel): boolean {
    const threshold = this.threshold ?? getConfigInstance().logLevel;
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
  }

  private log(level: LogLevel, message: string, error?: Error, context?: LogContext) {
    if (!this.isEnabled(level)) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...(context && { context }),
      ...(error && {
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name
        }
      })
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else if (level === 'debug') {
      // eslint-disable-next-line no-console
      console.debug(JSON.stringify(logEntry));
    } else {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(logEntry));
    }
  }

  debug(message: string, context?: LogContext) {
    this.log('debug', message, undefined, context);
  }

  info(message: string, context?: LogContext) {
    this.log('info', message, undefined, context);
  }

  warn(message: string, context?: LogContext) {
    this.log('warn', message, undefined, context);
  }

  error(message: string, error?: unknown, context?: LogContext) {
    const typedError = error instanceof Error ? error :
      (error ? new Error(String(error)) : undefined);
    this.log('error', message, typedError, context);
  }

  /**
   * Create an operation timer for performance tracking
   */
  operation(operationName: string, context?: LogContext): OperationHandle {
    const startTime = Date.now();
    this.debug(`Starting operation: ${operationName}`, {
      operation: operationName,
      ...context
    });

    return () => {
      const duration = Date.now() - startTime;
      this.info(`Completed operation: ${operationName}`, {
        operation: operationName,
        duration: `${duration}ms`,
        ...context
      });
    };
  }

  /**
   * Log a metric value
   */
  metric(name: string, value: number, unit: string, context?: LogContext) {
    this.debug(`Metric: ${name}`, {
      metric: {
        name,
        value,
        unit
      },
      ...context
    });
  }
}

/**
 * Create a logger for a specific component
 */
export function createLogger(component: string, threshold?: LogLevel): Logger {
  return new Logger(component, threshold);
}
