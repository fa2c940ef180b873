/**
 * Structured logging utility
 * Logs include request IDs and timestamps; secrets (portal cookies, tokens) are redacted
 */

import { getConfig, LogLevel } from '../config';

export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SECRET_KEYS = ['password', 'token', 'apikey', 'api_key', 'secret', 'cookie', 'session', 'authorization'];

class Logger {
  private enabled(level: LogLevel): boolean {
    const { logLevel, nodeEnv } = getConfig();
    if (level === 'debug' && nodeEnv === 'production') {
      return false;
    }
    return LEVEL_ORDER[level] >= LEVEL_ORDER[logLevel];
  }

  private sanitize(obj: unknown): unknown {
    if (typeof obj !== 'object' || obj === null) {
      return obj;
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.sanitize(item));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (SECRET_KEYS.some((secret) => lowerKey.includes(secret))) {
        sanitized[key] = '[REDACTED]';
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = this.sanitize(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? JSON.stringify(this.sanitize(context)) : '';
    return `[${timestamp}] [${level}] ${message} ${contextStr}`.trimEnd();
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('info')) {
      console.log(this.formatMessage('INFO', message, context));
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (!this.enabled('error')) {
      return;
    }
    const errorContext = {
      ...context,
      error: error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name
      } : error
    };
    console.error(this.formatMessage('ERROR', message, errorContext));
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('debug')) {
      console.debug(this.formatMessage('DEBUG', message, context));
    }
  }
}

export const logger = new Logger();
