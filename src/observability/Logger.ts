// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = ['apiKey', 'api_key', 'apikey', 'clientId', 'trakt-api-key'];
const NESTED_KEYS = ['query', 'headers', 'credentials'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = { ...obj };
    this.redactKeys(redacted);

    // Credentials also travel inside request query strings and headers
    for (const key of NESTED_KEYS) {
      const nested = redacted[key];
      if (isPlainRecord(nested)) {
        const copy: Record<string, unknown> = { ...nested };
        this.redactKeys(copy);
        redacted[key] = copy;
      }
    }

    return redacted;
  }

  private redactKeys(record: Record<string, unknown>): void {
    for (const key of SENSITIVE_KEYS) {
      if (key in record) record[key] = '[REDACTED]';
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
