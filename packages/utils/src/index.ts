/**
 * @creditops/utils - Shared utilities
 */

import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';

export type LogMeta = Record<string, unknown>;

// Logger
export class Logger {
  private logger: winston.Logger;

  constructor(private readonly name: string, options?: winston.LoggerOptions) {
    this.logger = winston.createLogger({
      level: options?.level || process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: name },
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        })
      ],
      ...options
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack, ...meta });
    } else {
      this.logger.error(message, { error, ...meta });
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}.${name}`, { level: this.logger.level });
  }

  setLevel(level: string): void {
    this.logger.level = level;
  }

  // Get the underlying winston logger instance for compatibility
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }
}

// ID Generator
export function generateId(prefix?: string): string {
  const id = uuidv4();
  return prefix ? `${prefix}_${id}` : id;
}
