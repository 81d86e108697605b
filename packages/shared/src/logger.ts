/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - Console output for development
 * - Optional file logging with daily rotation
 * - Structured JSON logs
 * - Context injection (service, indicator kind, period, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Service name (indicators, factory, ...) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private logger: winston.Logger;
  private service: string;

  constructor(config: LoggerConfig, base?: winston.Logger) {
    this.service = config.service;
    this.logger = base ?? Logger.build(config);
  }

  private static build(config: LoggerConfig): winston.Logger {
    const logDir = config.logDir || path.join(process.cwd(), 'logs', config.service);
    if (config.file) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    // Define log format
    const logFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    // Console format (pretty print for dev)
    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    const transports: winston.transport[] = [];

    if (config.console !== false) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
        })
      );
    }

    if (config.file) {
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );
    }

    // Winston complains when logging without transports
    if (transports.length === 0) {
      transports.push(new winston.transports.Console({ silent: true }));
    }

    return winston.createLogger({
      level: config.level || 'info',
      defaultMeta: { service: config.service },
      transports,
    });
  }

  /**
   * Log error
   */
  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Log warning
   */
  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * Log info
   */
  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  /**
   * Log debug
   */
  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);
  }

  /**
   * Current level of the underlying winston logger
   */
  getLevel(): string {
    return this.logger.level;
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ service: this.service }, this.logger.child(context));
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
