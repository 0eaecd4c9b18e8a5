/**
 * Logging using winston
 */

import type { ILogger, LogLevel } from '@agentloom/agents';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import path from 'path';

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for rotated log files, resolved against the working directory */
  dir?: string;
  console?: boolean;
  file?: boolean;
  /** Additional transports, e.g. a stream transport in tests */
  extraTransports?: winston.transport[];
}

export class Logger implements ILogger {
  private logger: winston.Logger;
  private fileLoggingEnabled = false;
  private consoleTransport: winston.transport;

  constructor(options: LoggerOptions = {}) {
    const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

    this.consoleTransport = new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });

    const transports: winston.transport[] = [];
    if (options.console ?? true) {
      transports.push(this.consoleTransport);
    }

    if (options.file ?? false) {
      const absoluteLogDir = path.resolve(process.cwd(), options.dir ?? '.agentloom/logs');
      try {
        fs.mkdirSync(absoluteLogDir, { recursive: true });
        this.fileLoggingEnabled = true;
      } catch (error) {
        // Console-only from here on
        console.warn(
          `[Logger] Warning: Failed to create log directory at ${absoluteLogDir}. File logging disabled. Error: ${String(error)}`
        );
      }

      if (this.fileLoggingEnabled) {
        transports.push(
          new DailyRotateFile({
            dirname: absoluteLogDir,
            filename: '%DATE%-error.log',
            datePattern: 'YYYYMMDD',
            level: 'error',
            maxSize: '10m',
            maxFiles: '30d',
            zippedArchive: true,
          }),
          new DailyRotateFile({
            dirname: absoluteLogDir,
            filename: '%DATE%.log',
            datePattern: 'YYYYMMDD',
            maxSize: '10m',
            maxFiles: '30d',
            zippedArchive: true,
          })
        );
      }
    }

    transports.push(...(options.extraTransports ?? []));

    this.logger = winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      // winston warns when a logger has no transports at all
      silent: transports.length === 0,
    });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  disableConsole(): void {
    this.logger.remove(this.consoleTransport);
  }

  enableConsole(): void {
    if (!this.logger.transports.includes(this.consoleTransport)) {
      this.logger.add(this.consoleTransport);
    }
    this.logger.silent = false;
  }

  isFileLoggingEnabled(): boolean {
    return this.fileLoggingEnabled;
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
      return value;
    default:
      return undefined;
  }
}
