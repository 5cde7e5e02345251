import winston from 'winston';
import path from 'path';
import type { LoggingConfig } from '../types';

type Meta = Record<string, unknown>;

export class Logger {
  private logger: winston.Logger;

  constructor(options: LoggingConfig) {
    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: options.level,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ];

    // Add file transport if log file is configured
    if (options.file) {
      transports.push(
        new winston.transports.File({
          filename: path.resolve(options.file),
          level: options.level,
          format: logFormat,
          maxsize: 10485760, // 10MB
          maxFiles: 5
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level,
      format: logFormat,
      silent: options.silent,
      transports
    });
  }

  public info(message: string, meta?: Meta): void {
    this.logger.info(message, meta);
  }

  public error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, code: errorCode(error), stack: error.stack });
    } else if (error !== undefined) {
      this.logger.error(message, { error: String(error) });
    } else {
      this.logger.error(message);
    }
  }

  public warn(message: string, meta?: Meta): void {
    this.logger.warn(message, meta);
  }

  public debug(message: string, meta?: Meta): void {
    this.logger.debug(message, meta);
  }

  public performance(operation: string, duration: number, meta?: Meta): void {
    this.logger.info(`Performance: ${operation}`, {
      duration: `${duration}ms`,
      ...meta
    });
  }
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// Logging is process-wide; everything else receives its settings explicitly
export const logger = new Logger({
  level: process.env.LOG_LEVEL || 'info',
  file: process.env.LOG_FILE,
  silent: process.env.LOG_SILENT === 'true'
});
