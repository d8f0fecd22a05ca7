import winston from 'winston';

/**
 * Logger class for the survey autofill run.
 * Wraps Winston with a console transport and an optional JSON log file.
 */

export interface LoggerOptions {
  logFile?: string;
  silent?: boolean;
}

export class Logger {
  private logger: winston.Logger;

  constructor(logLevel: string = 'info', options: LoggerOptions = {}) {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.simple()
      })
    ];

    if (options.logFile) {
      transports.push(new winston.transports.File({ filename: options.logFile }));
    }

    this.logger = winston.createLogger({
      level: logLevel,
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports
    });
  }

  setLevel(logLevel: string): void {
    this.logger.level = logLevel;
  }

  info(message: string, ...args: unknown[]): void {
    this.logger.info(message, ...args);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.logger.error(message);
      return;
    }
    this.logger.error(message, error instanceof Error ? { error: error.message, stack: error.stack } : { error });
  }

  warn(message: string, ...args: unknown[]): void {
    this.logger.warn(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.logger.debug(message, ...args);
  }
}
