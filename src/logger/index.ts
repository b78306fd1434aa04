import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { LvmScopeError } from '../errors/index.js';

/**
 * Logger module using Winston.
 * The terminal belongs to the interface, so the console transport is opt-in
 * and the default destination is a pair of size-capped files.
 */

export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  constructor(config: Config['logging'], instance?: winston.Logger) {
    this.config = config;
    if (!instance && this.config.file) {
      this.ensureLogDirectory();
    }
    this.logger = instance ?? this.createLogger();
  }

  private ensureLogDirectory(): void {
    if (!existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

  private createLogger(): winston.Logger {
    const transports = this.getTransports();

    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports,
      silent: transports.length === 0,
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    });

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message }) => {
            return `${String(timestamp)} [${level}]: ${String(message)}`;
          })
        );
    }
  }

  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [];

    if (this.config.console) {
      transports.push(
        new winston.transports.Console({
          stderrLevels: ['debug', 'info', 'warn', 'error'],
          format:
            this.config.format === 'json'
              ? winston.format.json()
              : winston.format.combine(winston.format.colorize(), this.getFormats()),
        })
      );
    }

    if (this.config.file) {
      transports.push(
        new winston.transports.File({
          filename: join(this.config.dir, 'lvmscope-combined.log'),
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );

      transports.push(
        new winston.transports.File({
          filename: join(this.config.dir, 'lvmscope-error.log'),
          level: 'error',
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );
    }

    return transports;
  }

  /**
   * Parse size string such as 10m to bytes
   */
  private parseSize(size: string): number {
    const units: Record<string, number> = {
      b: 1,
      k: 1024,
      m: 1024 * 1024,
      g: 1024 * 1024 * 1024,
    };

    const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
    if (!match || !match[1] || !match[2]) {
      return 10 * 1024 * 1024;
    }

    return parseInt(match[1], 10) * (units[match[2]] ?? 1);
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  error(message: string, error?: Error, metadata?: object): void {
    const errorMetadata = error
      ? {
          error: {
            message: error.message,
            stack: error.stack,
            ...(error instanceof LvmScopeError ? { code: error.code, severity: error.severity } : {}),
          },
          ...metadata,
        }
      : metadata;

    this.logger.error(message, errorMetadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }

  /**
   * Flush file transports before the process exits
   */
  close(): Promise<void> {
    return new Promise(resolve => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
