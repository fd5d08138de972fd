import winston from 'winston';
import type { Config } from '../config/schema.js';
import { defaultConfig } from '../config/defaults.js';

/**
 * Logger module using Winston
 * Everything goes to stderr; stdout is reserved for the report
 */

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  constructor(config: Config['logging'], transports?: winston.transport[]) {
    this.config = config;
    this.logger = this.createLogger(transports ?? this.getTransports());
  }

  /**
   * Create Winston logger instance
   */
  private createLogger(transports: winston.transport[]): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports,
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
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${timestamp} [${level}]: ${message}`;
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
            return `${timestamp} [${level}]: ${message}`;
          })
        );
    }
  }

  /**
   * Console transport writing every level to stderr
   */
  private getTransports(): winston.transport[] {
    return [new winston.transports.Console({ stderrLevels: ALL_LEVELS })];
  }

  /**
   * Log debug message
   */
  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  /**
   * Log warning message
   */
  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton, created with the default logging settings when
 * nothing has been installed yet
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(defaultConfig.logging);
  }
  return loggerInstance;
}

/**
 * Install a logger as the singleton (used by the CLI and by tests)
 */
export function setLogger(logger: Logger): void {
  loggerInstance = logger;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
