// src/utils/logger.ts
import * as winston from 'winston';
import { createLogger } from './configurable-logger';
import { logLevelSchema, parseLoggingConfig } from '../config/logging-schema';
import { LoggingConfig, LogLevel } from '../types/config.types';

// A full logging config may come in through the environment
const envConfig = process.env.LOGGING_CONFIG ? parseLoggingConfig(process.env.LOGGING_CONFIG) : undefined;

const logger: winston.Logger = createLogger(
  envConfig ?? {
    profile: 'Default',
    profiles: {
      Default: {
        appendTimestamp: false,
        timestampFormat: '',
        logLevel: toLogLevel(process.env.LOG_LEVEL),
        enableWarningLog: false,
        logDirectory: 'logs'
      }
    }
  }
);

function toLogLevel(level: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(level);
  return parsed.success ? parsed.data : 'info';
}

export default logger;
export { logger };

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;
  static globalConfig: LoggingConfig | undefined;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Initialize logger with configuration
   * Call this at application startup with your config
   */
  static initialize(config: LoggingConfig): void {
    Logger.globalConfig = config;
    const newLogger = createLogger(config);

    // Swap transports on the shared instance so existing Logger wrappers pick them up
    logger.clear();
    newLogger.transports.forEach(transport => {
      logger.add(transport);
    });

    logger.level = newLogger.level;
    logger.format = newLogger.format;
    logger.silent = newLogger.silent;
  }

  static setLevel(level: LogLevel): void {
    logger.level = level;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      logger.error(`[${this.context}] ${message}: ${error instanceof Error ? error.message : String(error)}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }
}
