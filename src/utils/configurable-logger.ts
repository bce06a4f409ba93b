// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

export interface LogFiles {
  combined: string;
  error: string;
  warning?: string;
}

// Default logging profiles
const DEFAULT_PROFILES: { [key: string]: LoggingProfile } = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  Console: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: false,
    logDirectory: ''
  }
};

const linePrinter = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export function fileLoggingEnabled(profile: LoggingProfile): boolean {
  return profile.logDirectory !== '' && process.env.NODE_ENV !== 'test';
}

export class ConfigurableLogger {
  private static config: LoggingProfile = DEFAULT_PROFILES.AppendDatetime;
  private static startedAt: Date = new Date();

  /**
   * Initialize the logger with configuration
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const effectiveConfig = this.resolveConfig(config);
    this.config = effectiveConfig;
    this.startedAt = new Date();

    const logger = winston.createLogger({
      level: effectiveConfig.logLevel,
      silent: process.env.LOG_SILENT === 'true',
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            linePrinter
          )
        })
      ]
    });

    if (fileLoggingEnabled(effectiveConfig)) {
      const logsDir = path.join(process.cwd(), effectiveConfig.logDirectory);
      try {
        fs.mkdirSync(logsDir, { recursive: true });
        const files = this.getLogFiles();

        logger.add(new winston.transports.File({
          filename: path.join(logsDir, files.combined),
          format: winston.format.combine(winston.format.timestamp(), linePrinter)
        }));

        logger.add(new winston.transports.File({
          filename: path.join(logsDir, files.error),
          level: 'error',
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.printf(({ level, message, timestamp, stack }) => {
              return `${timestamp} [${level}]: ${message}${stack ? `\n${stack}` : ''}`;
            })
          )
        }));

        if (files.warning) {
          logger.add(new winston.transports.File({
            filename: path.join(logsDir, files.warning),
            level: 'warn',
            format: winston.format.combine(winston.format.timestamp(), linePrinter)
          }));
        }
      } catch (error) {
        logger.warn(`Could not create logs directory ${logsDir}, using console only: ${error}`);
      }
    }

    return logger;
  }

  /**
   * Resolve the effective logging configuration
   */
  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.profile) {
      const custom = config.profiles?.[config.profile];
      if (custom) {
        return custom;
      }
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) {
        return builtIn;
      }
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.appendTimestamp !== undefined) {
      return {
        appendTimestamp: config.appendTimestamp,
        timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
        logLevel: config.logLevel || 'info',
        enableWarningLog: config.enableWarningLog !== false,
        logDirectory: config.logDirectory ?? 'logs'
      };
    }

    return DEFAULT_PROFILES.AppendDatetime;
  }

  /**
   * Generate log filename based on configuration
   */
  static generateLogFilename(baseName: string, config: LoggingProfile, now: Date): string {
    if (!config.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;

    if (config.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const year = now.getFullYear();
      const month = String(now.getMonth() + 1).padStart(2, '0');
      const day = String(now.getDate()).padStart(2, '0');
      const hours = String(now.getHours()).padStart(2, '0');
      const minutes = String(now.getMinutes()).padStart(2, '0');
      const seconds = String(now.getSeconds()).padStart(2, '0');
      timestamp = `${year}-${month}-${day}-${hours}${minutes}${seconds}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);

    return `${name}-${timestamp}${ext}`;
  }

  /**
   * Get current log files being used
   */
  static getLogFiles(): LogFiles {
    const result: LogFiles = {
      combined: this.generateLogFilename('combined.log', this.config, this.startedAt),
      error: this.generateLogFilename('error.log', this.config, this.startedAt)
    };

    if (this.config.enableWarningLog) {
      result.warning = this.generateLogFilename('warning.log', this.config, this.startedAt);
    }

    return result;
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
