// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { parseLoggingConfig } from '../config/logging-schema';
import { LoggingConfig } from '../types/config.types';
import { Logger } from './logger';

/**
 * Load logging configuration from config/log-config.json
 * Falls back to the configuration passed in when the file is missing or invalid
 */
export function loadLoggingConfig(fallbackConfig?: LoggingConfig): LoggingConfig | undefined {
  const logConfigPath = path.join(process.cwd(), 'config', 'log-config.json');

  if (fs.existsSync(logConfigPath)) {
    const parsed = parseLoggingConfig(fs.readFileSync(logConfigPath, 'utf-8'));
    if (parsed) {
      return parsed;
    }
    new Logger('LogConfigLoader').warn(`Ignoring invalid logging config at ${logConfigPath}`);
  }

  return fallbackConfig;
}

/**
 * Initialize logger with centralized config or fallback
 * This should be called at the start of any CLI command
 */
export function initializeLogger(fallbackConfig?: LoggingConfig): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig);

    const logger = new Logger('LogConfigLoader');
    logger.debug(`Initialized logger with profile: ${loggingConfig.profile || 'default'}`);
  }
}
