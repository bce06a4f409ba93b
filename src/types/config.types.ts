// src/types/config.types.ts

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: LogLevel;
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig {
  profile?: string;
  profiles?: { [name: string]: LoggingProfile };
  appendTimestamp?: boolean;
  timestampFormat?: string;
  logLevel?: LogLevel;
  enableWarningLog?: boolean;
  logDirectory?: string;
}

export interface AppConfig {
  templatesDir: string;
  outputDir: string;
  logLevel: LogLevel;
  defaultLabels: string[];
}
