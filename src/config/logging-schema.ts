// src/config/logging-schema.ts
import { z } from 'zod';
import { LoggingConfig } from '../types/config.types';

export const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const loggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: logLevelSchema,
  enableWarningLog: z.boolean(),
  logDirectory: z.string()
});

export const loggingConfigSchema: z.ZodType<LoggingConfig> = z.object({
  profile: z.string().optional(),
  profiles: z.record(loggingProfileSchema).optional(),
  appendTimestamp: z.boolean().optional(),
  timestampFormat: z.string().optional(),
  logLevel: logLevelSchema.optional(),
  enableWarningLog: z.boolean().optional(),
  logDirectory: z.string().optional()
});

/**
 * Parse a logging config from JSON text. Returns undefined when the text is not a valid config.
 */
export function parseLoggingConfig(json: string): LoggingConfig | undefined {
  try {
    const result = loggingConfigSchema.safeParse(JSON.parse(json));
    return result.success ? result.data : undefined;
  } catch {
    return undefined;
  }
}
