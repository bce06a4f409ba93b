// src/config/app-config.ts
import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig } from '../types/config.types';
import { logLevelSchema } from './logging-schema';
import { describeIssues } from './template-schema';
import { InvalidConfiguration } from '../errors/InterpretationErrors';

dotenv.config();

export const DEFAULT_LABELS = ['Date', 'Time IN', 'Time OUT', 'Goal', 'Measure'];

const appConfigFileSchema = z
  .object({
    templatesDir: z.string(),
    outputDir: z.string(),
    logLevel: logLevelSchema,
    defaultLabels: z.array(z.string().min(1))
  })
  .partial();

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(item => item !== '');
  return items.length > 0 ? items : undefined;
}

/**
 * Settings from the environment (and .env), with defaults.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = logLevelSchema.safeParse(env.LOG_LEVEL);
  return {
    templatesDir: env.TEMPLATES_DIR || path.join(process.cwd(), 'config', 'templates'),
    outputDir: env.OUTPUT_DIR || path.join(process.cwd(), 'output'),
    logLevel: level.success ? level.data : 'info',
    defaultLabels: splitList(env.DEFAULT_LABELS) ?? DEFAULT_LABELS
  };
}

/**
 * Merge a JSON config file over the environment settings.
 */
export function applyConfigFile(config: AppConfig, configPath: string): AppConfig {
  const resolved = path.resolve(configPath);
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new InvalidConfiguration(resolved, [error instanceof Error ? error.message : String(error)]);
  }

  const parsed = appConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidConfiguration(resolved, describeIssues(parsed.error));
  }
  return { ...config, ...parsed.data };
}
