#!/usr/bin/env node
// src/cli/interpret.ts
import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { applyConfigFile, loadAppConfig } from '../config/app-config';
import { logLevelSchema } from '../config/logging-schema';
import { DataSheet } from '../models/DataSheet';
import { splitByLabels } from '../parsers/LabelSplitter';
import { formatDataSheet, formatSummary } from '../services/DataSheetFormatter';
import { SheetImportService } from '../services/SheetImportService';
import { summarizeDataSheet } from '../services/SessionSummaryService';
import { TemplateRepository } from '../services/TemplateRepository';
import { SHEET_SOURCE_FORMATS, SheetSourceFormat } from '../sources/SheetContentSource';
import { AppConfig } from '../types/config.types';
import { initializeLogger } from '../utils/log-config-loader';
import { Logger } from '../utils/logger';

interface CommonOptions {
  config?: string;
  logLevel?: string;
}

interface InterpretOptions extends CommonOptions {
  template: string;
  format: string;
  labels?: string;
  output?: string;
  summary?: boolean;
  continueOnError?: boolean;
  color: boolean;
}

interface SplitOptions extends CommonOptions {
  labels?: string;
}

const logger = new Logger('CLI');
const program = new Command();

function setup(options: CommonOptions): AppConfig {
  initializeLogger();
  let config = loadAppConfig();
  if (options.config) {
    config = applyConfigFile(config, options.config);
    logger.info(`Loaded configuration from ${path.resolve(options.config)}`);
  }
  Logger.setLevel(toLevel(options.logLevel) ?? config.logLevel);
  return config;
}

function toLevel(level: string | undefined): AppConfig['logLevel'] | undefined {
  const parsed = logLevelSchema.safeParse(level);
  return parsed.success ? parsed.data : undefined;
}

function toFormat(format: string): SheetSourceFormat {
  const match = SHEET_SOURCE_FORMATS.find(candidate => candidate === format);
  if (!match) {
    throw new Error(`Unknown format '${format}'. Expected one of: ${SHEET_SOURCE_FORMATS.join(', ')}`);
  }
  return match;
}

function parseLabels(labels: string | undefined, fallback: string[]): string[] {
  if (!labels) return fallback;
  return labels.split(',').map(label => label.trim()).filter(label => label !== '');
}

function writeOutput(outputPath: string, outputDir: string, dataSheets: DataSheet[]): string {
  const target = path.isAbsolute(outputPath) || outputPath.includes(path.sep)
    ? outputPath
    : path.join(outputDir, outputPath);
  fs.mkdirSync(path.dirname(target), { recursive: true });

  const json = dataSheets.length === 1 ? dataSheets[0].toJSON() : dataSheets.map(sheet => sheet.toJSON());
  fs.writeFileSync(target, JSON.stringify(json, null, 2));
  return target;
}

function fail(message: string, error: unknown): void {
  logger.error(message, error);
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
}

program
  .name('sheet-interpreter')
  .description('Interpret OCR output of therapy session data sheets')
  .version('1.0.0');

program
  .command('interpret')
  .description('Interpret one or more sheet content files with a template')
  .argument('<files...>', 'Sheet content files')
  .requiredOption('-t, --template <template>', 'Template id or path to a template .json file')
  .option('-f, --format <format>', `Input format (${SHEET_SOURCE_FORMATS.join(', ')})`, 'raw')
  .option('-l, --labels <labels>', 'Comma separated labels for the text format')
  .option('-o, --output <path>', 'Write the interpreted data sheets as JSON')
  .option('-s, --summary', 'Print tally counts and column totals')
  .option('--continue-on-error', 'Keep going when a sheet fails to interpret')
  .option('--no-color', 'Disable colored output')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)')
  .action(async (files: string[], options: InterpretOptions) => {
    try {
      const config = setup(options);
      const service = new SheetImportService(new TemplateRepository(config.templatesDir));

      const results = await service.importMany(files, {
        template: options.template,
        format: toFormat(options.format),
        labels: parseLabels(options.labels, config.defaultLabels),
        continueOnError: options.continueOnError
      });

      const dataSheets: DataSheet[] = [];
      for (const result of results) {
        if (!result.success) {
          console.error(chalk.red(`${result.location}: ${result.error.message}`));
          process.exitCode = 1;
          continue;
        }
        dataSheets.push(result.dataSheet);
        console.log(formatDataSheet(result.dataSheet, { color: options.color }));
        if (options.summary) {
          console.log(formatSummary(summarizeDataSheet(result.dataSheet), { color: options.color }));
        }
        console.log('');
      }

      if (options.output && dataSheets.length > 0) {
        const written = writeOutput(options.output, config.outputDir, dataSheets);
        console.log(chalk.green(`Wrote ${dataSheets.length} data sheet(s) to ${written}`));
      }
    } catch (error) {
      fail('Interpretation failed', error);
    }
  });

program
  .command('templates')
  .description('List the available templates')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)')
  .action(async (options: CommonOptions) => {
    try {
      const config = setup(options);
      const templates = await new TemplateRepository(config.templatesDir).loadAll();

      if (templates.length === 0) {
        console.log(chalk.yellow(`No templates in ${config.templatesDir}`));
        return;
      }
      for (const template of templates) {
        const kinds = template.configs.map(cfg => cfg.type).join(', ');
        console.log(`${chalk.bold(template.id)}  ${template.name}  ${chalk.gray(`[${kinds}]`)}`);
      }
    } catch (error) {
      fail('Could not list templates', error);
    }
  });

program
  .command('split-labels')
  .description('Split a plain text sheet into labeled sections')
  .argument('<file>', 'Text file produced by OCR')
  .option('-l, --labels <labels>', 'Comma separated labels')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)')
  .action((file: string, options: SplitOptions) => {
    try {
      const config = setup(options);
      const split = splitByLabels(fs.readFileSync(file, 'utf-8'), parseLabels(options.labels, config.defaultLabels));

      console.log(`${chalk.bold('Student Key')}: ${split.studentKey}`);
      for (const section of split.sections.values()) {
        console.log(`${chalk.bold(section.label)}: ${section.contentWithoutLabel}`);
      }
    } catch (error) {
      fail('Could not split text', error);
    }
  });

program.parseAsync(process.argv).catch(error => fail('Command failed', error));
