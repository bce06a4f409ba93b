import * as fs from 'fs';
import * as path from 'path';
import { describeIssues, templateFileSchema } from '../config/template-schema';
import { InvalidTemplateConfiguration, TemplateNotFound } from '../errors/InterpretationErrors';
import { createSectionInterpreter, toSectionInterpreterConfig } from '../interpreters/InterpreterFactory';
import { StudentDataSheetTemplate } from '../models/StudentDataSheetTemplate';
import { Logger } from '../utils/logger';

interface DirectoryContents {
  templates: StudentDataSheetTemplate[];
  /** Keyed by file name without .json */
  failures: Map<string, InvalidTemplateConfiguration>;
}

/**
 * Loads student data sheet templates from JSON files in a directory.
 *
 * File shape:
 * {
 *   "id": "word-prompting",
 *   "name": "Word prompting",
 *   "interpreters": [{ "type": "table", "configuration": { "columns": ["Word", "Times Prompted"] } }]
 * }
 */
export class TemplateRepository {
  private readonly templatesDir: string;
  private readonly logger = new Logger('TemplateRepository');

  constructor(templatesDir: string) {
    this.templatesDir = templatesDir;
  }

  async loadFile(filePath: string): Promise<StudentDataSheetTemplate> {
    let json: unknown;
    try {
      json = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new InvalidTemplateConfiguration(filePath, [error instanceof Error ? error.message : String(error)]);
    }

    const parsed = templateFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidTemplateConfiguration(filePath, describeIssues(parsed.error));
    }

    const configs = parsed.data.interpreters.map(toSectionInterpreterConfig);
    return new StudentDataSheetTemplate(
      parsed.data.id,
      parsed.data.name,
      filePath,
      configs,
      configs.map(createSectionInterpreter)
    );
  }

  /**
   * Load every template in the directory. Invalid files are logged and skipped.
   */
  async loadAll(): Promise<StudentDataSheetTemplate[]> {
    return (await this.loadDirectory()).templates;
  }

  /**
   * Find a template by id, or load it directly when given a path to a .json file.
   * An id matching the name of a file that failed to load reports that file's error.
   */
  async find(idOrPath: string): Promise<StudentDataSheetTemplate> {
    if (idOrPath.endsWith('.json') && fs.existsSync(idOrPath)) {
      return this.loadFile(idOrPath);
    }

    const { templates, failures } = await this.loadDirectory();
    const template = templates.find(candidate => candidate.id === idOrPath);
    if (template) {
      return template;
    }

    const failure = failures.get(idOrPath);
    if (failure) {
      throw failure;
    }
    throw new TemplateNotFound(idOrPath);
  }

  private async loadDirectory(): Promise<DirectoryContents> {
    const contents: DirectoryContents = { templates: [], failures: new Map() };
    if (!fs.existsSync(this.templatesDir)) {
      this.logger.warn(`Template directory not found at ${this.templatesDir}`);
      return contents;
    }

    const files = (await fs.promises.readdir(this.templatesDir))
      .filter(file => file.endsWith('.json'))
      .sort();

    for (const file of files) {
      try {
        contents.templates.push(await this.loadFile(path.join(this.templatesDir, file)));
      } catch (error) {
        if (!(error instanceof InvalidTemplateConfiguration)) {
          throw error;
        }
        this.logger.error(`Skipping template ${file}`, error);
        contents.failures.set(path.basename(file, '.json'), error);
      }
    }

    this.logger.info(`Loaded ${contents.templates.length} templates from ${this.templatesDir}`);
    return contents;
  }
}
