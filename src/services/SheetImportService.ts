import { DataSheet } from '../models/DataSheet';
import { createSheetSource, SheetSourceFormat } from '../sources/SheetContentSource';
import { Logger } from '../utils/logger';
import { TemplateRepository } from './TemplateRepository';

export interface ImportOptions {
  template: string;
  format: SheetSourceFormat;
  /** Labels for the plain text format */
  labels?: readonly string[];
}

export type ImportResult =
  | { location: string; success: true; dataSheet: DataSheet }
  | { location: string; success: false; error: Error };

/**
 * Reads sheet content from files and runs it through a template's interpreter.
 */
export class SheetImportService {
  private readonly templates: TemplateRepository;
  private readonly logger = new Logger('SheetImportService');

  constructor(templates: TemplateRepository) {
    this.templates = templates;
  }

  async importSheet(location: string, options: ImportOptions): Promise<DataSheet> {
    const template = await this.templates.find(options.template);
    const source = createSheetSource(options.format, options.labels);

    this.logger.info(`Importing ${location} (${source.format}) with template ${template.id}`);
    const content = await source.read(location);
    const dataSheet = template.interpreter.interpret(content);

    this.logger.info(
      `Imported sheet for ${dataSheet.studentKey} dated ${dataSheet.date}: ${dataSheet.tables.length} tables, ${dataSheet.scalars.size} scalars`
    );
    return dataSheet;
  }

  /**
   * Import several sheets. By default the first failure aborts the batch;
   * with continueOnError each failure is reported in its result instead.
   */
  async importMany(
    locations: readonly string[],
    options: ImportOptions & { continueOnError?: boolean }
  ): Promise<ImportResult[]> {
    const results: ImportResult[] = [];

    for (const location of locations) {
      try {
        results.push({ location, success: true, dataSheet: await this.importSheet(location, options) });
      } catch (error) {
        if (!options.continueOnError || !(error instanceof Error)) {
          throw error;
        }
        this.logger.error(`Failed to import ${location}`, error);
        results.push({ location, success: false, error });
      }
    }

    return results;
  }
}
