import * as fs from 'fs';
import { z } from 'zod';
import { describeIssues } from '../config/template-schema';
import { SheetSourceError } from '../errors/InterpretationErrors';
import { toRawSheetContent } from '../parsers/LabelSplitter';
import { RawSheetContent } from '../types/interpretation.types';
import { Logger } from '../utils/logger';
import { TextractResponseConverter, textractResponseSchema } from './TextractResponseConverter';

export type SheetSourceFormat = 'raw' | 'textract' | 'text';

export const SHEET_SOURCE_FORMATS: readonly SheetSourceFormat[] = ['raw', 'textract', 'text'];

/**
 * Where sheet content comes from. Implementations do the file reading so the
 * interpreters only ever see in-memory content.
 */
export interface SheetContentSource {
  readonly format: SheetSourceFormat;
  read(location: string): Promise<RawSheetContent>;
}

export const rawSheetContentSchema = z.object({
  formData: z.record(z.string()),
  tables: z.array(z.array(z.array(z.string()))).default([])
});

async function readText(location: string): Promise<string> {
  try {
    return await fs.promises.readFile(location, 'utf-8');
  } catch (error) {
    throw new SheetSourceError(location, error instanceof Error ? error.message : String(error));
  }
}

async function readJson(location: string): Promise<unknown> {
  const text = await readText(location);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SheetSourceError(location, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
}

/**
 * JSON file already in sheet content shape: { formData, tables }
 */
export class RawJsonSheetSource implements SheetContentSource {
  readonly format = 'raw' as const;

  async read(location: string): Promise<RawSheetContent> {
    const parsed = rawSheetContentSchema.safeParse(await readJson(location));
    if (!parsed.success) {
      throw new SheetSourceError(location, describeIssues(parsed.error).join('; '));
    }
    return parsed.data;
  }
}

/**
 * Saved Textract AnalyzeDocument response (FORMS and TABLES features).
 */
export class TextractJsonSheetSource implements SheetContentSource {
  readonly format = 'textract' as const;
  private readonly logger = new Logger('TextractJsonSheetSource');

  async read(location: string): Promise<RawSheetContent> {
    const parsed = textractResponseSchema.safeParse(await readJson(location));
    if (!parsed.success) {
      throw new SheetSourceError(location, describeIssues(parsed.error).join('; '));
    }

    const content = new TextractResponseConverter(parsed.data).convert();
    this.logger.debug(
      `Read ${Object.keys(content.formData).length} form fields and ${content.tables.length} tables from ${location}`
    );
    return content;
  }
}

/**
 * Plain OCR text split by the given labels.
 */
export class LabelledTextSheetSource implements SheetContentSource {
  readonly format = 'text' as const;
  private readonly labels: readonly string[];

  constructor(labels: readonly string[]) {
    this.labels = [...labels];
  }

  async read(location: string): Promise<RawSheetContent> {
    return toRawSheetContent(await readText(location), this.labels);
  }
}

export function createSheetSource(format: SheetSourceFormat, labels: readonly string[] = []): SheetContentSource {
  switch (format) {
    case 'raw':
      return new RawJsonSheetSource();
    case 'textract':
      return new TextractJsonSheetSource();
    case 'text':
      return new LabelledTextSheetSource(labels);
  }
}
