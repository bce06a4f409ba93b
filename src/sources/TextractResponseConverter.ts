import { z } from 'zod';
import { RawSheetContent, RawTable } from '../types/interpretation.types';

const relationshipSchema = z.object({
  Type: z.string(),
  Ids: z.array(z.string())
});

const blockSchema = z
  .object({
    Id: z.string(),
    BlockType: z.string(),
    Text: z.string().optional(),
    EntityTypes: z.array(z.string()).optional(),
    Relationships: z.array(relationshipSchema).optional(),
    RowIndex: z.number().int().positive().optional(),
    ColumnIndex: z.number().int().positive().optional()
  })
  .passthrough();

/**
 * The parts of an AnalyzeDocument (FORMS + TABLES) response this converter reads.
 */
export const textractResponseSchema = z
  .object({
    Blocks: z.array(blockSchema)
  })
  .passthrough();

export type TextractBlock = z.infer<typeof blockSchema>;
export type TextractResponse = z.infer<typeof textractResponseSchema>;

/**
 * Rebuilds form fields and table grids from a Textract block graph.
 *
 * Form keys lose a trailing ':' so "Date:", "Date :" and "Date" land on the same field.
 * Table cells are placed by their 1-based row/column indexes; gaps become ''.
 */
export class TextractResponseConverter {
  private readonly blocks: TextractBlock[];
  private readonly blocksById: Map<string, TextractBlock>;

  constructor(response: TextractResponse) {
    this.blocks = response.Blocks;
    this.blocksById = new Map(response.Blocks.map(block => [block.Id, block]));
  }

  convert(): RawSheetContent {
    return {
      formData: this.extractFormData(),
      tables: this.extractTables()
    };
  }

  extractFormData(): Record<string, string> {
    const formFields: Record<string, string> = {};

    for (const block of this.blocks) {
      if (block.BlockType !== 'KEY_VALUE_SET' || !block.EntityTypes?.includes('KEY')) {
        continue;
      }

      const key = this.wordText(block).replace(/\s*:$/, '').trim();
      if (!key) {
        continue;
      }

      const valueBlock = this.related(block, 'VALUE').find(
        candidate => candidate.BlockType === 'KEY_VALUE_SET' && candidate.EntityTypes?.includes('VALUE')
      );

      formFields[key] = valueBlock ? this.wordText(valueBlock) : '';
    }

    return formFields;
  }

  extractTables(): RawTable[] {
    return this.blocks
      .filter(block => block.BlockType === 'TABLE')
      .map(block => this.extractTable(block));
  }

  private extractTable(tableBlock: TextractBlock): RawTable {
    const table: RawTable = [];

    for (const relationship of tableBlock.Relationships ?? []) {
      if (relationship.Type !== 'CHILD') {
        continue;
      }

      const rows = new Map<number, Map<number, string>>();
      for (const id of relationship.Ids) {
        const cell = this.blocksById.get(id);
        if (!cell || cell.BlockType !== 'CELL' || cell.RowIndex === undefined || cell.ColumnIndex === undefined) {
          continue;
        }
        const row = rows.get(cell.RowIndex - 1) ?? new Map<number, string>();
        row.set(cell.ColumnIndex - 1, this.wordText(cell));
        rows.set(cell.RowIndex - 1, row);
      }

      const maxRow = rows.size > 0 ? Math.max(...rows.keys()) : -1;
      for (let rowIndex = 0; rowIndex <= maxRow; rowIndex++) {
        const row = rows.get(rowIndex);
        if (!row) {
          table.push([]);
          continue;
        }
        const maxCol = Math.max(...row.keys());
        const cells: string[] = [];
        for (let colIndex = 0; colIndex <= maxCol; colIndex++) {
          cells.push(row.get(colIndex) ?? '');
        }
        table.push(cells);
      }
    }

    return table;
  }

  private related(block: TextractBlock, relationshipType: string): TextractBlock[] {
    const related: TextractBlock[] = [];
    for (const relationship of block.Relationships ?? []) {
      if (relationship.Type !== relationshipType) {
        continue;
      }
      for (const id of relationship.Ids) {
        const target = this.blocksById.get(id);
        if (target) {
          related.push(target);
        }
      }
    }
    return related;
  }

  private wordText(block: TextractBlock): string {
    return this.related(block, 'CHILD')
      .filter(child => child.BlockType === 'WORD')
      .map(child => child.Text ?? '')
      .join(' ')
      .trim();
  }
}
