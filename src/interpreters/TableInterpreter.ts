import { MalformedRow, MissingColumn } from '../errors/InterpretationErrors';
import { Scalar } from '../models/Scalar';
import {
  Interpretation,
  InterpretedTable,
  RawSheetContent,
  RawTable,
  TableRow
} from '../types/interpretation.types';
import { Logger } from '../utils/logger';
import { ISectionInterpreter } from './interfaces/ISectionInterpreter';

/**
 * Interprets tables that share a known column layout, e.g. 'Word',
 * 'Times Prompted', 'Times w/out Prompt'.
 *
 * Every table on the sheet is expected to carry all configured columns in its
 * header row; the header order does not matter and extra columns are ignored.
 */
export class TableInterpreter implements ISectionInterpreter {
  readonly type = 'table' as const;
  private readonly columns: readonly string[];
  private readonly logger = new Logger('TableInterpreter');

  constructor(columns: string[]) {
    this.columns = [...columns];
  }

  interpret(raw: RawSheetContent): Interpretation {
    const tables = raw.tables.map((table, tableIndex) => this.interpretTable(table, tableIndex));
    return { tables, scalars: {} };
  }

  private interpretTable(rawTable: RawTable, tableIndex: number): InterpretedTable {
    const headers = rawTable.length > 0 ? rawTable[0] : [];

    const columnIndexByName = new Map<string, number>();
    for (const column of this.columns) {
      const index = headers.indexOf(column);
      if (index === -1) {
        throw new MissingColumn(column, [...headers]);
      }
      columnIndexByName.set(column, index);
    }

    const data: TableRow[] = [];
    for (let rowIndex = 1; rowIndex < rawTable.length; rowIndex++) {
      const cells = rawTable[rowIndex];
      const row: TableRow = {};

      for (const [column, columnIndex] of columnIndexByName) {
        if (columnIndex >= cells.length) {
          throw new MalformedRow(tableIndex, rowIndex);
        }
        row[column] = Scalar.text(column, cells[columnIndex]);
      }

      data.push(row);
    }

    this.logger.debug(`Table ${tableIndex}: ${data.length} rows across ${this.columns.length} columns`);

    return {
      columns: [...this.columns],
      data
    };
  }
}
