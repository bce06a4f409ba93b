import { DataSheet } from '../models/DataSheet';
import { TALLY_COLUMN } from '../interpreters/RunningTallyInterpreter';
import { ReadonlyInterpretedTable } from '../types/interpretation.types';
import { readScalarValue, TypedScalarValue } from '../utils/scalar-reader';
import { Validators } from '../utils/validation';

export interface TableSummary {
  index: number;
  columns: string[];
  rowCount: number;
  /** Tally tables only: how often each mark was recorded */
  markCounts: Record<string, number>;
  /** Sums of columns whose non-blank cells are all whole numbers */
  columnTotals: Record<string, number>;
}

export interface SessionSummary {
  studentKey: string;
  date: string;
  tables: TableSummary[];
  scalars: Record<string, TypedScalarValue>;
}

function isTallyTable(table: ReadonlyInterpretedTable): boolean {
  return table.columns.length === 1 && table.columns[0] === TALLY_COLUMN;
}

function summarizeTable(table: ReadonlyInterpretedTable, index: number): TableSummary {
  const markCounts: Record<string, number> = {};
  const columnTotals: Record<string, number> = {};

  if (isTallyTable(table)) {
    for (const row of table.data) {
      const mark = row[TALLY_COLUMN].value;
      markCounts[mark] = (markCounts[mark] ?? 0) + 1;
    }
  } else {
    for (const column of table.columns) {
      const values = table.data
        .map(row => row[column].value.trim())
        .filter(value => value !== '');

      if (values.length > 0 && values.every(value => Validators.isIntegerText(value))) {
        columnTotals[column] = values.reduce((sum, value) => sum + parseInt(value, 10), 0);
      }
    }
  }

  return {
    index,
    columns: [...table.columns],
    rowCount: table.data.length,
    markCounts,
    columnTotals
  };
}

/**
 * Totals for reporting: tally counts, integer column sums and typed scalar values.
 * A scalar whose text does not match its declared type fails the summary.
 */
export function summarizeDataSheet(dataSheet: DataSheet): SessionSummary {
  const scalars: Record<string, TypedScalarValue> = {};
  for (const [key, scalar] of dataSheet.scalars) {
    scalars[key] = readScalarValue(scalar);
  }

  return {
    studentKey: dataSheet.studentKey,
    date: dataSheet.date,
    tables: dataSheet.tables.map(summarizeTable),
    scalars
  };
}
