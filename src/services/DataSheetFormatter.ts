import chalk from 'chalk';
import { DataSheet } from '../models/DataSheet';
import { SessionSummary } from './SessionSummaryService';
import { TypedScalarValue } from '../utils/scalar-reader';
import { ScalarType } from '../models/Scalar';

export interface FormatOptions {
  color?: boolean;
}

function palette(options: FormatOptions) {
  return new chalk.Instance({ level: options.color ? 1 : 0 });
}

/**
 * Render a data sheet for the console.
 */
export function formatDataSheet(dataSheet: DataSheet, options: FormatOptions = {}): string {
  const c = palette(options);
  const lines: string[] = [
    `${c.bold('Student:')} ${dataSheet.studentKey}`,
    `${c.bold('Date:')} ${dataSheet.date} (${dataSheet.timeIn} - ${dataSheet.timeOut})`,
    `${c.bold('Goal:')} ${dataSheet.studentGoal}`,
    `${c.bold('Measure:')} ${dataSheet.measure}`
  ];

  dataSheet.tables.forEach((table, i) => {
    lines.push(c.cyan(`Table ${i + 1} [${table.columns.join(' | ')}]`));
    for (const row of table.data) {
      lines.push(`  ${table.columns.map(column => row[column].value).join(' | ')}`);
    }
  });

  if (dataSheet.scalars.size > 0) {
    lines.push(c.cyan('Scalars'));
    for (const [key, scalar] of dataSheet.scalars) {
      lines.push(`  ${key}: ${scalar.value} ${c.gray(`(${scalar.type})`)}`);
    }
  }

  return lines.join('\n');
}

function formatTypedValue(typed: TypedScalarValue): string {
  switch (typed.type) {
    case ScalarType.DATE:
      return `${typed.value.month}/${typed.value.day}/${typed.value.year}`;
    case ScalarType.BOOLEAN:
      return typed.value ? 'yes' : 'no';
    default:
      return String(typed.value);
  }
}

export function formatSummary(summary: SessionSummary, options: FormatOptions = {}): string {
  const c = palette(options);
  const lines: string[] = [c.bold(`Summary for ${summary.studentKey} on ${summary.date}`)];

  for (const table of summary.tables) {
    const parts = [`${table.rowCount} rows`];
    for (const [mark, count] of Object.entries(table.markCounts)) {
      parts.push(`${mark}=${count}`);
    }
    for (const [column, total] of Object.entries(table.columnTotals)) {
      parts.push(`${column} total=${total}`);
    }
    lines.push(`  Table ${table.index + 1}: ${parts.join(', ')}`);
  }

  for (const [key, typed] of Object.entries(summary.scalars)) {
    lines.push(`  ${key}: ${formatTypedValue(typed)}`);
  }

  return lines.join('\n');
}
