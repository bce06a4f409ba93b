// src/tests/SessionSummaryService.test.ts
import { InvalidScalarValue } from '../errors/InterpretationErrors';
import { DataSheetInterpreter } from '../interpreters/DataSheetInterpreter';
import { RunningTallyInterpreter } from '../interpreters/RunningTallyInterpreter';
import { SimpleFormInterpreter } from '../interpreters/SimpleFormInterpreter';
import { TableInterpreter } from '../interpreters/TableInterpreter';
import { DataSheet } from '../models/DataSheet';
import { ScalarType } from '../models/Scalar';
import { formatDataSheet, formatSummary } from '../services/DataSheetFormatter';
import { summarizeDataSheet } from '../services/SessionSummaryService';
import { SESSION_FORM_DATA, sheetContent } from './helpers';

function wordPromptingSheet(extraFields: Record<string, string> = {}): DataSheet {
  const interpreter = new DataSheetInterpreter([
    new TableInterpreter(['Word', 'Times Prompted', 'Times w/out Prompt']),
    new SimpleFormInterpreter({
      'Total Repetitions': ScalarType.INT,
      'Reinforcer Used': ScalarType.BOOLEAN,
      'Next Session': ScalarType.DATE
    })
  ]);
  return interpreter.interpret(
    sheetContent(
      { ...SESSION_FORM_DATA, 'Total Repetitions': '6', 'Reinforcer Used': 'yes', ...extraFields },
      [['Word', 'Times Prompted', 'Times w/out Prompt'], ['Ball', '2', '1'], ['Cup', '0', '3']]
    )
  );
}

function tallySheet(): DataSheet {
  return new DataSheetInterpreter([new RunningTallyInterpreter(ScalarType.CHOICE, ['Y', 'N'])]).interpret(
    sheetContent({ ...SESSION_FORM_DATA }, [['Y', 'N'], ['Y', 'Y']])
  );
}

describe('summarizeDataSheet', () => {
  it('should total integer columns and read typed scalars', () => {
    const summary = summarizeDataSheet(wordPromptingSheet());

    expect(summary).toEqual({
      studentKey: 'JA',
      date: '10/3/2025',
      tables: [
        {
          index: 0,
          columns: ['Word', 'Times Prompted', 'Times w/out Prompt'],
          rowCount: 2,
          markCounts: {},
          columnTotals: { 'Times Prompted': 2, 'Times w/out Prompt': 4 }
        }
      ],
      scalars: {
        'Total Repetitions': { type: ScalarType.INT, value: 6 },
        'Reinforcer Used': { type: ScalarType.BOOLEAN, value: true }
      }
    });
  });

  it('should count tally marks', () => {
    const [table] = summarizeDataSheet(tallySheet()).tables;

    expect(table.markCounts).toEqual({ Y: 3, N: 1 });
    expect(table.columnTotals).toEqual({});
    expect(table.rowCount).toBe(4);
  });

  it('should skip blank cells when totaling', () => {
    const dataSheet = new DataSheetInterpreter([new TableInterpreter(['Count'])]).interpret(
      sheetContent({ ...SESSION_FORM_DATA }, [['Count'], ['3'], [' '], ['-1']])
    );

    expect(summarizeDataSheet(dataSheet).tables[0].columnTotals).toEqual({ Count: 2 });
  });

  it('should fail when a scalar does not match its type', () => {
    expect(() => summarizeDataSheet(wordPromptingSheet({ 'Total Repetitions': 'six' }))).toThrow(InvalidScalarValue);
  });
});

describe('formatDataSheet', () => {
  it('should render metadata, tables and scalars', () => {
    expect(formatDataSheet(wordPromptingSheet(), { color: false })).toBe(
      [
        'Student: JA',
        'Date: 10/3/2025 (11:00 AM - 11:25 AM)',
        'Goal: identify cause',
        'Measure: accuracy',
        'Table 1 [Word | Times Prompted | Times w/out Prompt]',
        '  Ball | 2 | 1',
        '  Cup | 0 | 3',
        'Scalars',
        '  Total Repetitions: 6 (INT)',
        '  Reinforcer Used: yes (BOOLEAN)'
      ].join('\n')
    );
  });

  it('should leave out the scalar block when there are none', () => {
    const lines = formatDataSheet(tallySheet()).split('\n');

    expect(lines[4]).toBe('Table 1 [Tally]');
    expect(lines).toHaveLength(9);
  });
});

describe('formatSummary', () => {
  it('should render totals and typed values', () => {
    const summary = summarizeDataSheet(wordPromptingSheet({ 'Next Session': '2025-10-10', 'Reinforcer Used': 'n' }));

    expect(formatSummary(summary)).toBe(
      [
        'Summary for JA on 10/3/2025',
        '  Table 1: 2 rows, Times Prompted total=2, Times w/out Prompt total=4',
        '  Total Repetitions: 6',
        '  Reinforcer Used: no',
        '  Next Session: 10/10/2025'
      ].join('\n')
    );
  });

  it('should render tally counts', () => {
    expect(formatSummary(summarizeDataSheet(tallySheet()), { color: false })).toBe(
      ['Summary for JA on 10/3/2025', '  Table 1: 4 rows, Y=3, N=1'].join('\n')
    );
  });
});
