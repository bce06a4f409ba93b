// src/tests/RunningTallyInterpreter.test.ts
import { InvalidScalarValue } from '../errors/InterpretationErrors';
import { RunningTallyInterpreter, TALLY_COLUMN } from '../interpreters/RunningTallyInterpreter';
import { Scalar, ScalarType } from '../models/Scalar';
import { sheetContent } from './helpers';

describe('RunningTallyInterpreter', () => {
  it('should read one mark per cell in row-major order', () => {
    const interpreter = new RunningTallyInterpreter(ScalarType.CHOICE, ['Y', 'N']);
    const result = interpreter.interpret(sheetContent({}, [['Y', 'N'], ['Y', 'Y']]));

    expect(result.scalars).toEqual({});
    expect(result.tables).toHaveLength(1);
    expect(result.tables[0].columns).toEqual([TALLY_COLUMN]);
    expect(result.tables[0].data.map(row => row[TALLY_COLUMN].value)).toEqual(['Y', 'N', 'Y', 'Y']);
    expect(
      result.tables[0].data[1][TALLY_COLUMN].equals(new Scalar('Tally', 'N', ScalarType.CHOICE, ['Y', 'N']))
    ).toBe(true);
  });

  it('should split multi-character cells into separate marks', () => {
    const interpreter = new RunningTallyInterpreter(ScalarType.TEXT);
    const result = interpreter.interpret(sheetContent({}, [['YN', ''], ['P']]));

    expect(result.tables[0].data.map(row => row[TALLY_COLUMN].value)).toEqual(['Y', 'N', 'P']);
  });

  it('should count every character across the table', () => {
    const raw = [['ab', 'c'], ['', 'def'], ['g']];
    const result = new RunningTallyInterpreter(ScalarType.TEXT).interpret(sheetContent({}, raw));

    expect(result.tables[0].data).toHaveLength(7);
  });

  it('should keep empty tables', () => {
    const interpreter = new RunningTallyInterpreter(ScalarType.TEXT);
    const result = interpreter.interpret(sheetContent({}, [], [['1']], [['', '']]));

    expect(result.tables).toHaveLength(3);
    expect(result.tables[0]).toEqual({ columns: ['Tally'], data: [] });
    expect(result.tables[1].data).toHaveLength(1);
    expect(result.tables[2].data).toEqual([]);
  });

  it('should tag marks with the configured tally type', () => {
    const result = new RunningTallyInterpreter(ScalarType.INT).interpret(sheetContent({}, [['1', '0']]));

    expect(result.tables[0].data.map(row => row[TALLY_COLUMN].type)).toEqual([ScalarType.INT, ScalarType.INT]);
  });

  it('should reject marks outside the choice options', () => {
    const interpreter = new RunningTallyInterpreter(ScalarType.CHOICE, ['Y', 'N']);

    expect(() => interpreter.interpret(sheetContent({}, [['Y', 'X']]))).toThrow(InvalidScalarValue);
  });
});
