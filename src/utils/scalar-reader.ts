// src/utils/scalar-reader.ts
import { InvalidScalarValue } from '../errors/InterpretationErrors';
import { Scalar, ScalarType } from '../models/Scalar';
import { CalendarDate, Validators } from './validation';

export type TypedScalarValue =
  | { type: ScalarType.TEXT; value: string }
  | { type: ScalarType.CHOICE; value: string }
  | { type: ScalarType.INT; value: number }
  | { type: ScalarType.BOOLEAN; value: boolean }
  | { type: ScalarType.DATE; value: CalendarDate };

/**
 * Typed view of a scalar's raw string according to its declared type.
 * Interpreters never coerce values, so this is where a bad INT or DATE surfaces.
 */
export function readScalarValue(scalar: Scalar): TypedScalarValue {
  switch (scalar.type) {
    case ScalarType.TEXT:
      return { type: ScalarType.TEXT, value: scalar.value };

    case ScalarType.CHOICE:
      return { type: ScalarType.CHOICE, value: scalar.value };

    case ScalarType.INT: {
      if (!Validators.isIntegerText(scalar.value)) {
        throw new InvalidScalarValue(scalar.key, scalar.value, 'not a whole number');
      }
      return { type: ScalarType.INT, value: parseInt(scalar.value.trim(), 10) };
    }

    case ScalarType.BOOLEAN: {
      const parsed = Validators.parseBoolean(scalar.value);
      if (parsed === null) {
        throw new InvalidScalarValue(scalar.key, scalar.value, 'not a yes/no value');
      }
      return { type: ScalarType.BOOLEAN, value: parsed };
    }

    case ScalarType.DATE: {
      const parsed = Validators.parseSheetDate(scalar.value);
      if (!parsed) {
        throw new InvalidScalarValue(scalar.key, scalar.value, 'not a date (expected M/D/YYYY)');
      }
      return { type: ScalarType.DATE, value: parsed };
    }
  }
}
