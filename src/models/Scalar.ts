// src/models/Scalar.ts
import { InvalidScalarValue } from '../errors/InterpretationErrors';

export enum ScalarType {
  TEXT = 'TEXT',
  INT = 'INT',
  CHOICE = 'CHOICE',
  DATE = 'DATE',
  BOOLEAN = 'BOOLEAN'
}

export interface ScalarJson {
  key: string;
  value: string;
  type: ScalarType;
  choiceOptions: string[];
}

/**
 * A single labeled value read off a data sheet.
 *
 * The value is kept as the raw extracted string; use `readScalarValue` for a typed view.
 * CHOICE scalars are checked against their options when created.
 */
export class Scalar {
  readonly key: string;
  readonly value: string;
  readonly type: ScalarType;
  readonly choiceOptions: readonly string[];

  constructor(key: string, value: string, type: ScalarType, choiceOptions: readonly string[] = []) {
    if (!key) {
      throw new InvalidScalarValue(key, value, 'scalar key must not be empty');
    }

    if (type === ScalarType.CHOICE) {
      if (choiceOptions.length === 0) {
        throw new InvalidScalarValue(key, value, 'CHOICE scalars need at least one choice option');
      }
      if (!choiceOptions.includes(value)) {
        throw new InvalidScalarValue(key, value, `expected one of [${choiceOptions.join(', ')}]`);
      }
    }

    this.key = key;
    this.value = value;
    this.type = type;
    this.choiceOptions = Object.freeze([...choiceOptions]);
    Object.freeze(this);
  }

  static text(key: string, value: string): Scalar {
    return new Scalar(key, value, ScalarType.TEXT);
  }

  equals(other: Scalar): boolean {
    return (
      this.key === other.key &&
      this.value === other.value &&
      this.type === other.type &&
      this.choiceOptions.length === other.choiceOptions.length &&
      this.choiceOptions.every((option, i) => option === other.choiceOptions[i])
    );
  }

  toJSON(): ScalarJson {
    return {
      key: this.key,
      value: this.value,
      type: this.type,
      choiceOptions: [...this.choiceOptions]
    };
  }
}
