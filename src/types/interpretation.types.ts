// src/types/interpretation.types.ts
import { Scalar, ScalarType } from '../models/Scalar';

/**
 * Grid of cell strings as produced by table detection. Row 0 holds the headers.
 */
export type RawTable = string[][];

/**
 * Content of one scanned sheet as handed over by the OCR collaborator.
 */
export interface RawSheetContent {
  formData: Readonly<Record<string, string>>;
  tables: ReadonlyArray<RawTable>;
}

export type TableRow = Record<string, Scalar>;

export interface InterpretedTable {
  columns: string[];
  data: TableRow[];
}

/**
 * Table as exposed by a finished DataSheet.
 */
export interface ReadonlyInterpretedTable {
  readonly columns: readonly string[];
  readonly data: ReadonlyArray<Readonly<TableRow>>;
}

/**
 * Partial result of a single section interpreter.
 */
export interface Interpretation {
  tables: InterpretedTable[];
  scalars: Record<string, Scalar>;
}

export type SectionInterpreterType = 'table' | 'running_tally' | 'simple_form';

export interface TableInterpreterConfig {
  type: 'table';
  columns: string[];
}

export interface RunningTallyInterpreterConfig {
  type: 'running_tally';
  tallyType: ScalarType;
  choiceOptions: string[];
}

export interface SimpleFormInterpreterConfig {
  type: 'simple_form';
  fields: Record<string, ScalarType>;
}

export type SectionInterpreterConfig =
  | TableInterpreterConfig
  | RunningTallyInterpreterConfig
  | SimpleFormInterpreterConfig;

export interface DataSheetMetadata {
  studentKey: string;
  studentGoal: string;
  date: string;
  timeIn: string;
  timeOut: string;
  measure: string;
}
