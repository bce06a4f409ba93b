// src/models/DataSheet.ts
import { DataSheetMetadata, InterpretedTable, ReadonlyInterpretedTable } from '../types/interpretation.types';
import { Scalar, ScalarJson } from './Scalar';

export interface InterpretedTableJson {
  columns: string[];
  data: Array<Record<string, ScalarJson>>;
}

export interface DataSheetJson extends DataSheetMetadata {
  tables: InterpretedTableJson[];
  scalars: Record<string, ScalarJson>;
}

/**
 * Structured record of one student's session sheet.
 *
 * Filled in by DataSheetInterpreter during a single pass; callers only read it.
 */
export class DataSheet {
  private readonly metadata: DataSheetMetadata;
  private readonly tableList: ReadonlyInterpretedTable[] = [];
  private readonly scalarMap = new Map<string, Scalar>();

  constructor(metadata: DataSheetMetadata) {
    this.metadata = { ...metadata };
  }

  get studentKey(): string {
    return this.metadata.studentKey;
  }

  get studentGoal(): string {
    return this.metadata.studentGoal;
  }

  get date(): string {
    return this.metadata.date;
  }

  get timeIn(): string {
    return this.metadata.timeIn;
  }

  get timeOut(): string {
    return this.metadata.timeOut;
  }

  get measure(): string {
    return this.metadata.measure;
  }

  get tables(): ReadonlyArray<ReadonlyInterpretedTable> {
    return this.tableList;
  }

  get scalars(): ReadonlyMap<string, Scalar> {
    return this.scalarMap;
  }

  /**
   * Stores a frozen copy; later changes to the given table do not reach the sheet.
   */
  registerTable(table: InterpretedTable): void {
    this.tableList.push(Object.freeze({
      columns: Object.freeze([...table.columns]),
      data: Object.freeze(table.data.map(row => Object.freeze({ ...row })))
    }));
  }

  /**
   * Later registrations replace earlier ones with the same key.
   */
  registerScalar(key: string, scalar: Scalar): void {
    this.scalarMap.set(key, scalar);
  }

  toJSON(): DataSheetJson {
    const scalars: Record<string, ScalarJson> = {};
    for (const [key, scalar] of this.scalarMap) {
      scalars[key] = scalar.toJSON();
    }

    return {
      ...this.metadata,
      tables: this.tableList.map(table => ({
        columns: [...table.columns],
        data: table.data.map(row => {
          const jsonRow: Record<string, ScalarJson> = {};
          for (const [column, scalar] of Object.entries(row)) {
            jsonRow[column] = scalar.toJSON();
          }
          return jsonRow;
        })
      })),
      scalars
    };
  }
}
