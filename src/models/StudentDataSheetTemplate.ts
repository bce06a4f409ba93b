// src/models/StudentDataSheetTemplate.ts
import { DataSheetInterpreter } from '../interpreters/DataSheetInterpreter';
import { ISectionInterpreter } from '../interpreters/interfaces/ISectionInterpreter';
import { SectionInterpreterConfig } from '../types/interpretation.types';

/**
 * A configured template for one kind of student data sheet.
 */
export class StudentDataSheetTemplate {
  readonly id: string;
  readonly name: string;
  /** File the template was loaded from */
  readonly fileLocation: string;
  readonly configs: readonly SectionInterpreterConfig[];
  private readonly sectionInterpreters: readonly ISectionInterpreter[];

  constructor(
    id: string,
    name: string,
    fileLocation: string,
    configs: readonly SectionInterpreterConfig[],
    sectionInterpreters: readonly ISectionInterpreter[]
  ) {
    this.id = id;
    this.name = name;
    this.fileLocation = fileLocation;
    this.configs = [...configs];
    this.sectionInterpreters = [...sectionInterpreters];
  }

  get interpreter(): DataSheetInterpreter {
    return new DataSheetInterpreter(this.sectionInterpreters);
  }
}
