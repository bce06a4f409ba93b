import { MissingRequiredField } from '../errors/InterpretationErrors';
import { DataSheet } from '../models/DataSheet';
import { DataSheetMetadata, RawSheetContent } from '../types/interpretation.types';
import { Logger } from '../utils/logger';
import { ISectionInterpreter } from './interfaces/ISectionInterpreter';

/**
 * Form labels every session sheet must carry, in the order they are checked.
 */
export const REQUIRED_FIELDS = ['Student Key', 'Date', 'Time IN', 'Time OUT', 'Goal', 'Measure'] as const;

/**
 * Interprets a whole student data sheet.
 *
 * The session metadata (student, date, times, goal, measure) is read from the
 * form data, then every configured section interpreter runs over the same raw
 * content and its tables and scalars are merged into one DataSheet.
 *
 * Expected sheet layout:
 *
 * ```
 * | JA                                                 Date: 10/3/2025  |
 * | Time IN: 11:00 AM                               Time OUT: 11:25 AM  |
 * | Goal: By October, {JA} will identify a possible cause of a given    |
 * | emotion from an array of 5-6 picture choices ...                    |
 * | Measure: Identify the cause of emotion from a picture ...           |
 * | Data:                                                               |
 * | <tables and form fields handled by the section interpreters>        |
 * ```
 *
 * Tables accumulate in interpreter order. When two interpreters produce a scalar
 * with the same key the later one wins.
 */
export class DataSheetInterpreter {
  private readonly sectionInterpreters: ReadonlyArray<ISectionInterpreter>;
  private readonly logger = new Logger('DataSheetInterpreter');

  constructor(sectionInterpreters: ReadonlyArray<ISectionInterpreter>) {
    this.sectionInterpreters = sectionInterpreters;
  }

  interpret(raw: RawSheetContent): DataSheet {
    const dataSheet = new DataSheet(this.readMetadata(raw));
    this.logger.debug(
      `Interpreting sheet for ${dataSheet.studentKey} on ${dataSheet.date} with ${this.sectionInterpreters.length} section interpreters`
    );

    for (const interpreter of this.sectionInterpreters) {
      const interpretation = interpreter.interpret(raw);

      for (const table of interpretation.tables) {
        dataSheet.registerTable(table);
      }

      for (const [key, scalar] of Object.entries(interpretation.scalars)) {
        if (dataSheet.scalars.has(key)) {
          this.logger.debug(`Scalar '${key}' from ${interpreter.type} replaces an earlier value`);
        }
        dataSheet.registerScalar(key, scalar);
      }
    }

    this.logger.debug(
      `Interpreted ${dataSheet.tables.length} tables and ${dataSheet.scalars.size} scalars for ${dataSheet.studentKey}`
    );
    return dataSheet;
  }

  private readMetadata(raw: RawSheetContent): DataSheetMetadata {
    const read = (label: (typeof REQUIRED_FIELDS)[number]): string => {
      if (!Object.prototype.hasOwnProperty.call(raw.formData, label)) {
        throw new MissingRequiredField(label);
      }
      return raw.formData[label];
    };

    return {
      studentKey: read('Student Key'),
      date: read('Date'),
      timeIn: read('Time IN'),
      timeOut: read('Time OUT'),
      studentGoal: read('Goal'),
      measure: read('Measure')
    };
  }
}
