import { Scalar, ScalarType } from '../models/Scalar';
import { Interpretation, InterpretedTable, RawSheetContent, RawTable } from '../types/interpretation.types';
import { Logger } from '../utils/logger';
import { ISectionInterpreter } from './interfaces/ISectionInterpreter';

export const TALLY_COLUMN = 'Tally';

/**
 * Interprets grids of tally marks recorded as they happen during a session
 * (Y / N / P for yes, no, prompted and the like).
 *
 * All cells of a table are read as one running string, row by row and left to
 * right, and every character is one mark. A cell holding "YN" therefore counts
 * as two marks.
 */
export class RunningTallyInterpreter implements ISectionInterpreter {
  readonly type = 'running_tally' as const;
  private readonly tallyType: ScalarType;
  private readonly choiceOptions: readonly string[];
  private readonly logger = new Logger('RunningTallyInterpreter');

  constructor(tallyType: ScalarType, choiceOptions: string[] = []) {
    this.tallyType = tallyType;
    this.choiceOptions = [...choiceOptions];
  }

  interpret(raw: RawSheetContent): Interpretation {
    const tables = raw.tables.map(table => this.interpretTable(table));
    return { tables, scalars: {} };
  }

  private interpretTable(rawTable: RawTable): InterpretedTable {
    const tallyString = rawTable.map(row => row.join('')).join('');

    const data = Array.from(tallyString, mark => ({
      [TALLY_COLUMN]: new Scalar(TALLY_COLUMN, mark, this.tallyType, this.choiceOptions)
    }));

    this.logger.debug(`Read ${data.length} tally marks from ${rawTable.length} rows`);

    return {
      columns: [TALLY_COLUMN],
      data
    };
  }
}
