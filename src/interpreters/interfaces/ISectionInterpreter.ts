import { Interpretation, RawSheetContent, SectionInterpreterType } from '../../types/interpretation.types';

/**
 * Extracts one family of structured data (a table shape, a tally grid or a set of
 * form fields) from raw sheet content. Implementations hold only their own
 * configuration and never modify the content they are given.
 */
export interface ISectionInterpreter {
  readonly type: SectionInterpreterType;
  interpret(raw: RawSheetContent): Interpretation;
}
