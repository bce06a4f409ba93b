import { Scalar, ScalarType } from '../models/Scalar';
import { Interpretation, RawSheetContent } from '../types/interpretation.types';
import { ISectionInterpreter } from './interfaces/ISectionInterpreter';

/**
 * Picks named form fields such as 'Total Repetitions' or 'Times w/Prompting'
 * out of the sheet's form data.
 *
 * Values are kept as read; the configured type is attached but not applied.
 */
export class SimpleFormInterpreter implements ISectionInterpreter {
  readonly type = 'simple_form' as const;
  private readonly fields: ReadonlyMap<string, ScalarType>;

  constructor(fields: Record<string, ScalarType>) {
    this.fields = new Map(Object.entries(fields));
  }

  interpret(raw: RawSheetContent): Interpretation {
    const scalars: Record<string, Scalar> = {};

    for (const [key, value] of Object.entries(raw.formData)) {
      const fieldType = this.fields.get(key);
      if (fieldType !== undefined) {
        scalars[key] = new Scalar(key, value, fieldType);
      }
    }

    return { tables: [], scalars };
  }
}
