import { describeIssues, InterpreterEntry, interpreterEntrySchema } from '../config/template-schema';
import { InvalidTemplateConfiguration } from '../errors/InterpretationErrors';
import { SectionInterpreterConfig } from '../types/interpretation.types';
import { DataSheetInterpreter } from './DataSheetInterpreter';
import { ISectionInterpreter } from './interfaces/ISectionInterpreter';
import { RunningTallyInterpreter } from './RunningTallyInterpreter';
import { SimpleFormInterpreter } from './SimpleFormInterpreter';
import { TableInterpreter } from './TableInterpreter';

export function createSectionInterpreter(config: SectionInterpreterConfig): ISectionInterpreter {
  switch (config.type) {
    case 'table':
      return new TableInterpreter(config.columns);

    case 'running_tally':
      return new RunningTallyInterpreter(config.tallyType, config.choiceOptions);

    case 'simple_form':
      return new SimpleFormInterpreter(config.fields);
  }
}

/**
 * Map a validated template entry onto the internal configuration union.
 */
export function toSectionInterpreterConfig(entry: InterpreterEntry): SectionInterpreterConfig {
  switch (entry.type) {
    case 'table':
      return { type: 'table', columns: entry.configuration.columns };

    case 'running_tally':
      return {
        type: 'running_tally',
        tallyType: entry.configuration.tally_type,
        choiceOptions: entry.configuration.choice_options
      };

    case 'simple_form':
      return { type: 'simple_form', fields: entry.configuration.fields };
  }
}

/**
 * Validate a list of template entries (as read from JSON) and build their
 * section interpreters in order.
 */
export function createSectionInterpreters(entries: unknown, source = 'template'): ISectionInterpreter[] {
  const parsed = interpreterEntrySchema.array().safeParse(entries);
  if (!parsed.success) {
    throw new InvalidTemplateConfiguration(source, describeIssues(parsed.error));
  }
  return parsed.data.map(entry => createSectionInterpreter(toSectionInterpreterConfig(entry)));
}

export function createDataSheetInterpreter(entries: unknown, source = 'template'): DataSheetInterpreter {
  return new DataSheetInterpreter(createSectionInterpreters(entries, source));
}
