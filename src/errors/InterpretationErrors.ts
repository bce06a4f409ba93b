// src/errors/InterpretationErrors.ts

export type InterpretationErrorCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'MISSING_COLUMN'
  | 'MALFORMED_ROW'
  | 'LABEL_NOT_FOUND'
  | 'INVALID_SCALAR_VALUE'
  | 'INVALID_TEMPLATE_CONFIGURATION'
  | 'TEMPLATE_NOT_FOUND'
  | 'SHEET_SOURCE_ERROR'
  | 'INVALID_CONFIGURATION';

/**
 * Base class for every failure raised while turning sheet content into a data sheet.
 * These describe malformed input or misconfiguration and are never retried.
 */
export abstract class InterpretationError extends Error {
  abstract readonly code: InterpretationErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingRequiredField extends InterpretationError {
  readonly code = 'MISSING_REQUIRED_FIELD';

  constructor(readonly key: string) {
    super(`Required field '${key}' was not found in the sheet's form data`);
  }
}

export class MissingColumn extends InterpretationError {
  readonly code = 'MISSING_COLUMN';

  constructor(readonly column: string, readonly foundHeaders: string[]) {
    super(
      `Expected to see column '${column}' in data sheet but could not find it. ` +
      `Got columns: [${foundHeaders.join(', ')}]`
    );
  }
}

export class MalformedRow extends InterpretationError {
  readonly code = 'MALFORMED_ROW';

  constructor(readonly tableIndex: number, readonly rowIndex: number) {
    super(`Row ${rowIndex} of table ${tableIndex} is too short for the configured columns`);
  }
}

export class LabelNotFound extends InterpretationError {
  readonly code = 'LABEL_NOT_FOUND';

  constructor(readonly label: string) {
    super(`Label '${label}' does not appear in the sheet text`);
  }
}

export class InvalidScalarValue extends InterpretationError {
  readonly code = 'INVALID_SCALAR_VALUE';

  constructor(readonly key: string, readonly value: string, readonly reason: string) {
    super(`Invalid value '${value}' for '${key}': ${reason}`);
  }
}

export class InvalidTemplateConfiguration extends InterpretationError {
  readonly code = 'INVALID_TEMPLATE_CONFIGURATION';

  constructor(readonly source: string, readonly issues: string[]) {
    super(`Invalid template configuration in ${source}: ${issues.join('; ')}`);
  }
}

export class TemplateNotFound extends InterpretationError {
  readonly code = 'TEMPLATE_NOT_FOUND';

  constructor(readonly template: string) {
    super(`No template found for '${template}'`);
  }
}

export class SheetSourceError extends InterpretationError {
  readonly code = 'SHEET_SOURCE_ERROR';

  constructor(readonly location: string, readonly reason: string) {
    super(`Could not read sheet content from ${location}: ${reason}`);
  }
}

export class InvalidConfiguration extends InterpretationError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(readonly source: string, readonly issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
  }
}
