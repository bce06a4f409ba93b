// src/index.ts
export * from './errors/InterpretationErrors';
export { Scalar, ScalarType } from './models/Scalar';
export type { ScalarJson } from './models/Scalar';
export { DataSheet } from './models/DataSheet';
export type { DataSheetJson, InterpretedTableJson } from './models/DataSheet';
export { StudentDataSheetTemplate } from './models/StudentDataSheetTemplate';
export * from './types/interpretation.types';
export type { ISectionInterpreter } from './interpreters/interfaces/ISectionInterpreter';
export { TableInterpreter } from './interpreters/TableInterpreter';
export { RunningTallyInterpreter, TALLY_COLUMN } from './interpreters/RunningTallyInterpreter';
export { SimpleFormInterpreter } from './interpreters/SimpleFormInterpreter';
export { DataSheetInterpreter, REQUIRED_FIELDS } from './interpreters/DataSheetInterpreter';
export {
  createSectionInterpreter,
  createSectionInterpreters,
  createDataSheetInterpreter,
  toSectionInterpreterConfig
} from './interpreters/InterpreterFactory';
export { interpreterEntrySchema, templateFileSchema } from './config/template-schema';
export type { InterpreterEntry, TemplateFile } from './config/template-schema';
export { splitByLabels, getLabelledContent, toRawSheetContent, STUDENT_KEY_LABEL } from './parsers/LabelSplitter';
export type { LabelSplit, LabelledContent } from './parsers/LabelSplitter';
export { TextractResponseConverter, textractResponseSchema } from './sources/TextractResponseConverter';
export type { TextractBlock, TextractResponse } from './sources/TextractResponseConverter';
export {
  createSheetSource,
  RawJsonSheetSource,
  TextractJsonSheetSource,
  LabelledTextSheetSource
} from './sources/SheetContentSource';
export type { SheetContentSource, SheetSourceFormat } from './sources/SheetContentSource';
export { TemplateRepository } from './services/TemplateRepository';
export { SheetImportService } from './services/SheetImportService';
export type { ImportOptions, ImportResult } from './services/SheetImportService';
export { summarizeDataSheet } from './services/SessionSummaryService';
export type { SessionSummary, TableSummary } from './services/SessionSummaryService';
export { formatDataSheet, formatSummary } from './services/DataSheetFormatter';
export { readScalarValue } from './utils/scalar-reader';
export type { TypedScalarValue } from './utils/scalar-reader';
export { Logger } from './utils/logger';
