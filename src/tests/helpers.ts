// src/tests/helpers.ts
import { RawSheetContent, RawTable } from '../types/interpretation.types';

/**
 * Run fn and return what it throws; fails the test when nothing is thrown.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}

export const SESSION_FORM_DATA: Readonly<Record<string, string>> = {
  'Student Key': 'JA',
  'Date': '10/3/2025',
  'Time IN': '11:00 AM',
  'Time OUT': '11:25 AM',
  'Goal': 'identify cause',
  'Measure': 'accuracy'
};

export function sheetContent(formData: Record<string, string>, ...tables: RawTable[]): RawSheetContent {
  return { formData, tables };
}
