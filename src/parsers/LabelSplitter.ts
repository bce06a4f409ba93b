import { InvalidConfiguration, LabelNotFound } from '../errors/InterpretationErrors';
import { RawSheetContent } from '../types/interpretation.types';

export const STUDENT_KEY_LABEL = 'Student Key';

export interface LabelledContent {
  label: string;
  contentWithLabel: string;
  contentWithoutLabel: string;
}

export interface LabelSplit {
  studentKey: string;
  /** Keyed by lower-cased label */
  sections: Map<string, LabelledContent>;
}

/**
 * Split plain OCR text into labeled sections.
 *
 * Used when only line-based text is available, e.g.
 *
 * ```
 * JA
 * Date: 10/3/2025
 * Time IN: 11:00 AM
 * Goal: By October 2024, {JA} will identify ...
 * ```
 *
 * Each section runs from its label to the next label (or the end of the text).
 * The unlabeled text in front of the first label is the student key.
 * Labels are matched case-sensitively but must be unique ignoring case,
 * since sections are looked up case-insensitively.
 */
export function splitByLabels(text: string, labels: readonly string[]): LabelSplit {
  rejectDuplicateLabels(labels);

  const positioned = labels.map(label => {
    const pos = text.indexOf(label);
    if (pos === -1) {
      throw new LabelNotFound(label);
    }
    return { label, pos };
  });

  positioned.sort((a, b) => a.pos - b.pos);

  const sections = new Map<string, LabelledContent>();
  positioned.forEach(({ label, pos }, i) => {
    const end = i + 1 < positioned.length ? positioned[i + 1].pos : text.length;
    const contentWithLabel = text.slice(pos, end).trim();

    sections.set(label.toLowerCase(), {
      label,
      contentWithLabel,
      contentWithoutLabel: stripLabel(contentWithLabel, label)
    });
  });

  const studentKeyEnd = positioned.length > 0 ? positioned[0].pos : text.length;

  return {
    studentKey: text.slice(0, studentKeyEnd).trim(),
    sections
  };
}

function rejectDuplicateLabels(labels: readonly string[]): void {
  const seen = new Map<string, string>();
  const issues: string[] = [];

  for (const label of labels) {
    const earlier = seen.get(label.toLowerCase());
    if (earlier !== undefined) {
      issues.push(`label '${label}' duplicates '${earlier}'`);
    } else {
      seen.set(label.toLowerCase(), label);
    }
  }

  if (issues.length > 0) {
    throw new InvalidConfiguration('labels', issues);
  }
}

function stripLabel(contentWithLabel: string, label: string): string {
  const colon = contentWithLabel.indexOf(':');
  if (colon !== -1) {
    return contentWithLabel.slice(colon + 1).trim();
  }
  return contentWithLabel.slice(label.length).trim();
}

/**
 * Content of a section without its label, looked up case-insensitively.
 */
export function getLabelledContent(split: LabelSplit, label: string): string {
  const section = split.sections.get(label.toLowerCase());
  if (!section) {
    throw new LabelNotFound(label);
  }
  return section.contentWithoutLabel;
}

/**
 * Turn labeled text into sheet content so it can go through DataSheetInterpreter.
 * The form data holds the student key plus one entry per label; there are no tables.
 */
export function toRawSheetContent(text: string, labels: readonly string[]): RawSheetContent {
  const split = splitByLabels(text, labels);
  const formData: Record<string, string> = { [STUDENT_KEY_LABEL]: split.studentKey };

  for (const section of split.sections.values()) {
    formData[section.label] = section.contentWithoutLabel;
  }

  return { formData, tables: [] };
}
