// src/config/template-schema.ts
import { z } from 'zod';
import { ScalarType } from '../models/Scalar';

export const scalarTypeSchema = z.nativeEnum(ScalarType);

const tableConfigSchema = z.object({
  type: z.literal('table'),
  configuration: z.object({
    columns: z.array(z.string().min(1)).min(1, 'a table interpreter needs at least one column')
  })
});

const runningTallyConfigSchema = z.object({
  type: z.literal('running_tally'),
  configuration: z
    .object({
      tally_type: scalarTypeSchema,
      choice_options: z.array(z.string()).default([])
    })
    .refine(cfg => cfg.tally_type !== ScalarType.CHOICE || cfg.choice_options.length > 0, {
      message: 'CHOICE tallies need at least one choice option',
      path: ['choice_options']
    })
});

const simpleFormConfigSchema = z.object({
  type: z.literal('simple_form'),
  configuration: z.object({
    fields: z
      .record(
        scalarTypeSchema.refine(type => type !== ScalarType.CHOICE, {
          message: 'simple form fields cannot be CHOICE fields'
        })
      )
      .refine(fields => Object.keys(fields).length > 0, {
        message: 'a simple form interpreter needs at least one field'
      })
  })
});

/**
 * One entry of a template's interpreter list, as stored in a template file.
 */
export const interpreterEntrySchema = z.discriminatedUnion('type', [
  tableConfigSchema,
  runningTallyConfigSchema,
  simpleFormConfigSchema
]);

export const templateFileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  interpreters: z.array(interpreterEntrySchema)
});

export type InterpreterEntry = z.infer<typeof interpreterEntrySchema>;
export type TemplateFile = z.infer<typeof templateFileSchema>;

/**
 * Flatten zod issues into "path: message" strings for error reporting.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
