import { z } from 'zod';
import { ValidationError, isColumnLetter } from '@tallyplan/shared';
import { parseCorrectableTag, parseItemTag } from './tags';

// ── Shared fields ────────────────────────────────────────────────────

const sheetName = z.string().min(1).max(255);

const columnLetter = z
  .string()
  .trim()
  .refine(isColumnLetter, { message: 'Must be a column letter such as A or AB' })
  .transform((v) => v.toUpperCase());

const term = z
  .string()
  .max(500)
  .refine((v) => v.trim() !== '', { message: 'Term must not be blank' });

const correctableTag = z.string().transform((value, ctx) => {
  const tag = parseCorrectableTag(value);
  if (!tag) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Must be one of budget, recurring, savings, income, debt (or B, R, S, IN, D)',
    });
    return z.NEVER;
  }
  return tag;
});

/** Any tag, or null; older clients send "Unknown" or an empty code. */
const predictedTag = z
  .string()
  .nullish()
  .transform((value) => {
    if (value == null || value.trim() === '') return null;
    return parseItemTag(value) ?? value.trim().toLowerCase();
  });

// ── Queries ──────────────────────────────────────────────────────────

export const analyzeSheetTreeSchema = z.object({
  sheetName,
  categoryColumn: columnLetter,
  valueColumn: columnLetter,
  startRow: z.number().int().default(1),
  includeProfiles: z.boolean().default(false),
});
export type AnalyzeSheetTreeInput = z.input<typeof analyzeSheetTreeSchema>;

export const buildColumnProfilesSchema = z.object({
  sheetName,
  maxRows: z.number().int().optional(),
});
export type BuildColumnProfilesInput = z.input<typeof buildColumnProfilesSchema>;

export const detectColumnMappingSchema = buildColumnProfilesSchema;
export type DetectColumnMappingInput = z.input<typeof detectColumnMappingSchema>;

// ── Commands ─────────────────────────────────────────────────────────

export const learnFromCorrectionSchema = z.object({
  term,
  correctedTag: correctableTag,
  predictedTag: predictedTag.optional(),
  sourceFileId: z.string().min(1).max(128).optional(),
});
export type LearnFromCorrectionInput = z.input<typeof learnFromCorrectionSchema>;

export const deleteCorrectionSchema = z.object({ term });
export type DeleteCorrectionInput = z.input<typeof deleteCorrectionSchema>;

/** Parses operation input, mapping zod issues onto ValidationError details. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Validation failed',
      parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}
