/**
 * Parses the target form body into generator options.
 */

import { z } from 'zod';
import type { TargetOptions } from '../types/index.js';
import {
  DEFAULT_TARGET_OPTIONS,
  DISTANCE_UNITS,
  PAPER_SIZE_NAMES,
  AIM_POINT_STYLES,
} from '../types/index.js';

export const FORM_FIELDS = [
  'distance',
  'unit',
  'moa',
  'paperSize',
  'aimPoint',
  'aimLineThickness',
  'scopeAdjustmentText',
] as const;

export type FormField = (typeof FORM_FIELDS)[number];

/**
 * Raw submitted values, kept so the form can be shown again as typed.
 */
export type FormValues = Partial<Record<FormField, string>>;

export const MAX_DISTANCE = 5000;
export const MAX_MOA = 60;
export const MAX_AIM_LINE_THICKNESS = 1;

function requiredNumber(label: string) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .trim()
    .min(1, `${label} is required`)
    .transform((value) => Number(value))
    .pipe(z.number({ invalid_type_error: `${label} must be a number` }).finite(`${label} must be a number`));
}

function choiceError(message: string) {
  return { errorMap: () => ({ message }) };
}

const targetFormSchema = z.object({
  distance: requiredNumber('Distance').pipe(
    z
      .number()
      .positive('Distance must be greater than zero')
      .max(MAX_DISTANCE, `Distance must be at most ${MAX_DISTANCE}`)
  ),
  unit: z
    .enum(DISTANCE_UNITS, choiceError('Unsupported distance unit'))
    .default(DEFAULT_TARGET_OPTIONS.unit),
  moa: requiredNumber('MOA').pipe(
    z.number().positive('MOA must be greater than zero').max(MAX_MOA, `MOA must be at most ${MAX_MOA}`)
  ),
  paperSize: z
    .enum(PAPER_SIZE_NAMES, choiceError('Unsupported paper size'))
    .default(DEFAULT_TARGET_OPTIONS.paperSize),
  aimPoint: z
    .enum(AIM_POINT_STYLES, choiceError('Unsupported aim point style'))
    .default(DEFAULT_TARGET_OPTIONS.aimPoint),
  aimLineThickness: z
    .string({ invalid_type_error: 'Aim line thickness must be a number' })
    .trim()
    .optional()
    .transform((value) => (value === undefined || value === '' ? DEFAULT_TARGET_OPTIONS.aimLineThickness : Number(value)))
    .pipe(
      z
        .number({ invalid_type_error: 'Aim line thickness must be a number' })
        .finite('Aim line thickness must be a number')
        .min(0, 'Aim line thickness cannot be negative')
        .max(MAX_AIM_LINE_THICKNESS, `Aim line thickness must be at most ${MAX_AIM_LINE_THICKNESS} inch`)
    ),
  // Checkboxes are only submitted when ticked
  scopeAdjustmentText: z
    .string()
    .optional()
    .transform((value) => value !== undefined && value !== ''),
});

export type FormParseResult =
  | { success: true; options: TargetOptions; values: FormValues }
  | { success: false; error: string; field?: string; values: FormValues };

/**
 * Picks the known string fields out of a request body.
 */
export function readFormValues(body: unknown): FormValues {
  const record = z.record(z.unknown()).safeParse(body);
  const values: FormValues = {};
  if (!record.success) {
    return values;
  }

  for (const field of FORM_FIELDS) {
    const value = record.data[field];
    if (typeof value === 'string') {
      values[field] = value;
    }
  }
  return values;
}

/**
 * Validates a form body. The first problem found is reported.
 */
export function parseTargetForm(body: unknown): FormParseResult {
  const values = readFormValues(body);
  const parsed = targetFormSchema.safeParse(body ?? {});

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      success: false,
      error: issue?.message ?? 'Invalid form input',
      field: issue?.path.join('.'),
      values,
    };
  }

  return { success: true, options: parsed.data, values };
}
