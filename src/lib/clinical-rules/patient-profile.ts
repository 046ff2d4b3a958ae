/**
 * Patient Profile
 *
 * Validates untyped collaborator input (extractor output, batch files) into an
 * immutable PatientProfile. Conditions arrive either as a list or as the
 * extractor's `{ condition: boolean }` map; lab flags may be booleans.
 */

import { z } from 'zod';
import { ValidationError } from '@/src/lib/errors/app-error';
import { deepFreeze } from './freeze';
import {
  CONDITION_KEYS,
  LAB_PARAMETERS,
  type ConditionKey,
  type PatientProfile,
} from './types';

const CONDITION_KEY = z.enum(CONDITION_KEYS);
const LAB_PARAMETER = z.enum(LAB_PARAMETERS);

const labValueSchema = z.union([z.number().finite(), z.boolean(), z.null()]);

export const patientProfileInputSchema = z
  .object({
    patientId: z.union([
      z.string().trim().min(1),
      z.number().int().nonnegative().transform(String),
    ]),
    demographics: z
      .object({
        ageYears: z.number().int().nonnegative().nullable().default(null),
        sex: z.enum(['female', 'male', 'other']).nullable().default(null),
        weightKg: z.number().finite().positive().nullable().default(null),
      })
      .strict()
      .default({}),
    conditions: z
      .union([z.array(CONDITION_KEY), z.record(CONDITION_KEY, z.boolean())])
      .default([]),
    labs: z.record(LAB_PARAMETER, labValueSchema).default({}),
  })
  .strict();

export type PatientProfileInput = z.input<typeof patientProfileInputSchema>;

function activeConditions(
  conditions: ConditionKey[] | Partial<Record<ConditionKey, boolean>>,
): ConditionKey[] {
  if (Array.isArray(conditions)) {
    return CONDITION_KEYS.filter((key) => conditions.includes(key)).sort();
  }
  return CONDITION_KEYS.filter((key) => conditions[key] === true).sort();
}

/**
 * Build a validated, frozen profile.
 *
 * @throws ValidationError listing each offending path
 */
export function createPatientProfile(input: unknown): PatientProfile {
  const parsed = patientProfileInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ValidationError('Invalid patient profile', issues);
  }

  const data = parsed.data;
  const labs: PatientProfile['labs'] = {};
  for (const parameter of LAB_PARAMETERS) {
    const value = data.labs[parameter];
    if (value === null || value === undefined) continue;
    labs[parameter] = typeof value === 'boolean' ? (value ? 1 : 0) : value;
  }

  return deepFreeze({
    patientId: data.patientId,
    demographics: {
      ageYears: data.demographics.ageYears,
      sex: data.demographics.sex,
      weightKg: data.demographics.weightKg,
    },
    conditions: activeConditions(data.conditions),
    labs,
  });
}
