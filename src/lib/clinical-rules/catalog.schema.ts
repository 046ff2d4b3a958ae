/**
 * Zod schema for the declarative rule catalog (clinical-rule-catalog.json).
 * Structure-only validation; cross-entry checks live in catalog-loader.ts.
 * Predicate roots must be objects (all/any/not); arrays at root are invalid.
 */

import { z } from 'zod';
import {
  CLINICAL_PRIORITY_KEYS,
  CONDITION_KEYS,
  LAB_PARAMETERS,
  NUTRIENT_KEYS,
} from './types';

const CONDITION_KEY = z.enum(CONDITION_KEYS);
const LAB_PARAMETER = z.enum(LAB_PARAMETERS);
const NUTRIENT_KEY = z.enum(NUTRIENT_KEYS);
const PRIORITY = z.enum(CLINICAL_PRIORITY_KEYS);
const LAB_OP = z.enum(['lt', 'lte', 'gt', 'gte', 'eq', 'neq', 'exists']);
const BASIS = z.enum(['absolute', 'per_kg_body_weight']);

const conditionFieldSchema = z
  .object({
    field: z.literal('condition'),
    op: z.enum(['has', 'lacks']),
    value: CONDITION_KEY,
  })
  .strict();

const labFieldSchema = z
  .object({
    field: z.literal('lab'),
    key: LAB_PARAMETER,
    op: LAB_OP,
    value: z.number().finite().optional(),
  })
  .strict();

export const predicateConditionSchema = z.discriminatedUnion('field', [
  conditionFieldSchema,
  labFieldSchema,
]);

export const predicateSchema = z
  .object({
    all: z.array(predicateConditionSchema).min(1).optional(),
    any: z.array(predicateConditionSchema).min(1).optional(),
    not: predicateConditionSchema.optional(),
  })
  .strict();

const nonNegative = z.number().finite().nonnegative();

const limitSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('maximum'),
      value: nonNegative,
      perMealValue: nonNegative.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('minimum'),
      value: nonNegative,
      perMealValue: nonNegative.optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('range'),
      min: nonNegative,
      max: nonNegative,
    })
    .strict(),
]);

const ruleId = z
  .string()
  .regex(/^[a-z0-9_]+(\.[a-z0-9_]+)+$/, 'rule ids are dotted lowercase keys');

export const nutrientRuleSchema = z
  .object({
    id: ruleId,
    nutrient: NUTRIENT_KEY,
    limit: limitSchema,
    basis: BASIS.default('absolute'),
    unit: z.string().min(1),
    when: predicateSchema.optional(),
    priority: PRIORITY,
    source: z.string().min(1),
    rationale: z.string().min(1),
    fallback: z.boolean().default(false),
  })
  .strict();

export const foodRuleSchema = z
  .object({
    id: ruleId,
    food: z.string().regex(/^[a-z0-9_]+$/),
    displayName: z.string().min(1),
    severity: z.enum(['prohibited', 'limited', 'warning']),
    when: predicateSchema,
    priority: PRIORITY,
    source: z.string().min(1),
    reason: z.string().min(1),
    alternatives: z.array(z.string().min(1)).default([]),
    interaction: z
      .object({
        kind: z.literal('time_separation'),
        substance: z.string().min(1),
        minimumHours: z.number().positive(),
        note: z.string().min(1),
      })
      .strict()
      .optional(),
  })
  .strict();

export const alertRuleSchema = z
  .object({
    id: ruleId,
    level: z.enum(['critical', 'alert']),
    when: predicateSchema,
    message: z.string().min(1),
  })
  .strict();

export const ruleCatalogSchema = z
  .object({
    version: z.number().int().positive(),
    nutrients: z
      .array(
        z
          .object({
            key: NUTRIENT_KEY,
            label: z.string().min(1),
            unit: z.string().min(1),
            basis: BASIS.default('absolute'),
          })
          .strict(),
      )
      .min(1),
    nutrientRules: z.array(nutrientRuleSchema),
    foodRules: z.array(foodRuleSchema).default([]),
    alerts: z.array(alertRuleSchema).default([]),
    requirements: z
      .array(
        z
          .object({
            condition: CONDITION_KEY,
            labs: z.array(LAB_PARAMETER).default([]),
            nutrients: z.array(NUTRIENT_KEY).default([]),
          })
          .strict(),
      )
      .default([]),
  })
  .strict();

export type RuleCatalogInput = z.input<typeof ruleCatalogSchema>;
export type ParsedRuleCatalog = z.output<typeof ruleCatalogSchema>;
