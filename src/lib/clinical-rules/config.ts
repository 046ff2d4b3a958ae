/**
 * Engine configuration from environment variables.
 *
 * Invalid values never abort: the default is used and a warning is returned
 * so the caller can log it.
 */

import { z } from 'zod';
import { ValidationError } from '@/src/lib/errors/app-error';
import type { EngineConfig } from './types';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  mealCount: 3,
  referenceWeightKg: 70,
  roundingDecimals: 1,
});

const mealCountSchema = z.coerce.number().int().min(1).max(8);
const roundingDecimalsSchema = z.coerce.number().int().min(0).max(3);
const referenceWeightSchema = z.union([
  z.literal('none').transform(() => null),
  z.coerce.number().finite().positive().max(400),
]);

export type EngineConfigResult = {
  config: EngineConfig;
  warnings: string[];
};

function readSetting<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  warnings: string[],
): T {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    warnings.push(`${name}=${raw} is invalid, using default ${String(fallback)}`);
    return fallback;
  }
  return parsed.data;
}

/**
 * Read CLINICAL_MEAL_COUNT, CLINICAL_REFERENCE_WEIGHT_KG (number or `none`)
 * and CLINICAL_ROUNDING_DECIMALS.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfigResult {
  const warnings: string[] = [];
  const config: EngineConfig = {
    mealCount: readSetting(
      env,
      'CLINICAL_MEAL_COUNT',
      mealCountSchema,
      DEFAULT_ENGINE_CONFIG.mealCount,
      warnings,
    ),
    referenceWeightKg: readSetting(
      env,
      'CLINICAL_REFERENCE_WEIGHT_KG',
      referenceWeightSchema,
      DEFAULT_ENGINE_CONFIG.referenceWeightKg,
      warnings,
    ),
    roundingDecimals: readSetting(
      env,
      'CLINICAL_ROUNDING_DECIMALS',
      roundingDecimalsSchema,
      DEFAULT_ENGINE_CONFIG.roundingDecimals,
      warnings,
    ),
  };
  return { config, warnings };
}

const engineConfigSchema = z
  .object({
    mealCount: mealCountSchema.optional(),
    referenceWeightKg: z.number().finite().positive().nullable().optional(),
    roundingDecimals: roundingDecimalsSchema.optional(),
  })
  .strict();

/**
 * Merge programmatic overrides onto the defaults.
 *
 * @throws ValidationError for out-of-range overrides
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid engine configuration',
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return {
    mealCount: parsed.data.mealCount ?? DEFAULT_ENGINE_CONFIG.mealCount,
    referenceWeightKg:
      parsed.data.referenceWeightKg === undefined
        ? DEFAULT_ENGINE_CONFIG.referenceWeightKg
        : parsed.data.referenceWeightKg,
    roundingDecimals: parsed.data.roundingDecimals ?? DEFAULT_ENGINE_CONFIG.roundingDecimals,
  };
}
