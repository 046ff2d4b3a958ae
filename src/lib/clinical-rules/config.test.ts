/**
 * Clinical Rules - Engine Config Tests
 *
 * Run: node --import tsx --test src/lib/clinical-rules/config.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ValidationError } from '@/src/lib/errors/app-error';
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig, resolveEngineConfig } from './config';

describe('loadEngineConfig', () => {
  it('uses defaults for an empty environment', () => {
    assert.deepStrictEqual(loadEngineConfig({}), {
      config: { mealCount: 3, referenceWeightKg: 70, roundingDecimals: 1 },
      warnings: [],
    });
  });

  it('reads valid values', () => {
    assert.deepStrictEqual(
      loadEngineConfig({
        CLINICAL_MEAL_COUNT: '4',
        CLINICAL_REFERENCE_WEIGHT_KG: 'none',
        CLINICAL_ROUNDING_DECIMALS: '2',
      }),
      {
        config: { mealCount: 4, referenceWeightKg: null, roundingDecimals: 2 },
        warnings: [],
      },
    );
    assert.strictEqual(
      loadEngineConfig({ CLINICAL_REFERENCE_WEIGHT_KG: ' 65.5 ' }).config.referenceWeightKg,
      65.5,
    );
  });

  it('falls back to defaults and warns on invalid values', () => {
    const { config, warnings } = loadEngineConfig({
      CLINICAL_MEAL_COUNT: 'zero',
      CLINICAL_ROUNDING_DECIMALS: '7',
    });
    assert.deepStrictEqual(config, DEFAULT_ENGINE_CONFIG);
    assert.deepStrictEqual(warnings, [
      'CLINICAL_MEAL_COUNT=zero is invalid, using default 3',
      'CLINICAL_ROUNDING_DECIMALS=7 is invalid, using default 1',
    ]);
  });
});

describe('resolveEngineConfig', () => {
  it('merges overrides onto defaults', () => {
    assert.deepStrictEqual(resolveEngineConfig({ referenceWeightKg: null }), {
      mealCount: 3,
      referenceWeightKg: null,
      roundingDecimals: 1,
    });
    assert.deepStrictEqual(resolveEngineConfig(), DEFAULT_ENGINE_CONFIG);
  });

  it('rejects out-of-range overrides', () => {
    assert.throws(() => resolveEngineConfig({ mealCount: 0 }), ValidationError);
  });
});
