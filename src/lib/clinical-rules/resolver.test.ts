/**
 * Clinical Rules - Priority Resolver Tests
 *
 * Run: node --import tsx --test src/lib/clinical-rules/resolver.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { filterApplicableRules } from './applicability';
import { loadRuleCatalog } from './catalog-loader';
import { detectConflicts } from './conflicts';
import { createPatientProfile } from './patient-profile';
import { resolveConflicts, sortByClinicalPriority } from './resolver';
import type { EngineLogger, RuleCatalog } from './types';

const silentLogger: EngineLogger = { info: () => undefined, warn: () => undefined };

function sodiumRule(
  id: string,
  limit: Record<string, unknown>,
  priority: string,
): Record<string, unknown> {
  return {
    id,
    nutrient: 'sodium',
    limit,
    unit: 'mg',
    when: { all: [{ field: 'condition', op: 'has', value: 'hypertension' }] },
    priority,
    source: `${id} guideline`,
    rationale: `${id} rationale`,
  };
}

function sodiumCatalog(rules: Record<string, unknown>[]): RuleCatalog {
  return loadRuleCatalog({
    version: 1,
    nutrients: [{ key: 'sodium', label: 'Sodium', unit: 'mg' }],
    nutrientRules: [
      ...rules,
      {
        id: 'sodium.general',
        nutrient: 'sodium',
        limit: { kind: 'maximum', value: 2300 },
        unit: 'mg',
        priority: 'GENERAL',
        source: 'Dietary Reference Intakes',
        rationale: 'General population recommendation',
        fallback: true,
      },
    ],
  });
}

const hypertensive = createPatientProfile({ patientId: 'P-1', conditions: ['hypertension'] });

function resolve(catalog: RuleCatalog, logger: EngineLogger = silentLogger) {
  const applicable = filterApplicableRules(hypertensive, catalog);
  return resolveConflicts(
    detectConflicts(applicable.nutrientRules, catalog),
    hypertensive,
    catalog,
    logger,
  );
}

describe('sortByClinicalPriority', () => {
  it('orders by rank, then declaration index', () => {
    const catalog = sodiumCatalog([
      sodiumRule('sodium.metabolic', { kind: 'maximum', value: 1800 }, 'METABOLIC'),
      sodiumRule('sodium.renal_b', { kind: 'maximum', value: 1900 }, 'CRITICAL_RENAL'),
      sodiumRule('sodium.renal_a', { kind: 'maximum', value: 2000 }, 'CRITICAL_RENAL'),
    ]);
    assert.deepStrictEqual(
      sortByClinicalPriority(catalog.nutrientRules).map((r) => r.id),
      ['sodium.renal_b', 'sodium.renal_a', 'sodium.metabolic', 'sodium.general'],
    );
  });
});

describe('resolveConflicts', () => {
  it('passes non-conflicted groups through with every rule kept', () => {
    const catalog = sodiumCatalog([
      sodiumRule('sodium.cardiac', { kind: 'maximum', value: 1500 }, 'CRITICAL_CARDIAC'),
      sodiumRule('sodium.metabolic', { kind: 'maximum', value: 1800 }, 'METABOLIC'),
    ]);
    const result = resolve(catalog);
    assert.deepStrictEqual(result.conflicts, []);
    assert.deepStrictEqual(result.warnings, []);
    assert.deepStrictEqual(
      result.groups[0].kept.map((r) => r.id),
      ['sodium.cardiac', 'sodium.metabolic'],
    );
  });

  it('keeps compatible lower-priority rules and displaces the incompatible one', () => {
    const catalog = sodiumCatalog([
      sodiumRule('sodium.floor_high', { kind: 'minimum', value: 2500 }, 'CRITICAL_CARDIAC'),
      sodiumRule('sodium.cap', { kind: 'maximum', value: 2000 }, 'CRITICAL_RENAL'),
      sodiumRule('sodium.floor_low', { kind: 'minimum', value: 1000 }, 'METABOLIC'),
    ]);
    const result = resolve(catalog);

    assert.deepStrictEqual(
      result.groups[0].kept.map((r) => r.id),
      ['sodium.cap', 'sodium.floor_low'],
    );
    assert.strictEqual(result.conflicts.length, 1);
    const [conflict] = result.conflicts;
    assert.strictEqual(conflict.winner.ruleId, 'sodium.cap');
    assert.deepStrictEqual(conflict.winner.bound, { min: null, max: 2000 });
    assert.deepStrictEqual(
      conflict.losers.map((l) => l.ruleId),
      ['sodium.floor_high'],
    );
    assert.strictEqual(conflict.tieBroken, false);
    assert.strictEqual(
      conflict.overrideRationale,
      'sodium.cap rationale. Renal safety (CRITICAL_RENAL) overrides sodium.floor_high (CRITICAL_CARDIAC, sodium.floor_high guideline).',
    );
  });

  it('does not report a tie when a same-rank loser lost to a higher priority rule', () => {
    const catalog = sodiumCatalog([
      sodiumRule('sodium.cap', { kind: 'maximum', value: 2000 }, 'CRITICAL_RENAL'),
      sodiumRule('sodium.floor_ok', { kind: 'minimum', value: 1000 }, 'METABOLIC'),
      sodiumRule('sodium.floor_high', { kind: 'minimum', value: 2500 }, 'METABOLIC'),
    ]);
    const result = resolve(catalog);

    assert.deepStrictEqual(
      result.groups[0].kept.map((r) => r.id),
      ['sodium.cap', 'sodium.floor_ok'],
    );
    const [conflict] = result.conflicts;
    assert.deepStrictEqual(
      conflict.losers.map((l) => l.ruleId),
      ['sodium.floor_high'],
    );
    assert.strictEqual(conflict.tieBroken, false);
    assert.strictEqual(
      conflict.overrideRationale,
      'sodium.cap rationale. Renal safety (CRITICAL_RENAL) overrides sodium.floor_high (METABOLIC, sodium.floor_high guideline).',
    );
    assert.deepStrictEqual(result.warnings, []);
  });

  it('breaks equal-priority conflicts by declaration order and warns', () => {
    const warned: unknown[][] = [];
    const logger: EngineLogger = {
      info: () => undefined,
      warn: (...args: unknown[]) => {
        warned.push(args);
      },
    };
    const catalog = sodiumCatalog([
      sodiumRule('sodium.cap', { kind: 'maximum', value: 1000 }, 'CRITICAL_CARDIAC'),
      sodiumRule('sodium.floor', { kind: 'minimum', value: 1500 }, 'CRITICAL_CARDIAC'),
    ]);
    const result = resolve(catalog, logger);

    const [conflict] = result.conflicts;
    assert.strictEqual(conflict.winner.ruleId, 'sodium.cap');
    assert.strictEqual(conflict.tieBroken, true);
    assert.strictEqual(
      conflict.overrideRationale,
      'sodium.cap rationale. Cardiovascular safety (CRITICAL_CARDIAC) takes precedence by declaration order over sodium.floor (CRITICAL_CARDIAC, sodium.floor guideline).',
    );
    assert.deepStrictEqual(result.warnings, [
      {
        code: 'UNRESOLVED_CONFLICT',
        nutrient: 'sodium',
        ruleIds: ['sodium.cap', 'sodium.floor'],
        message:
          'Conflicting sodium rules share priority CRITICAL_CARDIAC; sodium.cap kept by declaration order, needs clinical review',
      },
    ]);
    assert.strictEqual(warned.length, 1);
    assert.strictEqual(warned[0][0], '[clinical-rules] Priority tie resolved by declaration order');
  });

  it('renders the winner rationale with patient lab values', () => {
    const catalog = loadRuleCatalog();
    const profile = createPatientProfile({
      patientId: 'P-2',
      conditions: ['hypertension'],
      labs: { egfr: 52 },
    });
    const applicable = filterApplicableRules(profile, catalog);
    const result = resolveConflicts(
      detectConflicts(applicable.nutrientRules, catalog),
      profile,
      catalog,
      silentLogger,
    );
    const [conflict] = result.conflicts;
    assert.strictEqual(conflict.nutrient, 'potassium');
    assert.strictEqual(
      conflict.overrideRationale,
      'eGFR 52 (stage G3a): strict potassium restriction to prevent hyperkalemia. Renal safety (CRITICAL_RENAL) overrides potassium.htn_dash_target (CRITICAL_CARDIAC, DASH dietary pattern (AHA/ACC 2017)).',
    );
    assert.strictEqual(
      conflict.losers[0].rationale,
      'Hypertension: DASH diet recommends high potassium intake for blood pressure control',
    );
  });

  it('carries the lab readings each side of the conflict depends on', () => {
    const catalog = loadRuleCatalog();
    const profile = createPatientProfile({
      patientId: 'P-3',
      conditions: ['hypertension'],
      labs: { egfr: 52 },
    });
    const applicable = filterApplicableRules(profile, catalog);
    const [conflict] = resolveConflicts(
      detectConflicts(applicable.nutrientRules, catalog),
      profile,
      catalog,
      silentLogger,
    ).conflicts;

    assert.strictEqual(conflict.winner.ruleId, 'potassium.ckd_renal_cap');
    assert.deepStrictEqual(conflict.winner.labReadings, [
      { parameter: 'egfr', reading: 52, unit: 'mL/min/1.73m²' },
    ]);
    assert.deepStrictEqual(conflict.losers[0].labReadings, []);
  });
});
