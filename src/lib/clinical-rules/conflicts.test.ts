/**
 * Clinical Rules - Conflict Detector Tests
 *
 * Run: node --import tsx --test src/lib/clinical-rules/conflicts.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { filterApplicableRules } from './applicability';
import { loadRuleCatalog } from './catalog-loader';
import { detectConflicts, intersectBounds, isSatisfiable } from './conflicts';
import { createPatientProfile } from './patient-profile';

const catalog = loadRuleCatalog();

function groupsFor(input: unknown) {
  const profile = createPatientProfile(input);
  return detectConflicts(filterApplicableRules(profile, catalog).nutrientRules, catalog);
}

describe('interval helpers', () => {
  it('intersects open and closed sides', () => {
    assert.deepStrictEqual(
      intersectBounds({ min: null, max: 2000 }, { min: 4700, max: null }),
      { min: 4700, max: 2000 },
    );
    assert.deepStrictEqual(
      intersectBounds({ min: 0.6, max: 0.8 }, { min: null, max: 0.75 }),
      { min: 0.6, max: 0.75 },
    );
  });

  it('treats touching bounds as satisfiable', () => {
    assert.strictEqual(isSatisfiable({ min: 2000, max: 2000 }), true);
    assert.strictEqual(isSatisfiable({ min: 2000.1, max: 2000 }), false);
    assert.strictEqual(isSatisfiable({ min: null, max: null }), true);
  });
});

describe('detectConflicts', () => {
  it('flags renal potassium cap against the DASH potassium target', () => {
    const groups = groupsFor({
      patientId: 'P-1',
      conditions: ['hypertension', 'chronic_kidney_disease'],
      labs: { egfr: 52 },
    });
    const potassium = groups.find((g) => g.nutrient === 'potassium');
    assert.ok(potassium);
    assert.strictEqual(potassium.conflicted, true);
    assert.deepStrictEqual(
      potassium.rules.map((r) => r.id),
      ['potassium.ckd_renal_cap', 'potassium.htn_dash_target'],
    );
  });

  it('does not flag two maxima on the same nutrient', () => {
    const groups = groupsFor({
      patientId: 'P-1',
      conditions: ['hypertension', 'chronic_kidney_disease'],
      labs: { egfr: 52 },
    });
    const sodium = groups.find((g) => g.nutrient === 'sodium');
    assert.ok(sodium);
    assert.strictEqual(sodium.rules.length, 2);
    assert.strictEqual(sodium.conflicted, false);
  });

  it('keeps catalog nutrient order and only governed nutrients', () => {
    const groups = groupsFor({ patientId: 'P-1', conditions: ['dyslipidemia'] });
    assert.deepStrictEqual(
      groups.map((g) => g.nutrient),
      ['potassium', 'sodium', 'phosphorus', 'protein', 'carbohydrates', 'saturated_fat', 'cholesterol'],
    );
    assert.ok(groups.every((g) => !g.conflicted));
  });

  it('uses fallbacks only where no specific rule applies', () => {
    const groups = groupsFor({ patientId: 'P-1', conditions: ['dyslipidemia'] });
    const ids = groups.flatMap((g) => g.rules.map((r) => r.id));
    assert.deepStrictEqual(ids, [
      'potassium.general',
      'sodium.general',
      'phosphorus.general',
      'protein.general',
      'carbohydrates.general',
      'saturated_fat.dyslipidemia',
      'cholesterol.dyslipidemia',
    ]);
  });
});
