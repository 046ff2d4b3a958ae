/**
 * Explainability Recorder
 *
 * Attaches a citation to every nutrient limit and food restriction and puts
 * the output in its contract order. Never alters a value.
 */

import type {
  FoodRestrictionDraft,
  NutrientLimitDraft,
} from './constraint-builder';
import { referencedConditions, referencedLabs } from './predicate';
import {
  LAB_UNITS,
  type Citation,
  type ConditionKey,
  type FoodRestrictionEntry,
  type FoodSeverity,
  type LabReading,
  type NutrientConstraint,
  type PatientProfile,
  type Predicate,
} from './types';

export type CitedRule = {
  id: string;
  source: string;
  when?: Predicate;
};

/** Present readings of the labs a predicate references, in reference order */
export function presentLabReadings(
  when: Predicate | undefined,
  profile: PatientProfile,
): LabReading[] {
  const labReadings: LabReading[] = [];
  for (const parameter of referencedLabs(when)) {
    const reading = profile.labs[parameter];
    if (reading !== undefined) {
      labReadings.push({ parameter, reading, unit: LAB_UNITS[parameter] });
    }
  }
  return labReadings;
}

/**
 * Citation for one rule: the active conditions and present lab readings its
 * predicate references. `supporting` rules (the other binding side of a
 * limit) add their conditions and readings without a duplicate.
 */
export function buildCitation(
  rule: CitedRule,
  profile: PatientProfile,
  overrideRationale: string | null = null,
  supporting: CitedRule[] = [],
): Citation {
  const conditions: ConditionKey[] = [];
  const labReadings: LabReading[] = [];

  for (const cited of [rule, ...supporting]) {
    for (const condition of referencedConditions(cited.when)) {
      if (profile.conditions.includes(condition) && !conditions.includes(condition)) {
        conditions.push(condition);
      }
    }
    for (const reading of presentLabReadings(cited.when, profile)) {
      if (!labReadings.some((r) => r.parameter === reading.parameter)) labReadings.push(reading);
    }
  }

  return {
    ruleId: rule.id,
    source: rule.source,
    conditions,
    labReadings,
    overrideRationale,
  };
}

export function citeNutrientLimits(
  drafts: NutrientLimitDraft[],
  profile: PatientProfile,
): NutrientConstraint[] {
  return drafts.map((draft) => ({
    nutrient: draft.nutrient,
    label: draft.label,
    unit: draft.unit,
    dailyMax: draft.dailyMax,
    dailyMin: draft.dailyMin,
    perMealMax: draft.perMealMax,
    perMealMin: draft.perMealMin,
    priority: draft.priority,
    rationale: draft.rationale,
    overrideReason: draft.overrideReason,
    ruleIds: [...draft.ruleIds],
    citation: buildCitation(
      draft.citedRule,
      profile,
      draft.conflict ? draft.conflict.overrideRationale : null,
      draft.bindingRules.filter((rule) => rule !== draft.citedRule),
    ),
  }));
}

export type GroupedFoodRestrictions = Record<
  'prohibitedFoods' | 'limitedFoods' | 'warningFoods',
  FoodRestrictionEntry[]
>;

/** Group by severity, each group alphabetical by food id */
export function citeFoodRestrictions(
  drafts: FoodRestrictionDraft[],
  profile: PatientProfile,
): GroupedFoodRestrictions {
  const bySeverity = (severity: FoodSeverity): FoodRestrictionEntry[] =>
    drafts
      .filter((draft) => draft.severity === severity)
      .sort((a, b) => (a.food < b.food ? -1 : a.food > b.food ? 1 : 0))
      .map((draft) => ({
        food: draft.food,
        displayName: draft.displayName,
        severity: draft.severity,
        reason: draft.reason,
        priority: draft.priority,
        alternatives: draft.alternatives,
        interaction: draft.interaction,
        citation: buildCitation(draft.rule, profile),
      }));

  return {
    prohibitedFoods: bySeverity('prohibited'),
    limitedFoods: bySeverity('limited'),
    warningFoods: bySeverity('warning'),
  };
}
