/**
 * Constraint Builder
 *
 * Turns resolved rule groups into concrete limits: effective daily bounds,
 * per-meal shares, the weight-derived protein target, the deduplicated food
 * restriction list and the triggered safety alerts. Missing mandatory data
 * aborts the patient with a DataCompletenessError naming every gap.
 */

import { DataCompletenessError } from '@/src/lib/errors/app-error';
import { classifyCkdStage } from './ckd-stage';
import { ruleBound } from './conflicts';
import { referencedConditions } from './predicate';
import { patientTemplateVars, renderTemplate, type TemplateVars } from './template';
import {
  CLINICAL_PRIORITY,
  FOOD_SEVERITY_RANK,
  type ApplicabilityResult,
  type CkdStageInfo,
  type ConflictRecord,
  type EngineConfig,
  type FoodRestrictionEntry,
  type FoodRestrictionRule,
  type NutrientConstraint,
  type NutrientRule,
  type PatientProfile,
  type ProteinTarget,
  type ResolutionResult,
  type RuleCatalog,
  type SafetyAlert,
} from './types';

export type NutrientLimitDraft = Omit<NutrientConstraint, 'citation'> & {
  /** Highest-priority binding rule; the one cited */
  citedRule: NutrientRule;
  /** Rules that set dailyMax and dailyMin */
  bindingRules: NutrientRule[];
  conflict: ConflictRecord | null;
};

export type FoodRestrictionDraft = Omit<FoodRestrictionEntry, 'citation'> & {
  rule: FoodRestrictionRule;
};

export type ConstraintDraft = {
  ckdStage: CkdStageInfo | null;
  weightKg: number | null;
  weightSource: 'measured' | 'reference';
  nutrients: NutrientLimitDraft[];
  protein: ProteinTarget | null;
  foods: FoodRestrictionDraft[];
  alerts: SafetyAlert[];
  notes: string[];
};

export type BuildConstraintsInput = {
  profile: PatientProfile;
  catalog: RuleCatalog;
  applicability: ApplicabilityResult;
  resolution: ResolutionResult;
  config: EngineConfig;
};

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Collect every missing mandatory field: labs a condition requires, nutrients a
 * condition must govern through its own rule, and body weight when a per-kg
 * rule applies and no reference weight is configured.
 */
export function findMissingMandatoryData(
  profile: PatientProfile,
  catalog: RuleCatalog,
  applicability: ApplicabilityResult,
  config: EngineConfig,
): string[] {
  const missing: string[] = [];

  if (
    profile.demographics.weightKg === null &&
    config.referenceWeightKg === null &&
    applicability.nutrientRules.some((rule) => rule.basis === 'per_kg_body_weight')
  ) {
    missing.push('demographics.weightKg');
  }

  for (const requirement of catalog.requirements) {
    if (!profile.conditions.includes(requirement.condition)) continue;

    for (const lab of requirement.labs) {
      if (profile.labs[lab] === undefined) missing.push(`labs.${lab}`);
    }

    for (const nutrient of requirement.nutrients) {
      const governed = applicability.nutrientRules.some(
        (rule) =>
          rule.nutrient === nutrient &&
          referencedConditions(rule.when).includes(requirement.condition),
      );
      if (!governed) missing.push(`rules.${requirement.condition}.${nutrient}`);
    }
  }

  return missing;
}

/** Higher-priority of two rules (lower rank; ties keep the earlier declaration) */
function higherPriority(a: NutrientRule, b: NutrientRule): NutrientRule {
  const diff = CLINICAL_PRIORITY[a.priority] - CLINICAL_PRIORITY[b.priority];
  if (diff !== 0) return diff < 0 ? a : b;
  return a.order <= b.order ? a : b;
}

function weightNote(weightKg: number, weightSource: 'measured' | 'reference'): string {
  return weightSource === 'reference'
    ? `Calculated using reference weight ${weightKg} kg (no measured weight on record).`
    : `Calculated from measured weight ${weightKg} kg.`;
}

/**
 * Per-meal cap one rule implies on a side: its own `perMealValue` (absolute
 * basis only), else its scaled daily value divided across meals.
 */
function perMealCap(
  rule: NutrientRule,
  side: 'max' | 'min',
  scale: number,
  config: EngineConfig,
): number | null {
  const bound = ruleBound(rule);
  const daily = side === 'max' ? bound.max : bound.min;
  if (daily === null) return null;
  const { limit } = rule;
  const fromRule =
    (side === 'max' && limit.kind === 'maximum') || (side === 'min' && limit.kind === 'minimum')
      ? limit.perMealValue
      : undefined;
  if (fromRule !== undefined && rule.basis === 'absolute') return fromRule;
  const scaledDaily = roundTo(daily * scale, config.roundingDecimals);
  return roundTo(scaledDaily / config.mealCount, config.roundingDecimals);
}

/** Tightest per-meal value across every kept rule, so no rule's own cap is exceeded */
function perMealBound(
  kept: NutrientRule[],
  side: 'max' | 'min',
  scale: number,
  config: EngineConfig,
): number | null {
  const caps = kept.flatMap((rule) => {
    const cap = perMealCap(rule, side, scale, config);
    return cap === null ? [] : [cap];
  });
  if (caps.length === 0) return null;
  return side === 'max' ? Math.min(...caps) : Math.max(...caps);
}

function buildNutrientLimit(
  kept: NutrientRule[],
  conflict: ConflictRecord | null,
  catalog: RuleCatalog,
  vars: TemplateVars,
  weight: { kg: number | null; source: 'measured' | 'reference' },
  config: EngineConfig,
): NutrientLimitDraft {
  let maxRule: NutrientRule | null = null;
  let minRule: NutrientRule | null = null;
  let maxBound: number | null = null;
  let minBound: number | null = null;

  // kept is in priority order, so strict comparisons leave ties with the higher priority
  for (const rule of kept) {
    const bound = ruleBound(rule);
    if (bound.max !== null && (maxBound === null || bound.max < maxBound)) {
      maxBound = bound.max;
      maxRule = rule;
    }
    if (bound.min !== null && (minBound === null || bound.min > minBound)) {
      minBound = bound.min;
      minRule = rule;
    }
  }

  const citedRule =
    maxRule && minRule ? higherPriority(maxRule, minRule) : (maxRule ?? minRule ?? kept[0]);
  const nutrient = catalog.nutrients.find((n) => n.key === citedRule.nutrient);
  const perKg = citedRule.basis === 'per_kg_body_weight';
  const scale = perKg ? (weight.kg ?? 0) : 1;

  const dailyMax = maxBound === null ? null : roundTo(maxBound * scale, config.roundingDecimals);
  const dailyMin = minBound === null ? null : roundTo(minBound * scale, config.roundingDecimals);

  let rationale = renderTemplate(citedRule.rationale, vars);
  if (perKg && weight.kg !== null) {
    rationale = `${rationale}. ${weightNote(weight.kg, weight.source)}`;
  }

  return {
    nutrient: citedRule.nutrient,
    label: nutrient ? nutrient.label : citedRule.nutrient,
    unit: nutrient ? nutrient.unit : citedRule.unit,
    dailyMax,
    dailyMin,
    perMealMax: perMealBound(kept, 'max', scale, config),
    perMealMin: perMealBound(kept, 'min', scale, config),
    priority: citedRule.priority,
    rationale,
    overrideReason: conflict ? conflict.overrideRationale : null,
    ruleIds: kept.map((rule) => rule.id),
    citedRule,
    bindingRules: [maxRule, minRule].filter(
      (rule, index, rules): rule is NutrientRule => rule !== null && rules.indexOf(rule) === index,
    ),
    conflict,
  };
}

function buildProteinTarget(
  limit: NutrientLimitDraft,
  kept: NutrientRule[],
  weightKg: number,
  weightSource: 'measured' | 'reference',
  config: EngineConfig,
): ProteinTarget {
  const bounds = kept.map(ruleBound);
  const lows = bounds.flatMap((b) => (b.min === null ? [] : [b.min]));
  const highs = bounds.flatMap((b) => (b.max === null ? [] : [b.max]));

  return {
    weightKg,
    weightSource,
    gramsPerKgLow: lows.length > 0 ? Math.max(...lows) : null,
    gramsPerKgHigh: highs.length > 0 ? Math.min(...highs) : null,
    dailyMinG: limit.dailyMin,
    dailyMaxG: limit.dailyMax,
    perMealMinG: limit.perMealMin,
    perMealMaxG: limit.perMealMax,
    mealCount: config.mealCount,
    rationale: limit.rationale,
  };
}

/**
 * Deduplicate by food id: most severe wins; equal severity goes to the higher
 * clinical priority, then to the earlier declaration.
 */
export function dedupeFoodRules(rules: FoodRestrictionRule[]): FoodRestrictionRule[] {
  const byFood = new Map<string, FoodRestrictionRule>();
  for (const rule of rules) {
    const current = byFood.get(rule.food);
    if (!current) {
      byFood.set(rule.food, rule);
      continue;
    }
    const severityDiff = FOOD_SEVERITY_RANK[rule.severity] - FOOD_SEVERITY_RANK[current.severity];
    const priorityDiff = CLINICAL_PRIORITY[rule.priority] - CLINICAL_PRIORITY[current.priority];
    const outranks =
      severityDiff < 0 ||
      (severityDiff === 0 && (priorityDiff < 0 || (priorityDiff === 0 && rule.order < current.order)));
    if (outranks) byFood.set(rule.food, rule);
  }
  return [...byFood.values()];
}

/**
 * Build limits, protein target, food restrictions and alerts.
 *
 * @throws DataCompletenessError when mandatory data is missing
 */
export function buildConstraints(input: BuildConstraintsInput): ConstraintDraft {
  const { profile, catalog, applicability, resolution, config } = input;

  const missing = findMissingMandatoryData(profile, catalog, applicability, config);
  if (missing.length > 0) {
    throw new DataCompletenessError(profile.patientId, missing);
  }

  const notes: string[] = [];
  const measured = profile.demographics.weightKg;
  const weight: { kg: number | null; source: 'measured' | 'reference' } =
    measured !== null
      ? { kg: measured, source: 'measured' }
      : { kg: config.referenceWeightKg, source: 'reference' };
  if (measured === null && weight.kg !== null) {
    notes.push(`demographics.weightKg missing: using reference weight ${weight.kg} kg`);
  }

  const vars = patientTemplateVars(profile, weight.kg);
  const nutrients: NutrientLimitDraft[] = [];
  let protein: ProteinTarget | null = null;

  for (const group of resolution.groups) {
    const limit = buildNutrientLimit(group.kept, group.conflict, catalog, vars, weight, config);
    nutrients.push(limit);
    if (group.nutrient === 'protein' && weight.kg !== null) {
      protein = buildProteinTarget(limit, group.kept, weight.kg, weight.source, config);
    }
  }

  const foods: FoodRestrictionDraft[] = dedupeFoodRules(applicability.foodRules).map((rule) => ({
    food: rule.food,
    displayName: rule.displayName,
    severity: rule.severity,
    reason: renderTemplate(rule.reason, vars),
    priority: rule.priority,
    alternatives: [...rule.alternatives],
    interaction: rule.interaction ? { ...rule.interaction } : null,
    rule,
  }));

  const alerts: SafetyAlert[] = applicability.alerts.map((alert) => ({
    alertId: alert.id,
    level: alert.level,
    message: renderTemplate(alert.message, vars),
  }));

  return {
    ckdStage: classifyCkdStage(profile.labs.egfr),
    weightKg: weight.kg,
    weightSource: weight.source,
    nutrients,
    protein,
    foods,
    alerts,
    notes,
  };
}
