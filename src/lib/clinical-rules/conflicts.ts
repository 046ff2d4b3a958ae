/**
 * Conflict Detector
 *
 * Groups applicable nutrient rules per nutrient and flags the groups whose
 * bounds cannot all hold at once. Bounds compare in the rule's own basis
 * (per-kg rules against per-kg rules), so no weight is needed here.
 */

import type { NutrientRule, NutrientRuleGroup, RuleBound, RuleCatalog } from './types';

/** Interval implied by one rule; null = unbounded on that side */
export function ruleBound(rule: NutrientRule): RuleBound {
  const { limit } = rule;
  switch (limit.kind) {
    case 'maximum':
      return { min: null, max: limit.value };
    case 'minimum':
      return { min: limit.value, max: null };
    case 'range':
      return { min: limit.min, max: limit.max };
  }
}

export function intersectBounds(a: RuleBound, b: RuleBound): RuleBound {
  return {
    min: a.min === null ? b.min : b.min === null ? a.min : Math.max(a.min, b.min),
    max: a.max === null ? b.max : b.max === null ? a.max : Math.min(a.max, b.max),
  };
}

/** Touching bounds (min == max) are satisfiable */
export function isSatisfiable(bound: RuleBound): boolean {
  return bound.min === null || bound.max === null || bound.min <= bound.max;
}

/**
 * Group rules by nutrient in catalog declaration order and mark conflicts.
 * Two maxima (or two minima) never conflict: the tighter one simply dominates.
 */
export function detectConflicts(
  rules: NutrientRule[],
  catalog: RuleCatalog,
): NutrientRuleGroup[] {
  const groups: NutrientRuleGroup[] = [];

  for (const nutrient of catalog.nutrients) {
    const members = rules.filter((rule) => rule.nutrient === nutrient.key);
    if (members.length === 0) continue;

    const combined = members
      .map(ruleBound)
      .reduce<RuleBound>(intersectBounds, { min: null, max: null });

    groups.push({
      nutrient: nutrient.key,
      rules: members,
      conflicted: !isSatisfiable(combined),
    });
  }

  return groups;
}
