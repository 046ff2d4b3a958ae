/**
 * Applicability Filter
 *
 * Selects the catalog entries whose predicates hold for a patient. Predicates
 * that cannot be decided because a lab is missing do not apply and leave a
 * completeness note instead. Fallback nutrient rules apply only where no other
 * rule governs the nutrient.
 */

import { evaluatePredicate } from './predicate';
import {
  LAB_PARAMETERS,
  type ApplicabilityResult,
  type CompletenessNote,
  type LabParameter,
  type NutrientKey,
  type PatientProfile,
  type Predicate,
  type RuleCatalog,
} from './types';

export function filterApplicableRules(
  profile: PatientProfile,
  catalog: RuleCatalog,
): ApplicabilityResult {
  const completenessNotes: CompletenessNote[] = [];
  const missing = new Set<LabParameter>();

  const applies = (rule: { id: string; when?: Predicate }): boolean => {
    const outcome = evaluatePredicate(rule.when, profile);
    if (outcome.missingLabs.length > 0) {
      completenessNotes.push({ ruleId: rule.id, missingLabs: outcome.missingLabs });
      for (const lab of outcome.missingLabs) missing.add(lab);
    }
    return outcome.applies;
  };

  const specific = catalog.nutrientRules.filter((rule) => !rule.fallback && applies(rule));
  const governed = new Set<NutrientKey>(specific.map((rule) => rule.nutrient));
  const fallbacks = catalog.nutrientRules.filter(
    (rule) => rule.fallback && !governed.has(rule.nutrient) && applies(rule),
  );

  return {
    nutrientRules: [...specific, ...fallbacks].sort((a, b) => a.order - b.order),
    foodRules: catalog.foodRules.filter(applies),
    alerts: catalog.alerts.filter(applies),
    completenessNotes,
    missingLabs: LAB_PARAMETERS.filter((lab) => missing.has(lab)),
  };
}
