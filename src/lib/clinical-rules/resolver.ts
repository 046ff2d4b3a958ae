/**
 * Priority Resolver
 *
 * Settles each conflicted nutrient group by clinical priority. Rules are
 * ordered by rank, then declaration index; the first is the winner. Every
 * later rule whose interval still intersects the accumulated bound is kept
 * (it tightens the result), the rest are displaced and recorded.
 */

import { intersectBounds, isSatisfiable, ruleBound } from './conflicts';
import { presentLabReadings } from './explainability';
import { patientTemplateVars, renderTemplate, type TemplateVars } from './template';
import {
  CLINICAL_PRIORITY,
  CLINICAL_PRIORITY_LABELS,
  type ConflictRecord,
  type ConflictRuleRef,
  type EngineLogger,
  type EvaluationWarning,
  type NutrientRule,
  type NutrientRuleGroup,
  type PatientProfile,
  type RuleBound,
  type ResolutionResult,
  type ResolvedNutrientGroup,
  type RuleCatalog,
} from './types';

/**
 * Sort rules deterministically
 *
 * Sort order:
 * 1. Clinical priority rank ASC (CRITICAL_RENAL first)
 * 2. Catalog declaration index ASC
 */
export function sortByClinicalPriority(rules: NutrientRule[]): NutrientRule[] {
  return [...rules].sort((a, b) => {
    const rankDiff = CLINICAL_PRIORITY[a.priority] - CLINICAL_PRIORITY[b.priority];
    if (rankDiff !== 0) return rankDiff;
    return a.order - b.order;
  });
}

function toRuleRef(
  rule: NutrientRule,
  vars: TemplateVars,
  profile: PatientProfile,
): ConflictRuleRef {
  return {
    ruleId: rule.id,
    priority: rule.priority,
    source: rule.source,
    bound: ruleBound(rule),
    labReadings: presentLabReadings(rule.when, profile),
    rationale: renderTemplate(rule.rationale, vars),
  };
}

/**
 * A loser is tied when the kept rules of strictly higher priority still admit
 * it: only a kept rule of its own rank displaced it.
 */
function isTiedLoser(loser: NutrientRule, kept: NutrientRule[]): boolean {
  const rank = CLINICAL_PRIORITY[loser.priority];
  const above = kept
    .filter((rule) => CLINICAL_PRIORITY[rule.priority] < rank)
    .map(ruleBound)
    .reduce<RuleBound>(intersectBounds, { min: null, max: null });
  return isSatisfiable(intersectBounds(above, ruleBound(loser)));
}

function overrideRationale(
  winner: ConflictRuleRef,
  losers: ConflictRuleRef[],
  tieBroken: boolean,
): string {
  const displaced = losers
    .map((loser) => `${loser.ruleId} (${loser.priority}, ${loser.source})`)
    .join('; ');
  const verb = tieBroken ? 'takes precedence by declaration order over' : 'overrides';
  return `${winner.rationale}. ${CLINICAL_PRIORITY_LABELS[winner.priority]} (${winner.priority}) ${verb} ${displaced}.`;
}

function resolveGroup(
  group: NutrientRuleGroup,
  catalog: RuleCatalog,
  vars: TemplateVars,
  profile: PatientProfile,
): { resolved: ResolvedNutrientGroup; warning: EvaluationWarning | null } {
  const ordered = sortByClinicalPriority(group.rules);
  if (!group.conflicted) {
    return {
      resolved: { nutrient: group.nutrient, kept: ordered, conflict: null },
      warning: null,
    };
  }

  const [winner, ...rest] = ordered;
  const kept: NutrientRule[] = [winner];
  const losers: NutrientRule[] = [];
  let accumulated = ruleBound(winner);

  for (const rule of rest) {
    const next = intersectBounds(accumulated, ruleBound(rule));
    if (isSatisfiable(next)) {
      kept.push(rule);
      accumulated = next;
    } else {
      losers.push(rule);
    }
  }

  const tiedLosers = losers.filter((loser) => isTiedLoser(loser, kept));
  const tieBroken = tiedLosers.length > 0;

  const nutrient = catalog.nutrients.find((n) => n.key === group.nutrient);
  const winnerRef = toRuleRef(winner, vars, profile);
  const loserRefs = losers.map((loser) => toRuleRef(loser, vars, profile));

  const conflict: ConflictRecord = {
    nutrient: group.nutrient,
    unit: nutrient ? nutrient.unit : winner.unit,
    basis: winner.basis,
    winner: winnerRef,
    losers: loserRefs,
    overrideRationale: overrideRationale(winnerRef, loserRefs, tieBroken),
    tieBroken,
  };

  const warning: EvaluationWarning | null = tieBroken
    ? {
        code: 'UNRESOLVED_CONFLICT',
        nutrient: group.nutrient,
        ruleIds: [...kept, ...tiedLosers]
          .filter((rule) => rule.priority === tiedLosers[0].priority)
          .map((rule) => rule.id),
        message: `Conflicting ${group.nutrient} rules share priority ${tiedLosers[0].priority}; ${winner.id} kept by declaration order, needs clinical review`,
      }
    : null;

  return {
    resolved: { nutrient: group.nutrient, kept, conflict },
    warning,
  };
}

/**
 * Resolve every nutrient group. Non-conflicted groups pass through with
 * all rules kept; ties never abort evaluation, they produce a warning.
 */
export function resolveConflicts(
  groups: NutrientRuleGroup[],
  profile: PatientProfile,
  catalog: RuleCatalog,
  logger: EngineLogger = console,
): ResolutionResult {
  const vars = patientTemplateVars(profile);
  const resolvedGroups: ResolvedNutrientGroup[] = [];
  const conflicts: ConflictRecord[] = [];
  const warnings: EvaluationWarning[] = [];

  for (const group of groups) {
    const { resolved, warning } = resolveGroup(group, catalog, vars, profile);
    resolvedGroups.push(resolved);
    if (resolved.conflict) conflicts.push(resolved.conflict);
    if (warning) {
      warnings.push(warning);
      logger.warn('[clinical-rules] Priority tie resolved by declaration order', {
        patientId: profile.patientId,
        nutrient: warning.nutrient,
        ruleIds: warning.ruleIds,
      });
    }
  }

  return { groups: resolvedGroups, conflicts, warnings };
}
