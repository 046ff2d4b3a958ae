/**
 * Predicate evaluation for catalog `when` expressions.
 *
 * Three-valued: a lab condition whose lab is absent from the profile is
 * 'unknown'. An unknown predicate never applies; callers record the missing
 * labs as a data-completeness note.
 */

import type {
  ConditionKey,
  LabParameter,
  PatientProfile,
  Predicate,
  PredicateCondition,
} from './types';

export type Truth = true | false | 'unknown';

export type PredicateOutcome = {
  applies: boolean;
  /** Labs whose absence made the outcome unknown (empty when decided) */
  missingLabs: LabParameter[];
};

function evaluateCondition(
  condition: PredicateCondition,
  profile: PatientProfile,
  missing: Set<LabParameter>,
): Truth {
  if (condition.field === 'condition') {
    const has = profile.conditions.includes(condition.value);
    return condition.op === 'has' ? has : !has;
  }

  const reading = profile.labs[condition.key];
  if (condition.op === 'exists') {
    return reading !== undefined;
  }
  if (reading === undefined) {
    missing.add(condition.key);
    return 'unknown';
  }
  // Rejected by the catalog loader; kept for custom catalogs built in code
  if (condition.value === undefined) return false;

  switch (condition.op) {
    case 'lt':
      return reading < condition.value;
    case 'lte':
      return reading <= condition.value;
    case 'gt':
      return reading > condition.value;
    case 'gte':
      return reading >= condition.value;
    case 'eq':
      return reading === condition.value;
    case 'neq':
      return reading !== condition.value;
  }
}

function and(values: Truth[]): Truth {
  if (values.includes(false)) return false;
  if (values.includes('unknown')) return 'unknown';
  return true;
}

function or(values: Truth[]): Truth {
  if (values.includes(true)) return true;
  if (values.includes('unknown')) return 'unknown';
  return false;
}

function not(value: Truth): Truth {
  return value === 'unknown' ? 'unknown' : !value;
}

/**
 * Evaluate a predicate against a profile.
 * Absent predicate = unconditional.
 */
export function evaluatePredicate(
  predicate: Predicate | undefined,
  profile: PatientProfile,
): PredicateOutcome {
  if (!predicate) return { applies: true, missingLabs: [] };

  const missing = new Set<LabParameter>();
  const parts: Truth[] = [];

  if (predicate.all) {
    parts.push(
      and(predicate.all.map((c) => evaluateCondition(c, profile, missing))),
    );
  }
  if (predicate.any) {
    parts.push(
      or(predicate.any.map((c) => evaluateCondition(c, profile, missing))),
    );
  }
  if (predicate.not) {
    parts.push(not(evaluateCondition(predicate.not, profile, missing)));
  }

  const result = and(parts);
  return {
    applies: result === true,
    missingLabs: result === 'unknown' ? [...missing].sort() : [],
  };
}

/** Flattened conditions of a predicate (all, any, not) */
export function predicateConditions(predicate: Predicate | undefined): PredicateCondition[] {
  if (!predicate) return [];
  return [
    ...(predicate.all ?? []),
    ...(predicate.any ?? []),
    ...(predicate.not ? [predicate.not] : []),
  ];
}

/** Lab parameters a predicate references, first-mention order, unique */
export function referencedLabs(predicate: Predicate | undefined): LabParameter[] {
  const labs: LabParameter[] = [];
  for (const c of predicateConditions(predicate)) {
    if (c.field === 'lab' && !labs.includes(c.key)) labs.push(c.key);
  }
  return labs;
}

/** Conditions a predicate requires to be present (`has`), unique */
export function referencedConditions(
  predicate: Predicate | undefined,
): ConditionKey[] {
  const conditions: ConditionKey[] = [];
  for (const c of predicateConditions(predicate)) {
    if (c.field === 'condition' && c.op === 'has' && !conditions.includes(c.value)) {
      conditions.push(c.value);
    }
  }
  return conditions;
}
