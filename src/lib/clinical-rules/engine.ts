/**
 * Clinical Rules - Evaluation Engine
 *
 * Runs the forward pipeline for one patient:
 * applicability → conflict detection → priority resolution →
 * constraint build → citations.
 *
 * Evaluation is synchronous and pure apart from logging. The returned
 * document is deep-frozen and carries no wall-clock timestamps, so the same
 * profile against the same catalog always serializes to identical JSON.
 */

import { ValidationError } from '@/src/lib/errors/app-error';
import { filterApplicableRules } from './applicability';
import { resolveEngineConfig } from './config';
import { detectConflicts } from './conflicts';
import { buildConstraints } from './constraint-builder';
import { citeFoodRestrictions, citeNutrientLimits } from './explainability';
import { deepFreeze } from './freeze';
import { createPatientProfile } from './patient-profile';
import { resolveConflicts } from './resolver';
import type {
  ClinicalConstraint,
  EvaluateOptions,
  PatientProfile,
  RuleCatalog,
} from './types';

/**
 * Evaluator version (bump on output-affecting changes)
 */
export const EVALUATOR_VERSION = '1.0.0';

/**
 * Evaluate one patient against a loaded catalog.
 *
 * @throws DataCompletenessError when mandatory data is missing
 */
export function evaluateClinicalConstraints(
  profile: PatientProfile,
  catalog: RuleCatalog,
  options: EvaluateOptions = {},
): ClinicalConstraint {
  const config = resolveEngineConfig(options.config);
  const logger = options.logger ?? console;

  const applicability = filterApplicableRules(profile, catalog);
  const groups = detectConflicts(applicability.nutrientRules, catalog);
  const resolution = resolveConflicts(groups, profile, catalog, logger);
  const draft = buildConstraints({ profile, catalog, applicability, resolution, config });
  const foods = citeFoodRestrictions(draft.foods, profile);

  const notes = [
    ...draft.notes,
    ...applicability.completenessNotes.map(
      (note) => `${note.ruleId}: not applied, missing ${note.missingLabs.join(', ')}`,
    ),
  ];
  if (applicability.missingLabs.length > 0) {
    logger.warn('[clinical-rules] Rules skipped for missing lab data', {
      patientId: profile.patientId,
      missingLabs: applicability.missingLabs,
    });
  }

  const constraint: ClinicalConstraint = {
    patientId: profile.patientId,
    evaluatorVersion: EVALUATOR_VERSION,
    catalog: {
      version: catalog.version,
      contentHash: catalog.contentHash,
    },
    conditions: [...profile.conditions],
    ckdStage: draft.ckdStage,
    nutrients: citeNutrientLimits(draft.nutrients, profile),
    protein: draft.protein,
    prohibitedFoods: foods.prohibitedFoods,
    limitedFoods: foods.limitedFoods,
    warningFoods: foods.warningFoods,
    conflicts: resolution.conflicts,
    warnings: resolution.warnings,
    alerts: draft.alerts,
    dataCompleteness: {
      weightSource: draft.weightSource,
      missingLabs: applicability.missingLabs,
      notes,
    },
  };

  return deepFreeze(constraint);
}

export type BatchFailure = {
  patientId: string;
  code: string;
  message: string;
  issues: string[];
};

export type BatchResult = {
  results: ClinicalConstraint[];
  failures: BatchFailure[];
};

export type BatchOptions = EvaluateOptions & {
  /** Re-sort results and failures by patient id (default true) */
  sortByPatientId?: boolean;
};

function inputPatientId(input: unknown, index: number): string {
  if (typeof input === 'object' && input !== null && 'patientId' in input) {
    const id = input.patientId;
    if (typeof id === 'string' && id.trim() !== '') return id.trim();
    if (typeof id === 'number') return String(id);
  }
  return `#${index + 1}`;
}

function byPatientId(a: { patientId: string }, b: { patientId: string }): number {
  return a.patientId < b.patientId ? -1 : a.patientId > b.patientId ? 1 : 0;
}

/**
 * Evaluate many patients independently. A ValidationError (including
 * DataCompletenessError) is recorded against that patient and the batch
 * continues; any other error propagates.
 *
 * @throws ValidationError when `options.config` is invalid
 */
export function evaluatePatientBatch(
  inputs: unknown[],
  catalog: RuleCatalog,
  options: BatchOptions = {},
): BatchResult {
  const config = resolveEngineConfig(options.config);
  const logger = options.logger ?? console;
  const results: ClinicalConstraint[] = [];
  const failures: BatchFailure[] = [];

  inputs.forEach((input, index) => {
    try {
      const profile = createPatientProfile(input);
      results.push(evaluateClinicalConstraints(profile, catalog, { config, logger }));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      const failure: BatchFailure = {
        patientId: inputPatientId(input, index),
        code: error.code,
        message: error.safeMessage,
        issues: [...error.issues],
      };
      failures.push(failure);
      logger.warn('[clinical-rules] Patient skipped', {
        patientId: failure.patientId,
        code: failure.code,
        issues: failure.issues,
      });
    }
  });

  if (options.sortByPatientId ?? true) {
    results.sort(byPatientId);
    failures.sort(byPatientId);
  }

  return { results, failures };
}

/** Stable JSON for a constraint document (2-space indent) */
export function serializeClinicalConstraint(constraint: ClinicalConstraint): string {
  return JSON.stringify(constraint, null, 2);
}
