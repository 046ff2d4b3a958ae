/**
 * Clinical Rules - Public API
 *
 * Load the catalog once, build profiles from collaborator input, evaluate.
 */

// Type exports
export type {
  ConditionKey,
  LabParameter,
  NutrientKey,
  ClinicalPriority,
  FoodSeverity,
  Predicate,
  PredicateCondition,
  NutrientRule,
  FoodRestrictionRule,
  SafetyAlertRule,
  ConditionRequirement,
  RuleCatalog,
  PatientProfile,
  ApplicabilityResult,
  NutrientRuleGroup,
  ConflictRecord,
  ConflictRuleRef,
  EvaluationWarning,
  ResolutionResult,
  Citation,
  NutrientConstraint,
  ProteinTarget,
  FoodRestrictionEntry,
  SafetyAlert,
  CkdStageInfo,
  ClinicalConstraint,
  EngineConfig,
  EngineLogger,
  EvaluateOptions,
} from './types';
export type { PatientProfileInput } from './patient-profile';
export type { EngineConfigResult } from './config';
export type { BatchFailure, BatchOptions, BatchResult } from './engine';
export type { RuleCatalogInput } from './catalog.schema';

// Vocabularies
export {
  CLINICAL_PRIORITY,
  CLINICAL_PRIORITY_KEYS,
  CONDITION_KEYS,
  LAB_PARAMETERS,
  LAB_UNITS,
  NUTRIENT_KEYS,
} from './types';

// Catalog
export { loadRuleCatalog, checkCatalogIntegrity } from './catalog-loader';
export { ruleCatalogSchema } from './catalog.schema';
export { ruleCatalogJsonSchema } from './catalog-json-schema';

// Profile
export { createPatientProfile, patientProfileInputSchema } from './patient-profile';

// Pipeline stages
export { filterApplicableRules } from './applicability';
export { detectConflicts } from './conflicts';
export { resolveConflicts, sortByClinicalPriority } from './resolver';
export { buildConstraints } from './constraint-builder';
export { buildCitation } from './explainability';
export { classifyCkdStage } from './ckd-stage';

// Engine
export {
  EVALUATOR_VERSION,
  evaluateClinicalConstraints,
  evaluatePatientBatch,
  serializeClinicalConstraint,
} from './engine';
export { DEFAULT_ENGINE_CONFIG, loadEngineConfig, resolveEngineConfig } from './config';

// Errors
export {
  AppError,
  CatalogIntegrityError,
  DataCompletenessError,
  ValidationError,
} from '@/src/lib/errors/app-error';
