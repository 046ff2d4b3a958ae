/**
 * Clinical Rules - Type Definitions
 *
 * Shared types for the rule catalog, the evaluation pipeline
 * (applicability → conflicts → resolution → constraint build → citations)
 * and the ClinicalConstraint document handed to collaborators.
 */

// ---------------------------------------------------------------------------
// Closed vocabularies
// ---------------------------------------------------------------------------

export const CONDITION_KEYS = [
  'hypertension',
  'type2_diabetes',
  'chronic_kidney_disease',
  'dyslipidemia',
  'hypothyroidism',
] as const;

export type ConditionKey = (typeof CONDITION_KEYS)[number];

/**
 * Recognized lab parameters. Predicates can only reference these keys;
 * `iodine_deficiency` is a flag (1 = deficient, 0 = replete).
 */
export const LAB_PARAMETERS = [
  'egfr',
  'serum_potassium',
  'hba1c',
  'tsh',
  'ldl',
  'iodine_deficiency',
] as const;

export type LabParameter = (typeof LAB_PARAMETERS)[number];

export const LAB_UNITS: Record<LabParameter, string> = {
  egfr: 'mL/min/1.73m²',
  serum_potassium: 'mEq/L',
  hba1c: '%',
  tsh: 'mIU/L',
  ldl: 'mg/dL',
  iodine_deficiency: 'flag',
};

export const NUTRIENT_KEYS = [
  'potassium',
  'sodium',
  'phosphorus',
  'protein',
  'carbohydrates',
  'saturated_fat',
  'cholesterol',
] as const;

export type NutrientKey = (typeof NUTRIENT_KEYS)[number];

/**
 * Clinical priority categories. Rank is explicit (1 = highest) so that
 * reordering catalog entries can never change resolution behaviour.
 */
export const CLINICAL_PRIORITY_KEYS = [
  'CRITICAL_RENAL',
  'CRITICAL_CARDIAC',
  'METABOLIC',
  'LIPID',
  'ENDOCRINE',
  'GENERAL',
] as const;

export type ClinicalPriority = (typeof CLINICAL_PRIORITY_KEYS)[number];

export const CLINICAL_PRIORITY: Record<ClinicalPriority, number> = {
  CRITICAL_RENAL: 1,
  CRITICAL_CARDIAC: 2,
  METABOLIC: 3,
  LIPID: 4,
  ENDOCRINE: 5,
  GENERAL: 6,
};

/** Category wording used in override rationales */
export const CLINICAL_PRIORITY_LABELS: Record<ClinicalPriority, string> = {
  CRITICAL_RENAL: 'Renal safety',
  CRITICAL_CARDIAC: 'Cardiovascular safety',
  METABOLIC: 'Metabolic control',
  LIPID: 'Lipid management',
  ENDOCRINE: 'Endocrine balance',
  GENERAL: 'General population guidance',
};

export type FoodSeverity = 'prohibited' | 'limited' | 'warning';

/** Lower = more severe; used for deduplication and output grouping */
export const FOOD_SEVERITY_RANK: Record<FoodSeverity, number> = {
  prohibited: 0,
  limited: 1,
  warning: 2,
};

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export type LabComparisonOp = 'lt' | 'lte' | 'gt' | 'gte' | 'eq' | 'neq';

export type PredicateCondition =
  | { field: 'condition'; op: 'has' | 'lacks'; value: ConditionKey }
  | {
      field: 'lab';
      key: LabParameter;
      op: LabComparisonOp | 'exists';
      /** Required for every op except `exists` */
      value?: number;
    };

/**
 * Applicability predicate. All present parts must hold; absent predicate = always.
 */
export type Predicate = {
  all?: PredicateCondition[];
  any?: PredicateCondition[];
  not?: PredicateCondition;
};

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export type NutrientBasis = 'absolute' | 'per_kg_body_weight';

export type NutrientLimit =
  | { kind: 'maximum'; value: number; perMealValue?: number }
  | { kind: 'minimum'; value: number; perMealValue?: number }
  | { kind: 'range'; min: number; max: number };

export type NutrientDefinition = {
  key: NutrientKey;
  label: string;
  /** Output unit (for per-kg nutrients: unit after multiplying by weight) */
  unit: string;
  basis: NutrientBasis;
};

export type NutrientRule = {
  /** Stable identifier (audit trail) */
  id: string;
  nutrient: NutrientKey;
  limit: NutrientLimit;
  basis: NutrientBasis;
  unit: string;
  when?: Predicate;
  priority: ClinicalPriority;
  /** Guideline label, e.g. "KDOQI 2020" */
  source: string;
  /** Rationale template; placeholders like {egfr}, {ckdStage}, {weightKg} */
  rationale: string;
  /** Baseline rule, applicable only when no other rule for the nutrient applies */
  fallback: boolean;
  /** Declaration index in the catalog (deterministic tie-break) */
  order: number;
};

export type FoodInteraction = {
  kind: 'time_separation';
  substance: string;
  minimumHours: number;
  note: string;
};

export type FoodRestrictionRule = {
  id: string;
  food: string;
  displayName: string;
  severity: FoodSeverity;
  when?: Predicate;
  priority: ClinicalPriority;
  source: string;
  reason: string;
  alternatives: string[];
  /** Informational only; meal timing is not enforced here */
  interaction?: FoodInteraction;
  order: number;
};

export type SafetyAlertRule = {
  id: string;
  level: 'critical' | 'alert';
  when: Predicate;
  message: string;
  order: number;
};

/**
 * What an active condition mandates: labs that must be present and nutrients
 * that must be governed by a rule referencing the condition.
 */
export type ConditionRequirement = {
  condition: ConditionKey;
  labs: LabParameter[];
  nutrients: NutrientKey[];
};

export type RuleCatalog = {
  version: number;
  nutrients: NutrientDefinition[];
  nutrientRules: NutrientRule[];
  foodRules: FoodRestrictionRule[];
  alerts: SafetyAlertRule[];
  requirements: ConditionRequirement[];
  provenance: {
    source: 'bundled' | 'custom';
    loadedAt: string;
  };
  /** SHA-256 of the canonical catalog content */
  contentHash: string;
};

// ---------------------------------------------------------------------------
// Patient
// ---------------------------------------------------------------------------

export type Sex = 'female' | 'male' | 'other';

export type PatientProfile = {
  patientId: string;
  demographics: {
    ageYears: number | null;
    sex: Sex | null;
    weightKg: number | null;
  };
  /** Sorted, de-duplicated */
  conditions: ConditionKey[];
  labs: Partial<Record<LabParameter, number>>;
};

// ---------------------------------------------------------------------------
// Pipeline stages
// ---------------------------------------------------------------------------

export type CompletenessNote = {
  ruleId: string;
  missingLabs: LabParameter[];
};

export type ApplicabilityResult = {
  nutrientRules: NutrientRule[];
  foodRules: FoodRestrictionRule[];
  alerts: SafetyAlertRule[];
  completenessNotes: CompletenessNote[];
  /** Union of all missing labs, in LAB_PARAMETERS order */
  missingLabs: LabParameter[];
};

/** Numeric bound in the rule's own basis; null = unbounded on that side */
export type RuleBound = {
  min: number | null;
  max: number | null;
};

export type NutrientRuleGroup = {
  nutrient: NutrientKey;
  rules: NutrientRule[];
  conflicted: boolean;
};

export type ConflictRuleRef = {
  ruleId: string;
  priority: ClinicalPriority;
  source: string;
  bound: RuleBound;
  /** Readings of the labs the rule's predicate references */
  labReadings: LabReading[];
  rationale: string;
};

export type ConflictRecord = {
  nutrient: NutrientKey;
  unit: string;
  basis: NutrientBasis;
  winner: ConflictRuleRef;
  losers: ConflictRuleRef[];
  overrideRationale: string;
  /** True when a loser was displaced only by a kept rule of its own rank */
  tieBroken: boolean;
};

export type UnresolvedConflictWarning = {
  code: 'UNRESOLVED_CONFLICT';
  nutrient: NutrientKey;
  ruleIds: string[];
  message: string;
};

export type EvaluationWarning = UnresolvedConflictWarning;

export type ResolvedNutrientGroup = {
  nutrient: NutrientKey;
  /** Rules that shape the effective bound (priority order) */
  kept: NutrientRule[];
  conflict: ConflictRecord | null;
};

export type ResolutionResult = {
  groups: ResolvedNutrientGroup[];
  conflicts: ConflictRecord[];
  warnings: EvaluationWarning[];
};

// ---------------------------------------------------------------------------
// Output document
// ---------------------------------------------------------------------------

export type LabReading = {
  parameter: LabParameter;
  reading: number;
  unit: string;
};

export type Citation = {
  ruleId: string;
  source: string;
  conditions: ConditionKey[];
  labReadings: LabReading[];
  overrideRationale: string | null;
};

export type NutrientConstraint = {
  nutrient: NutrientKey;
  label: string;
  unit: string;
  dailyMax: number | null;
  dailyMin: number | null;
  perMealMax: number | null;
  perMealMin: number | null;
  priority: ClinicalPriority;
  rationale: string;
  overrideReason: string | null;
  /** Rules that shaped the bound, priority order */
  ruleIds: string[];
  citation: Citation;
};

export type ProteinTarget = {
  weightKg: number;
  weightSource: 'measured' | 'reference';
  gramsPerKgLow: number | null;
  gramsPerKgHigh: number | null;
  dailyMinG: number | null;
  dailyMaxG: number | null;
  perMealMinG: number | null;
  perMealMaxG: number | null;
  mealCount: number;
  rationale: string;
};

export type FoodRestrictionEntry = {
  food: string;
  displayName: string;
  severity: FoodSeverity;
  reason: string;
  priority: ClinicalPriority;
  alternatives: string[];
  interaction: FoodInteraction | null;
  citation: Citation;
};

export type SafetyAlert = {
  alertId: string;
  level: 'critical' | 'alert';
  message: string;
};

export type CkdStageCode = 'G1' | 'G2' | 'G3a' | 'G3b' | 'G4' | 'G5';

export type CkdStageInfo = {
  code: CkdStageCode;
  label: string;
  egfr: number;
};

export type ClinicalConstraint = {
  patientId: string;
  evaluatorVersion: string;
  catalog: {
    version: number;
    contentHash: string;
  };
  conditions: ConditionKey[];
  ckdStage: CkdStageInfo | null;
  /** Catalog declaration order */
  nutrients: NutrientConstraint[];
  protein: ProteinTarget | null;
  prohibitedFoods: FoodRestrictionEntry[];
  limitedFoods: FoodRestrictionEntry[];
  warningFoods: FoodRestrictionEntry[];
  conflicts: ConflictRecord[];
  warnings: EvaluationWarning[];
  alerts: SafetyAlert[];
  dataCompleteness: {
    weightSource: 'measured' | 'reference';
    missingLabs: LabParameter[];
    notes: string[];
  };
};

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export type EngineConfig = {
  /** Meals per day used for per-meal shares */
  mealCount: number;
  /** Substituted when weight is absent; null disables the default */
  referenceWeightKg: number | null;
  roundingDecimals: number;
};

export type EngineLogger = Pick<Console, 'info' | 'warn'>;

export type EvaluateOptions = {
  config?: Partial<EngineConfig>;
  logger?: EngineLogger;
};
