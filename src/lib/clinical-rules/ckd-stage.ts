import type { CkdStageCode, CkdStageInfo } from './types';

/** KDIGO eGFR categories, highest threshold first */
const CKD_STAGES: Array<{ code: CkdStageCode; minEgfr: number; label: string }> = [
  { code: 'G1', minEgfr: 90, label: 'Stage 1 (Normal or High)' },
  { code: 'G2', minEgfr: 60, label: 'Stage 2 (Mild)' },
  { code: 'G3a', minEgfr: 45, label: 'Stage 3a (Moderate)' },
  { code: 'G3b', minEgfr: 30, label: 'Stage 3b (Moderate-Severe)' },
  { code: 'G4', minEgfr: 15, label: 'Stage 4 (Severe)' },
];

/**
 * Classify CKD stage from eGFR (mL/min/1.73m²). Display and citation only;
 * rule applicability always reads the eGFR value itself.
 */
export function classifyCkdStage(egfr: number | null | undefined): CkdStageInfo | null {
  if (egfr === null || egfr === undefined) return null;

  for (const stage of CKD_STAGES) {
    if (egfr >= stage.minEgfr) {
      return { code: stage.code, label: stage.label, egfr };
    }
  }
  return { code: 'G5', label: 'Stage 5 (Kidney Failure)', egfr };
}
