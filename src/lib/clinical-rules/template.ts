/**
 * Rationale templates: `{placeholder}` tokens filled from the patient context.
 */

import { classifyCkdStage } from './ckd-stage';
import { LAB_PARAMETERS, type PatientProfile } from './types';

export const TEMPLATE_PLACEHOLDERS: readonly string[] = [
  ...LAB_PARAMETERS,
  'ckdStage',
  'weightKg',
];

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g;

export type TemplateVars = Record<string, string | number | null | undefined>;

/** Placeholders used by a template that are not in TEMPLATE_PLACEHOLDERS */
export function unknownPlaceholders(template: string): string[] {
  const unknown: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (!TEMPLATE_PLACEHOLDERS.includes(name) && !unknown.includes(name)) {
      unknown.push(name);
    }
  }
  return unknown;
}

export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (_token, name: string) => {
    const value = vars[name];
    return value === null || value === undefined ? 'unknown' : String(value);
  });
}

/** Template variables for one patient: lab readings, CKD stage, weight */
export function patientTemplateVars(
  profile: PatientProfile,
  weightKg: number | null = profile.demographics.weightKg,
): TemplateVars {
  const stage = classifyCkdStage(profile.labs.egfr);
  return {
    ...profile.labs,
    ckdStage: stage ? `stage ${stage.code}` : null,
    weightKg,
  };
}
