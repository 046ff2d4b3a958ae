/**
 * Clinical Rules - Catalog Loader
 *
 * Parses the declarative rule catalog, runs cross-entry integrity checks and
 * returns a deep-frozen RuleCatalog. Load once per process and pass the result
 * to every evaluation; a failing catalog throws CatalogIntegrityError listing
 * every issue found.
 */

import type { ZodIssue } from 'zod';
import { CatalogIntegrityError } from '@/src/lib/errors/app-error';
import bundledCatalogJson from './clinical-rule-catalog.json';
import { ruleCatalogSchema, type ParsedRuleCatalog } from './catalog.schema';
import { deepFreeze } from './freeze';
import { hashContent } from './hash';
import { predicateConditions } from './predicate';
import { unknownPlaceholders } from './template';
import type { Predicate, RuleCatalog } from './types';

export type LoadRuleCatalogOptions = {
  /** Optional timestamp for deterministic tests */
  now?: string;
};

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function checkPredicate(
  label: string,
  predicate: Predicate | undefined,
  issues: string[],
): void {
  for (const condition of predicateConditions(predicate)) {
    if (
      condition.field === 'lab' &&
      condition.op !== 'exists' &&
      condition.value === undefined
    ) {
      issues.push(
        `${label}: lab condition on ${condition.key} (${condition.op}) needs a value`,
      );
    }
  }
}

function checkTemplate(label: string, template: string, issues: string[]): void {
  const unknown = unknownPlaceholders(template);
  if (unknown.length > 0) {
    issues.push(`${label}: unknown placeholder(s) ${unknown.map((p) => `{${p}}`).join(', ')}`);
  }
}

/**
 * Cross-entry integrity checks on a schema-valid catalog.
 * Returns every issue; an empty list means the catalog is usable.
 */
export function checkCatalogIntegrity(catalog: ParsedRuleCatalog): string[] {
  const issues: string[] = [];

  const nutrientKeys = new Set<string>();
  for (const nutrient of catalog.nutrients) {
    if (nutrientKeys.has(nutrient.key)) {
      issues.push(`nutrients: ${nutrient.key} declared more than once`);
    }
    nutrientKeys.add(nutrient.key);
  }

  const seenIds = new Set<string>();
  const allIds = [
    ...catalog.nutrientRules.map((r) => r.id),
    ...catalog.foodRules.map((r) => r.id),
    ...catalog.alerts.map((r) => r.id),
  ];
  for (const id of allIds) {
    if (seenIds.has(id)) {
      issues.push(`${id}: duplicate rule id`);
    }
    seenIds.add(id);
  }

  for (const rule of catalog.nutrientRules) {
    const nutrient = catalog.nutrients.find((n) => n.key === rule.nutrient);
    if (!nutrient) {
      issues.push(`${rule.id}: targets undeclared nutrient ${rule.nutrient}`);
    } else {
      if (rule.unit !== nutrient.unit) {
        issues.push(
          `${rule.id}: unit ${rule.unit} does not match ${nutrient.key} (${nutrient.unit})`,
        );
      }
      if (rule.basis !== nutrient.basis) {
        issues.push(
          `${rule.id}: basis ${rule.basis} does not match ${nutrient.key} (${nutrient.basis})`,
        );
      }
    }

    const { limit } = rule;
    if (limit.kind === 'range') {
      if (limit.min > limit.max) {
        issues.push(`${rule.id}: range min ${limit.min} exceeds max ${limit.max}`);
      }
    } else if (limit.perMealValue !== undefined && limit.perMealValue > limit.value) {
      issues.push(
        `${rule.id}: perMealValue ${limit.perMealValue} exceeds daily value ${limit.value}`,
      );
    }

    if (rule.fallback) {
      if (rule.when) {
        issues.push(`${rule.id}: fallback rules must be unconditional`);
      }
      if (rule.priority !== 'GENERAL') {
        issues.push(`${rule.id}: fallback rules must have priority GENERAL`);
      }
    }

    checkPredicate(rule.id, rule.when, issues);
    checkTemplate(rule.id, rule.rationale, issues);
  }

  for (const nutrient of catalog.nutrients) {
    const fallbacks = catalog.nutrientRules.filter(
      (r) => r.nutrient === nutrient.key && r.fallback,
    );
    if (fallbacks.length !== 1) {
      issues.push(
        `${nutrient.key}: expected exactly one fallback rule, found ${fallbacks.length}`,
      );
    }
  }

  for (const rule of catalog.foodRules) {
    checkPredicate(rule.id, rule.when, issues);
    checkTemplate(rule.id, rule.reason, issues);
  }

  for (const alert of catalog.alerts) {
    checkPredicate(alert.id, alert.when, issues);
    checkTemplate(alert.id, alert.message, issues);
  }

  const requirementConditions = new Set<string>();
  for (const requirement of catalog.requirements) {
    if (requirementConditions.has(requirement.condition)) {
      issues.push(`requirements: ${requirement.condition} listed more than once`);
    }
    requirementConditions.add(requirement.condition);
    for (const nutrient of requirement.nutrients) {
      if (!nutrientKeys.has(nutrient)) {
        issues.push(
          `requirements.${requirement.condition}: undeclared nutrient ${nutrient}`,
        );
      }
    }
  }

  return issues;
}

/**
 * Load and validate a rule catalog.
 *
 * @param input - Declarative catalog (parsed JSON); defaults to the bundled catalog
 * @throws CatalogIntegrityError when the catalog is malformed
 */
export function loadRuleCatalog(
  input?: unknown,
  options: LoadRuleCatalogOptions = {},
): RuleCatalog {
  const raw = input === undefined ? bundledCatalogJson : input;
  const parsed = ruleCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogIntegrityError(parsed.error.errors.map(formatIssue));
  }

  const issues = checkCatalogIntegrity(parsed.data);
  if (issues.length > 0) {
    throw new CatalogIntegrityError(issues);
  }

  const data = parsed.data;
  const catalog: RuleCatalog = {
    version: data.version,
    nutrients: data.nutrients,
    nutrientRules: data.nutrientRules.map((rule, order) => ({ ...rule, order })),
    foodRules: data.foodRules.map((rule, order) => ({ ...rule, order })),
    alerts: data.alerts.map((rule, order) => ({ ...rule, order })),
    requirements: data.requirements,
    provenance: {
      source: input === undefined ? 'bundled' : 'custom',
      loadedAt: options.now ?? new Date().toISOString(),
    },
    contentHash: hashContent(data),
  };

  return deepFreeze(catalog);
}
