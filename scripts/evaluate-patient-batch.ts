#!/usr/bin/env tsx
/**
 * Batch clinical constraint evaluation
 *
 * Reads an array of patient profiles from JSON, evaluates each against the
 * rule catalog and writes a report { catalog, evaluatorVersion, results, failures }.
 * Patients with missing mandatory data are listed under failures; the batch continues.
 *
 * Usage: npm run evaluate:batch -- patients.json [report.json]
 * Or: tsx scripts/evaluate-patient-batch.ts patients.json [report.json]
 * Optional: CLINICAL_RULE_CATALOG_PATH=/path/to/catalog.json (default: bundled catalog)
 * Optional: CLINICAL_MEAL_COUNT, CLINICAL_REFERENCE_WEIGHT_KG, CLINICAL_ROUNDING_DECIMALS
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from 'dotenv';
import {
  AppError,
  EVALUATOR_VERSION,
  evaluatePatientBatch,
  loadEngineConfig,
  loadRuleCatalog,
} from '@/src/lib/clinical-rules';

config({ path: path.join(process.cwd(), '.env.local') });

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf8'));
}

function main(): void {
  const [inputArg, outputArg] = process.argv.slice(2);
  if (!inputArg) {
    console.error('❌ Usage: evaluate-patient-batch <patients.json> [report.json]');
    process.exit(1);
  }

  const catalogPath = process.env.CLINICAL_RULE_CATALOG_PATH;
  const catalog = loadRuleCatalog(catalogPath ? readJson(path.resolve(catalogPath)) : undefined);
  console.info('[clinical-rules] Catalog loaded', {
    version: catalog.version,
    source: catalog.provenance.source,
    contentHash: catalog.contentHash,
    nutrientRules: catalog.nutrientRules.length,
    foodRules: catalog.foodRules.length,
  });

  const { config: engineConfig, warnings } = loadEngineConfig(process.env);
  for (const warning of warnings) {
    console.warn(`[clinical-rules] ${warning}`);
  }

  const input = readJson(path.resolve(inputArg));
  if (!Array.isArray(input)) {
    console.error('❌ Input must be a JSON array of patient profiles');
    process.exit(1);
  }

  const { results, failures } = evaluatePatientBatch(input, catalog, { config: engineConfig });

  const report = {
    catalog: {
      version: catalog.version,
      contentHash: catalog.contentHash,
      source: catalog.provenance.source,
    },
    evaluatorVersion: EVALUATOR_VERSION,
    results,
    failures,
  };
  const json = JSON.stringify(report, null, 2);

  if (outputArg) {
    fs.writeFileSync(path.resolve(outputArg), `${json}\n`, 'utf8');
    console.log(`✅ Wrote ${results.length} result(s), ${failures.length} failure(s) to ${outputArg}`);
  } else {
    process.stdout.write(`${json}\n`);
  }
}

try {
  main();
} catch (error) {
  if (error instanceof AppError) {
    console.error(`❌ ${error.safeMessage}`, error.details ?? '');
  } else {
    console.error('❌ Batch evaluation failed:', error);
  }
  process.exit(1);
}
