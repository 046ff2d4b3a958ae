#!/usr/bin/env tsx
/**
 * Write the rule catalog JSON Schema (for editors validating catalog files).
 *
 * Usage: npm run export:catalog-schema -- [output.json]
 * Default output: src/lib/clinical-rules/clinical-rule-catalog.schema.json
 */

import * as fs from 'fs';
import * as path from 'path';
import { ruleCatalogJsonSchema } from '@/src/lib/clinical-rules/catalog-json-schema';

const DEFAULT_OUTPUT = path.join(
  process.cwd(),
  'src',
  'lib',
  'clinical-rules',
  'clinical-rule-catalog.schema.json',
);

const outputPath = path.resolve(process.argv[2] ?? DEFAULT_OUTPUT);

try {
  fs.writeFileSync(outputPath, `${JSON.stringify(ruleCatalogJsonSchema(), null, 2)}\n`, 'utf8');
  console.log(`✅ Wrote catalog schema to ${outputPath}`);
} catch (error) {
  console.error('❌ Failed to write catalog schema:', error);
  process.exit(1);
}
