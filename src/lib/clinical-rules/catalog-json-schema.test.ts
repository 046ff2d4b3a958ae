/**
 * Clinical Rules - Catalog JSON Schema export tests
 *
 * Run: node --import tsx --test src/lib/clinical-rules/catalog-json-schema.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ruleCatalogJsonSchema } from './catalog-json-schema';

describe('ruleCatalogJsonSchema', () => {
  it('exposes the catalog under a single named definition', () => {
    const schema = ruleCatalogJsonSchema();
    assert.deepStrictEqual(Object.keys(schema.definitions ?? {}), ['RuleCatalog']);
  });

  it('names the catalog sections and rule vocabularies', () => {
    const text = JSON.stringify(ruleCatalogJsonSchema());
    for (const key of ['nutrientRules', 'foodRules', 'alerts', 'requirements', 'CRITICAL_RENAL', 'iodine_deficiency']) {
      assert.ok(text.includes(`"${key}"`), key);
    }
  });
});
