/**
 * JSON Schema export of the catalog format, for editor validation of
 * hand-maintained catalog files.
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import { ruleCatalogSchema } from './catalog.schema';

export function ruleCatalogJsonSchema() {
  return zodToJsonSchema(ruleCatalogSchema, {
    name: 'RuleCatalog',
    target: 'jsonSchema7',
  });
}
