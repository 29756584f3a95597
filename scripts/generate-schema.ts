#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod entity schema
 *
 * Writes the shape of every entity sent to the catalog, for blueprint
 * authors and other tooling.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { NormalizedEntitySchema } from '../src/core/normalizer/EntityMapper';
import { errorMessage } from '../src/utils/errors';

const OUTPUT_PATH = path.join(__dirname, '../src/core/normalizer/schema.json');

function generateSchema() {
  console.log('Generating JSON Schema from Zod...');

  const jsonSchema = zodToJsonSchema(NormalizedEntitySchema, {
    $refStrategy: 'none',
    target: 'jsonSchema7',
    errorMessages: true,
  });

  const schemaWithMetadata = {
    ...jsonSchema,
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'NormalizedEntity',
    description: 'Catalog entity upserted for a Bitbucket project or repository',
    version: '1.0.0',
    examples: [
      {
        identifier: 'svc-a',
        title: 'Service A',
        properties: {
          description: 'Example service',
          state: 'AVAILABLE',
          forkable: true,
          public: false,
          link: 'https://bitbucket.example.com/projects/ENG/repos/svc-a/browse',
          documentation: '# Service A\n',
          swagger_url: 'https://api.svc-a.com',
        },
        relations: { project: 'ENG' },
      },
    ],
  };

  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`JSON Schema generated: ${OUTPUT_PATH}`);
  console.log('Fields: identifier, title, properties, relations');
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  console.error('Failed to generate JSON Schema:', errorMessage(error));
  process.exit(1);
}
