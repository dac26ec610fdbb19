/**
 * Write the control API's OpenAPI document.
 *
 * Usage: npm run openapi [-- <output path>]
 * Default output: artifacts/openapi.json at the repository root.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { generateOpenApiDocument } from '../src/openapi/generate.js';

const repoRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', '..');
const outputPath = resolve(process.argv[2] ?? resolve(repoRoot, 'artifacts', 'openapi.json'));

const doc = generateOpenApiDocument();
const operations = Object.values(doc.paths ?? {}).reduce(
  (count, item) => count + ['get', 'post', 'delete'].filter(method => method in item).length,
  0,
);

mkdirSync(dirname(outputPath), { recursive: true });
writeFileSync(outputPath, `${JSON.stringify(doc, null, 2)}\n`, 'utf-8');

console.log(`Wrote ${outputPath} (${operations} operations)`);
