/**
 * Run one document through text conversion and extraction without the job
 * pipeline: `npm run extract -- path/to/agreement.pdf`
 */
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { getConfig } from '@rights-parser/shared';

import { ExtractionOrchestrator } from '../packages/api/src/services/extraction/orchestrator';
import { createAzureEngine } from '../packages/api/src/services/llm/client';
import { createTextExtractor } from '../packages/api/src/services/text';
import { flushSpans } from '../packages/api/src/instrumentation';

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('usage: npm run extract -- <agreement.pdf|agreement.txt>');
    process.exit(2);
  }
  const config = getConfig();
  const buffer = await readFile(file);
  const { text, pages, format } = await createTextExtractor().extract({ buffer, fileName: path.basename(file) });
  console.error(`${format}, ${pages} page(s), ${text.length} characters`);

  const orchestrator = new ExtractionOrchestrator(createAzureEngine(), config.extraction);
  const result = await orchestrator.extract(text);
  console.log(JSON.stringify(result.data, null, 2));
  console.error(`model ${result.modelId}, ${result.attempts} attempt(s), ${result.durationMs}ms`);
  await flushSpans();
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
