#!/usr/bin/env tsx
/**
 * Load FAQ entries into the knowledge base.
 *
 * Usage:
 *   npm run kb:import -- [faq-file] [--replace]
 *
 * Without a file argument the configured FAQ path is used.
 * `--replace` deletes existing entries first.
 */
import 'dotenv/config';
import { loadConfig } from '@/config/index.js';
import { createDatabase } from '@/infrastructure/database.js';
import { createKnowledgeRepository } from '@/infrastructure/repositories/knowledge-repository.js';
import { importFaqs } from '@/knowledge/faq-import.js';
import { createLogger } from '@/observability/index.js';
import { resolveEmbeddingProvider } from '@/providers/embeddings.js';

const args = process.argv.slice(2);
const replace = args.includes('--replace');
const fileArg = args.find((arg) => !arg.startsWith('--'));

async function main(): Promise<number> {
  const configResult = await loadConfig();
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error.message}`);
    console.error(JSON.stringify(configResult.error.context, null, 2));
    return 1;
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logging.level });

  const embed = resolveEmbeddingProvider(config.embeddings);
  if (!embed) {
    console.error(`Error: ${config.embeddings.apiKeyEnvVar} must be set to embed FAQ entries`);
    return 1;
  }

  const filePath = fileArg ?? config.knowledge.faqPath;
  const database = createDatabase({ path: config.database.path, logger });
  try {
    const result = await importFaqs(filePath, {
      repository: createKnowledgeRepository(database.client),
      embed,
      logger,
      replace,
    });
    if (!result.ok) {
      console.error(`Error: ${result.error.message}`);
      return 1;
    }

    const { imported, failed, errors } = result.value;
    console.log(`\nImported ${imported.toString()} FAQ entries from ${filePath}`);
    if (failed > 0) {
      console.log(`${failed.toString()} failed:`);
      for (const message of errors) console.log(`  - ${message}`);
    }
    return failed > 0 ? 1 : 0;
  } finally {
    database.close();
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  },
);
