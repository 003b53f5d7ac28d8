/**
 * FAQ import: loads a FAQ JSON file, embeds each entry and stores it.
 *
 * Accepts either a bare array of `{ question, answer, category }` records or
 * an object with those records under `faqs`.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { TriageError, ValidationError } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import type { Result } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';
import type { EmbeddingGenerator } from '@/providers/types.js';
import type { FaqImportResult, FaqItem, KnowledgeRepository } from './types.js';

/** Embedding calls in flight at once. */
const BATCH_SIZE = 20;

const faqItemSchema = z.object({
  question: z.string().min(1),
  answer: z.string().min(1),
  category: z.string().min(1),
});

const faqListSchema = z.array(faqItemSchema);

export interface ImportFaqsOptions {
  repository: KnowledgeRepository;
  embed: EmbeddingGenerator;
  logger: Logger;
  /** Delete existing entries first. */
  replace?: boolean;
}

/** Text that gets embedded for one FAQ. */
export function faqEmbeddingText(item: FaqItem): string {
  return `Q: ${item.question}\nA: ${item.answer}`;
}

/** Parse and validate the raw contents of a FAQ file. */
export function parseFaqFile(raw: string): Result<FaqItem[], ValidationError> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return err(new ValidationError('FAQ file is not valid JSON'));
  }

  const records =
    typeof json === 'object' && json !== null && !Array.isArray(json) && 'faqs' in json
      ? json.faqs
      : json;

  const parsed = faqListSchema.safeParse(records);
  if (!parsed.success) {
    return err(
      new ValidationError('FAQ file does not match the expected format', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return ok(parsed.data);
}

/** Embed and store FAQ items in batches. Individual failures are counted, not thrown. */
export async function importFaqItems(
  items: readonly FaqItem[],
  options: ImportFaqsOptions,
): Promise<FaqImportResult> {
  const { repository, embed, logger } = options;
  let imported = 0;
  let failed = 0;
  const errors: string[] = [];

  if (options.replace) {
    const removed = await repository.clear();
    logger.info('Cleared knowledge base before import', { component: 'faq-import', removed });
  }

  for (let i = 0; i < items.length; i += BATCH_SIZE) {
    const batch = items.slice(i, i + BATCH_SIZE);

    await Promise.all(
      batch.map(async (item, batchIdx) => {
        const index = i + batchIdx;
        try {
          const embedding = await embed(faqEmbeddingText(item));
          await repository.create({
            title: item.question,
            content: item.answer,
            category: item.category,
            embedding,
          });
          imported++;
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          failed++;
          errors.push(`Item ${index.toString()}: ${message}`);
          logger.warn('FAQ import item failed', {
            component: 'faq-import',
            itemIndex: index,
            error: message,
          });
        }
      }),
    );
  }

  logger.info('FAQ import complete', { component: 'faq-import', imported, failed });
  return { imported, failed, errors };
}

/** Read a FAQ file from disk and import it. */
export async function importFaqs(
  filePath: string,
  options: ImportFaqsOptions,
): Promise<Result<FaqImportResult, TriageError>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    return err(
      new TriageError({
        message: `Failed to read FAQ file: ${filePath}`,
        code: 'FAQ_FILE_UNREADABLE',
        statusCode: 400,
        cause: error instanceof Error ? error : undefined,
        context: { filePath },
      }),
    );
  }

  const parsed = parseFaqFile(raw);
  if (!parsed.ok) return parsed;

  return ok(await importFaqItems(parsed.value, options));
}
