import type { CheckpointRecord, ExtractionResult } from '@chapterwise/model';

import { z } from 'zod';

import { extractionItemSchema, jsonValueSchema } from '../types/extraction-schema';

const storedResultSchema = z.object({
  domains: z.array(z.string()),
  principles: z.array(extractionItemSchema),
  rules: z.array(extractionItemSchema),
  claims: z.array(extractionItemSchema),
  warnings: z.array(extractionItemSchema),
  verbatim_warning: z.string().optional(),
  extra: z.record(z.string(), jsonValueSchema).optional(),
});

/**
 * On-disk checkpoint layout, one JSON file per chapter
 */
export const checkpointFileSchema = z
  .object({
    total_chunks: z.number().int().nonnegative(),
    completed: z.record(z.string().regex(/^\d+$/), storedResultSchema),
  })
  .superRefine((file, ctx) => {
    for (const index of Object.keys(file.completed)) {
      if (Number(index) >= file.total_chunks) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['completed', index],
          message: `chunk index exceeds total_chunks (${file.total_chunks})`,
        });
      }
    }
  });

export type CheckpointFile = z.infer<typeof checkpointFileSchema>;
type StoredResult = z.infer<typeof storedResultSchema>;

export function toCheckpointFile(record: CheckpointRecord): CheckpointFile {
  const completed: Record<string, StoredResult> = {};
  for (const [index, result] of Object.entries(record.completed)) {
    completed[index] = toStoredResult(result);
  }
  return { total_chunks: record.totalChunks, completed };
}

export function fromCheckpointFile(file: CheckpointFile): CheckpointRecord {
  const completed: Record<number, ExtractionResult> = {};
  for (const [index, stored] of Object.entries(file.completed)) {
    completed[Number(index)] = fromStoredResult(stored);
  }
  return { totalChunks: file.total_chunks, completed };
}

function toStoredResult(result: ExtractionResult): StoredResult {
  const stored: StoredResult = {
    domains: result.domains,
    principles: result.principles,
    rules: result.rules,
    claims: result.claims,
    warnings: result.warnings,
  };
  if (result.verbatimWarning !== undefined) {
    stored.verbatim_warning = result.verbatimWarning;
  }
  if (result.extra !== undefined) {
    stored.extra = result.extra;
  }
  return stored;
}

function fromStoredResult(stored: StoredResult): ExtractionResult {
  const result: ExtractionResult = {
    domains: stored.domains,
    principles: stored.principles,
    rules: stored.rules,
    claims: stored.claims,
    warnings: stored.warnings,
  };
  if (stored.verbatim_warning !== undefined) {
    result.verbatimWarning = stored.verbatim_warning;
  }
  if (stored.extra !== undefined) {
    result.extra = stored.extra;
  }
  return result;
}
