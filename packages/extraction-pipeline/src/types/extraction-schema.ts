import type { JsonValue } from '@chapterwise/model';

import { z } from 'zod';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

export const extractionItemSchema = z.union([
  z.string(),
  z.record(z.string(), jsonValueSchema),
]);

/**
 * Any JSON object
 */
export const jsonObjectSchema = z.record(z.string(), jsonValueSchema);

/**
 * Required shape of a generator response: five list-typed fields.
 * Entries are checked loosely here and normalized afterwards.
 */
export const extractionResponseSchema = z.object({
  domains: z.array(jsonValueSchema),
  principles: z.array(jsonValueSchema),
  rules: z.array(jsonValueSchema),
  claims: z.array(jsonValueSchema),
  warnings: z.array(jsonValueSchema),
});

export type ExtractionResponse = z.infer<typeof extractionResponseSchema>;

export const REQUIRED_RESPONSE_KEYS = [
  'domains',
  'principles',
  'rules',
  'claims',
  'warnings',
] as const;
