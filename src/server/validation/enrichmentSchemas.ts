import { z } from 'zod';
import { SUGGESTION_KINDS } from '../types/enrichment.js';

/**
 * Numeric strings ("0.9") become numbers; null and blanks become undefined so
 * the default applies. Anything else is left for the number check to reject.
 */
const confidenceSchema = z.preprocess((value) => {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : Number(trimmed);
  }
  return value;
}, z.number().finite().min(0).max(1).default(0));

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/**
 * One suggestion as proposed by the language model, before it is checked
 * against the schema it was generated for.
 */
export const candidateSuggestionSchema = z.object({
  column: optionalText,
  kind: z.enum(SUGGESTION_KINDS),
  value: z.string().trim().min(1, 'value must be non-empty text'),
  confidence: confidenceSchema,
  rationale: optionalText,
});

export type CandidateSuggestion = z.infer<typeof candidateSuggestionSchema>;

/**
 * Envelope of the model response. Elements stay `unknown` so each candidate is
 * decoded on its own.
 */
export const suggestionEnvelopeSchema = z.union([
  z.object({ suggestions: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

const datasetIdSchema = z.string().trim().min(1, 'dataset identifier must be non-empty');

export const enrichBatchBodySchema = z.object({
  datasetIds: z.array(datasetIdSchema).min(1, 'at least one dataset identifier is required').max(1000),
  concurrency: z.number().int().min(1).max(50).optional(),
});

export type EnrichBatchBody = z.infer<typeof enrichBatchBodySchema>;

export const applySuggestionsBodySchema = z.object({
  suggestionIds: z.array(z.string().uuid()).min(1, 'at least one suggestion id is required').max(1000),
  override: z.boolean().optional().default(false),
});

export type ApplySuggestionsBody = z.infer<typeof applySuggestionsBodySchema>;

export const suggestionIdParamsSchema = z.object({
  id: z.string().uuid(),
});

export const datasetIdParamsSchema = z.object({
  datasetId: datasetIdSchema,
});
