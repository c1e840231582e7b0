/**
 * Request validation schemas for the HTTP surface.
 */

import { z } from 'zod';
import { SENTIMENT_LABELS } from '../nlp/labels';
import { ingestItemSchema } from '../services/articleService';
import { ValidationError } from '../errors';

const scoreSchema = z.number().min(-1, 'Score must be >= -1').max(1, 'Score must be <= 1');
const labelSchema = z.enum(SENTIMENT_LABELS);
const sentimentTypeSchema = z.enum(['positive', 'negative']);
const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const textBodySchema = z.object({
  text: z.string().min(1, 'Text is required').max(10000, 'Text exceeds 10000 character limit'),
});

export const searchQuerySchema = z.object({
  tickers: z.string().min(1, 'tickers is required').max(500),
  time_from: z.string().optional(),
  time_to: z.string().optional(),
  limit: z.coerce.number().int().optional(),
});

export const ingestBodySchema = z.object({
  articles: z.array(ingestItemSchema).min(1).max(1000),
});

export const queueBuildBodySchema = z.object({
  date: dateSchema.optional(),
  limit: z.number().int().optional(),
});

export const queueListQuerySchema = z.object({
  date: dateSchema.optional(),
  status: z.enum(['pending', 'labeled', 'skipped']).optional(),
});

export const queueDateQuerySchema = z.object({
  date: dateSchema.optional(),
});

export const itemIdParamsSchema = z.object({
  id: z.coerce.number().int().positive('Queue item id must be a positive integer'),
});

export const queueSubmitBodySchema = z.object({
  userScore: scoreSchema,
  userLabel: labelSchema.optional(),
  comment: z.string().max(2000).nullish(),
});

export const feedbackBodySchema = z.object({
  articleId: z.number().int().positive().nullish(),
  title: z.string().min(1).max(1000),
  url: z.string().max(2048).nullish(),
  predictedScore: scoreSchema,
  predictedLabel: labelSchema.optional(),
  userScore: scoreSchema,
  userLabel: labelSchema.optional(),
  comment: z.string().max(2000).nullish(),
});

export const daysQuerySchema = z.object({
  days: z.coerce.number().int().default(7),
});

export const limitQuerySchema = z.object({
  limit: z.coerce.number().int().default(50),
});

export const aggregatedQuerySchema = z.object({
  min_confidence: z.coerce.number().optional(),
  min_frequency: z.coerce.number().int().optional(),
  lookback_days: z.coerce.number().int().optional(),
});

export const pendingKeywordsQuerySchema = z.object({
  lookback_days: z.coerce.number().int().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const approveKeywordBodySchema = z.object({
  keyword: z.string().min(1).max(200),
  sentimentType: sentimentTypeSchema,
  weight: z.number().gt(0).max(1),
  approvedBy: z.string().max(200).optional(),
});

export const rejectKeywordBodySchema = z.object({
  keyword: z.string().min(1).max(200),
  sentimentType: sentimentTypeSchema.optional(),
});

export const llmRunBodySchema = z.object({
  date: dateSchema.optional(),
  minUncertainty: z.number().min(0).max(1).optional(),
  limit: z.number().int().optional(),
});

/** Parses `value` or throws a ValidationError carrying the zod issues. */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, message: string = 'Invalid request'): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, result.error.errors);
  }
  return result.data;
}
