import { z } from 'zod';

export const FactCheckStatusSchema = z.enum([
  'completed',
  'no_sources',
  'no_content',
  'failed',
  'unsupported',
]);

export const FactCheckRecordSchema = z.object({
  news_id: z.string().nullable(),
  trusted_urls: z.array(z.string()),
  scraped_content_count: z.number().int().min(0),
  summarized_answer: z.string(),
  fact_check_assessment: z.string(),
  further_education_suggestions: z.string(),
  trust_score: z.number().min(0).max(9),
  processing_errors: z.array(z.string()),
  sources_used: z.array(z.string()),
  fact_check_status: FactCheckStatusSchema,
  success: z.boolean(),
  debug_data: z.object({ saved_file: z.string().optional() }),
});

export const FailedNewsItemSchema = z.object({
  id: z.string(),
  status: z.literal('failed'),
  error: z.string(),
});

export const ProcessedNewsItemSchema = FactCheckRecordSchema.partial().extend({
  id: z.string(),
  status: z.literal('processed'),
  original_text: z.string(),
  original_url: z.string(),
  processed_content: z.string(),
  raw_classifier_output: z.string(),
  news_type: z.string(),
  misinformation_domain: z.string(),
  timestamp: z.string(),
  fact_check_completed: z.boolean(),
  fact_check_result: z.string().optional(),
  fact_check_error: z.string().optional(),
});

export const NewsItemResultSchema = z.discriminatedUnion('status', [
  FailedNewsItemSchema,
  ProcessedNewsItemSchema,
]);

export const NewsBatchResultSchema = z.object({
  processed_count: z.number().int().min(0),
  results: z.array(NewsItemResultSchema),
  status: z.literal('completed'),
  timestamp: z.string(),
  results_file: z.string().optional(),
});

export type StoredNewsBatch = z.infer<typeof NewsBatchResultSchema>;
