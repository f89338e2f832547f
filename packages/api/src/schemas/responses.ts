import { z } from '@hono/zod-openapi';
import { NewsBatchResultSchema } from '@newscheck/schemas/src/news-result.schema.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Categorize
export const BatchResponseSchema = NewsBatchResultSchema.openapi('NewsBatchResult');

// Results
export const ResultFileSchema = z
  .object({
    filename: z.string(),
    size_bytes: z.number().int(),
    modified: z.string(),
  })
  .openapi('ResultFile');

export const ResultListResponseSchema = z
  .object({
    files: z.array(ResultFileSchema),
    count: z.number().int(),
  })
  .openapi('ResultList');
