import { z } from '@hono/zod-openapi';
import { isValidSnapshotName } from '@newscheck/core/src/repositories/snapshot-names.js';

export const NewsItemSchema = z
  .object({
    id: z.coerce.string().optional().openapi({ example: 'news-1' }),
    text: z.string().optional().openapi({ example: 'Eating rice makes you fat.' }),
    url: z.string().optional().openapi({ example: 'https://news.example.com/story' }),
  })
  .openapi('NewsItem');

export type NewsItemRequest = z.infer<typeof NewsItemSchema>;

/** A single item, an array of items, or `{ news_items: [...] }`. */
export const CategorizeRequestSchema = z
  .union([
    z.object({ news_items: z.array(NewsItemSchema) }),
    z.array(NewsItemSchema),
    NewsItemSchema,
  ])
  .openapi('CategorizeRequest');

export type CategorizeRequest = z.infer<typeof CategorizeRequestSchema>;

export function toNewsItems(body: CategorizeRequest): readonly NewsItemRequest[] {
  if (Array.isArray(body)) {
    return body;
  }
  if ('news_items' in body) {
    return body.news_items;
  }
  return [body];
}

export const ResultFileParamsSchema = z.object({
  filename: z
    .string()
    .refine(isValidSnapshotName, { message: 'Invalid result file name' })
    .openapi({
      param: { name: 'filename', in: 'path' },
      example: 'categorization_results_20260105_090307.json',
    }),
});
