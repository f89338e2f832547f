import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { NewsProcessor } from '@newscheck/core/src/services/news-processing/news-processor.js';
import type { ResultsRepository } from '@newscheck/core/src/repositories/results.repository.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { CategorizeRequestSchema, toNewsItems } from '../schemas/requests.js';
import { BatchResponseSchema, ErrorResponseSchema } from '../schemas/responses.js';

const log = createChildLogger('api:categorize');

export interface CategorizeRouteDeps {
  readonly newsProcessor: NewsProcessor;
  readonly resultsRepository: ResultsRepository;
}

const categorizeRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Categorize'],
  summary: 'Classify news items and fact-check them',
  request: {
    body: {
      required: true,
      content: {
        'application/json': {
          schema: CategorizeRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Batch processed; failed items are reported inline',
      content: {
        'application/json': {
          schema: BatchResponseSchema,
        },
      },
    },
    400: {
      description: 'Invalid request body',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createCategorizeRoutes(deps: CategorizeRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(categorizeRoute, async (c) => {
    const items = toNewsItems(c.req.valid('json'));
    const requestId = c.get('requestId');

    const batch = await deps.newsProcessor.processBatch(items);

    let resultsFile: string | undefined;
    try {
      resultsFile = await deps.resultsRepository.save(batch);
    } catch (error) {
      log.error(
        { requestId, error: error instanceof Error ? error.message : String(error) },
        'Failed to save results snapshot',
      );
    }

    return c.json(BatchResponseSchema.parse({ ...batch, results_file: resultsFile }), 200);
  });

  return routes;
}
