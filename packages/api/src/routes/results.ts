import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ResultsRepository } from '@newscheck/core/src/repositories/results.repository.js';
import { createRouter, type AppEnv } from '../types.js';
import { ResultFileParamsSchema } from '../schemas/requests.js';
import {
  BatchResponseSchema,
  ErrorResponseSchema,
  ResultListResponseSchema,
} from '../schemas/responses.js';

const listResultsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Results'],
  summary: 'List stored result snapshots, newest first',
  responses: {
    200: {
      description: 'Stored snapshots',
      content: {
        'application/json': {
          schema: ResultListResponseSchema,
        },
      },
    },
  },
});

const getResultRoute = createRoute({
  method: 'get',
  path: '/{filename}',
  tags: ['Results'],
  summary: 'Get a stored result snapshot',
  request: {
    params: ResultFileParamsSchema,
  },
  responses: {
    200: {
      description: 'Stored batch result',
      content: {
        'application/json': {
          schema: BatchResponseSchema,
        },
      },
    },
    400: {
      description: 'Invalid file name',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    404: {
      description: 'Snapshot not found',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createResultRoutes(resultsRepository: ResultsRepository): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(listResultsRoute, async (c) => {
    const files = await resultsRepository.list();

    return c.json(
      {
        files: files.map((f) => ({
          filename: f.filename,
          size_bytes: f.sizeBytes,
          modified: f.modified.toISOString(),
        })),
        count: files.length,
      },
      200,
    );
  });

  routes.openapi(getResultRoute, async (c) => {
    const { filename } = c.req.valid('param');

    const batch = await resultsRepository.get(filename);
    if (!batch) {
      return c.json(
        {
          error: `Results file not found: ${filename}`,
          code: 'RESULTS_NOT_FOUND',
          requestId: c.get('requestId'),
        },
        404,
      );
    }

    return c.json(BatchResponseSchema.parse(batch), 200);
  });

  return routes;
}
