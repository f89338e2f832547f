import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { NewsProcessor } from '@newscheck/core/src/services/news-processing/news-processor.js';
import type { ResultsRepository } from '@newscheck/core/src/repositories/results.repository.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { API_VERSION, health } from './routes/health.js';
import { createCategorizeRoutes } from './routes/categorize.js';
import { createResultRoutes } from './routes/results.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly newsProcessor: NewsProcessor;
  readonly resultsRepository: ResultsRepository;
  readonly requestLogging?: boolean;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  if (config.requestLogging ?? true) {
    app.use('*', async (c, next) => {
      const start = Date.now();
      await next();
      const duration = Date.now() - start;
      log.info(
        {
          method: c.req.method,
          path: c.req.path,
          status: c.res.status,
          duration,
          requestId: c.get('requestId'),
        },
        'Request completed',
      );
    });
  }

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Newscheck API',
        version: API_VERSION,
        description: 'News classification and fact-checking against trusted sources',
      },
    });
    return c.json(spec);
  });

  app.route('/categorize', createCategorizeRoutes(config));
  app.route('/results', createResultRoutes(config.resultsRepository));

  return app;
}
