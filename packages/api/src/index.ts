import { serve } from '@hono/node-server';
import { loadConfig } from '@newscheck/schemas/src/config-loader.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { createNewscheckServices } from '@newscheck/core/src/infrastructure/newscheck-services.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const { settings, trustCatalog } = await loadConfig();
  const services = await createNewscheckServices(settings, trustCatalog);

  const app = createApp({
    newsProcessor: services.newsProcessor,
    resultsRepository: services.resultsRepository,
  });

  log.info({ port: settings.port, mockLlm: settings.llm.mock }, 'Starting Newscheck API server');

  serve({ fetch: app.fetch, port: settings.port }, (info) => {
    log.info({ port: info.port }, 'Newscheck API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
