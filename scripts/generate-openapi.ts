import { loadConfig } from '@newscheck/schemas/src/config-loader.js';
import { createNewscheckServices } from '@newscheck/core/src/infrastructure/newscheck-services.js';
import { createApp } from '@newscheck/api/src/app.js';
import { API_VERSION } from '@newscheck/api/src/routes/health.js';

async function main(): Promise<void> {
  // Mock mode needs no API keys; only the route definitions matter here.
  const { settings, trustCatalog } = await loadConfig({ NEWSCHECK_MOCK_LLM: 'true' });
  const services = await createNewscheckServices(settings, trustCatalog);

  const app = createApp({
    newsProcessor: services.newsProcessor,
    resultsRepository: services.resultsRepository,
    requestLogging: false,
  });

  const doc = app.getOpenAPI31Document({
    openapi: '3.1.0',
    info: {
      title: 'Newscheck API',
      version: API_VERSION,
      description: 'News classification and fact-checking against trusted sources',
    },
    servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
  });

  process.stdout.write(JSON.stringify(doc, null, 2));
  process.stdout.write('\n');
}

main().catch((error: unknown) => {
  console.error('OpenAPI generation failed:', error);
  process.exit(1);
});
