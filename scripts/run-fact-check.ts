import { loadConfig } from '@newscheck/schemas/src/config-loader.js';
import { createNewscheckServices } from '@newscheck/core/src/infrastructure/newscheck-services.js';
import { toReportRecord } from '@newscheck/core/src/orchestration/fact-check-report.js';

async function main(): Promise<void> {
  const recencyCategory = process.argv[2] ?? 'Evergreen News';
  const claimText =
    process.argv[3] ?? 'Eating rice makes you fat and should be avoided for weight loss.';
  const domainCategory = process.argv[4] ?? 'Health';

  console.log('=== Newscheck Fact-Check Runner ===\n');
  console.log(`Claim: ${claimText}`);
  console.log(`Recency: ${recencyCategory}`);
  console.log(`Domain: ${domainCategory}`);

  const startTime = Date.now();

  const { settings, trustCatalog } = await loadConfig();
  console.log(`Mock LLM: ${settings.llm.mock ? 'yes' : 'no'}\n`);

  const { factChecker } = await createNewscheckServices(settings, trustCatalog);

  console.log('Running fact-check...\n');
  const report = await factChecker.initializeFactChecker(recencyCategory, claimText, domainCategory);
  const elapsed = Date.now() - startTime;

  console.log('--- Sources ---');
  for (const url of report.trustedUrls) {
    console.log(`  - ${url}`);
  }
  console.log(`  Scraped: ${String(report.scrapedContentCount)}`);

  console.log('\n--- Summary ---');
  console.log(`  ${report.summarizedAnswer || '(none)'}`);

  console.log('\n--- Assessment ---');
  console.log(`  ${report.factCheckAssessment}`);
  console.log(`  Trust score: ${String(report.trustScore)}`);

  console.log('\n--- Further Education ---');
  console.log(`  ${report.furtherEducationSuggestions || '(none)'}`);

  if (report.processingErrors.length > 0) {
    console.log('\n--- Errors ---');
    for (const error of report.processingErrors) {
      console.log(`  - ${error}`);
    }
  }

  console.log('\n--- Report ---');
  console.log(JSON.stringify(toReportRecord(report), null, 2));

  console.log(`\n=== Fact-check ${report.status} in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Fact-check failed:', error);
  process.exit(1);
});
