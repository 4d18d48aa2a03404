import { resolve } from 'node:path';
import { loadConfig } from '@toolscout/schemas/src/config-loader.js';
import { createConfiguredToolSearchService } from '@toolscout/core/src/services/retrieval/configured-tool-search.js';

async function main(): Promise<void> {
  const configDir = process.argv[2] ?? resolve(process.cwd(), 'config');
  const queryText = process.argv[3] ?? 'mlflow alternatives';
  const limitArg = process.argv[4];
  const limit = limitArg !== undefined ? parseInt(limitArg, 10) : undefined;

  console.log('=== Toolscout Search Runner ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Query: ${queryText}`);
  console.log(`Mock sources: ${process.env['TOOLSCOUT_MOCK_SOURCES'] === 'true' ? 'yes' : 'no'}\n`);

  const config = await loadConfig(configDir);
  const service = createConfiguredToolSearchService(config);

  const analysis = service.analyze(queryText);
  console.log('--- Analysis ---');
  console.log(`  Valid: ${analysis.isValid ? 'yes' : 'no'}`);
  console.log(`  Intent: ${analysis.intent}`);
  console.log(`  Domain: ${analysis.domain}`);
  console.log(`  Subject: ${analysis.targetSubject ?? '-'}`);
  if (analysis.comparisonSubjects) {
    console.log(`  Comparing: ${analysis.comparisonSubjects.join(' vs ')}`);
  }
  console.log(`  Search query: ${analysis.searchQuery ?? '-'}`);
  console.log(`  Article query: ${analysis.articleQuery ?? '-'}`);

  if (!analysis.isValid) {
    console.log('\nQuery is not searchable, stopping.');
    process.exit(1);
  }

  const startTime = Date.now();
  const result = await service.retrieve(queryText, limit);
  const elapsed = Date.now() - startTime;

  console.log('\n--- Sources ---');
  for (const report of result.sources) {
    const detail = report.error ? ` (${report.error})` : '';
    console.log(
      `  ${report.source}: ${report.provider ?? 'none'} ${report.status}, ${String(report.hitCount)} hits${detail}`,
    );
  }

  console.log('\n--- Results ---');
  if (result.documents.length === 0) {
    console.log('  No results.');
  }
  result.documents.forEach((doc, index) => {
    console.log(`  ${String(index + 1)}. [${doc.score.toFixed(2)}] ${doc.title || '(untitled)'}`);
    console.log(`     ${doc.url} (${doc.provider} #${String(doc.position)})`);
  });

  console.log(`\nCompleted in ${String(elapsed)}ms`);
}

main().catch((error: unknown) => {
  console.error('Search failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
