import { readFile } from 'node:fs/promises';
import { resolutionConfigFromEnv } from '../config/constants';
import { createCrosswalkStore } from '../services/crosswalk/factory';
import { EntityResolver } from '../services/entityResolution/resolver';
import { buildMatchReport, summarizeReport } from '../services/report/matchReport';
import { getSourceAdapter } from '../services/sources/factory';
import { logger } from '../utils/logger';

const [sourceName, csvPath] = process.argv.slice(2);

if (!sourceName || !csvPath) {
  console.error('Please pass a source name and a provider CSV');
  console.error('Usage: npm run crosswalk:resolve -- draftkings ./data/DKSalaries.csv');
  process.exit(1);
}

async function resolveSlate(source: string, file: string) {
  const store = createCrosswalkStore();
  try {
    const adapter = getSourceAdapter(source);
    const parsed = adapter.parseCsv(await readFile(file, 'utf8'));
    for (const error of parsed.errors) {
      console.error(`  row ${error.row}: ${error.message}`);
    }

    const resolver = new EntityResolver(store, resolutionConfigFromEnv());
    const report = buildMatchReport(await resolver.resolveBatch(parsed.records, { concurrency: 4 }));
    console.log(summarizeReport(report));

    for (const result of [...report.ambiguous, ...report.unmatched]) {
      console.log(`  ${result.status}: ${result.sourceRecord.name} (${result.reason ?? 'no reason'})`);
    }
    process.exitCode = 0;
  } catch (error) {
    logger.error({ error, source, file }, 'Slate resolution failed');
    console.error('Error resolving slate:', error);
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

void resolveSlate(sourceName, csvPath);
