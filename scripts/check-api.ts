import 'dotenv/config';
import { loadConfig } from '../src/config';
import { EventBoardClient, expandTargets, formatReadiness } from '../src/eventboard';
import { display } from '../src/data';
import { resolveFieldMapping } from '../src/explorer';
import { errorMessage, handleError, logger } from '../src/utils';

const SAMPLE_PAGE_SIZE = 5;

function printSection(title: string): void {
  console.log('\n' + '='.repeat(80));
  console.log(title);
  console.log('='.repeat(80));
}

async function main() {
  const config = loadConfig();
  logger.setLevel(config.app.logLevel);
  const client = new EventBoardClient({
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.requestTimeoutMs,
    healthTimeoutMs: config.api.healthTimeoutMs,
  });
  const failures: string[] = [];

  printSection(`Testing Root Endpoint: ${config.api.baseUrl}/`);
  try {
    const info = await client.getApiInfo();
    console.log(`API Name: ${info.name ?? 'N/A'}`);
    console.log(`Version: ${info.version ?? 'N/A'}`);
    console.log('\nAvailable Endpoints:');
    for (const [endpoint, description] of Object.entries(info.endpoints)) {
      console.log(`  ${endpoint}: ${description}`);
    }
  } catch (error) {
    failures.push('root');
    console.log(`Error: ${errorMessage(error)}`);
  }

  printSection('Testing Health Check: /health');
  try {
    console.log(formatReadiness(await client.getHealth()));
  } catch (error) {
    failures.push('health');
    console.log(`Error: ${errorMessage(error)}`);
  }

  for (const target of expandTargets()) {
    printSection(`Testing ${target.label}: ${target.endpoint}`);
    const result = await client.fetchPage({
      endpoint: target.endpoint,
      params: target.params,
      page: 1,
      perPage: SAMPLE_PAGE_SIZE,
    });

    if (!result.success) {
      failures.push(target.name);
      console.log(`Error: ${result.error.message}`);
      continue;
    }

    const { pagination, records, metadata } = result.data;
    console.log(`Scrape Time: ${String(metadata.scrape_timestamp ?? 'N/A')}`);
    console.log(`Pagination: page ${pagination.page}/${pagination.totalPages}, ${pagination.perPage} per page, ${pagination.totalRecords} total`);

    const mapping = resolveFieldMapping(target.name);
    console.log('\nSample Records (first 3):');
    records.slice(0, 3).forEach((record, index) => {
      const fields = mapping.summaryFields.length > 0 ? mapping.summaryFields : [...record.keys()].slice(0, 4);
      console.log(`  ${index + 1}. ${fields.map((field) => display(record.get(field)) || 'N/A').join(' | ')}`);
    });
    if (records.length === 0) {
      console.log('  No data yet');
    }
  }

  printSection('RESULT');
  if (failures.length > 0) {
    console.log(`Failed checks: ${failures.join(', ')}`);
    process.exitCode = 1;
  } else {
    console.log('All checks passed');
  }
}

main().catch((error) => {
  logger.error('CheckApi', 'Smoke check aborted', handleError(error).toJSON());
  process.exitCode = 1;
});
