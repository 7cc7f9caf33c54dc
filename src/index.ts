import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { loadConfig } from './config';
import { EventBoardClient, HealthProbe, ProceedDecision } from './eventboard';
import { PaginatedAggregator, DatasetStore } from './data';
import { DataHarvester } from './harvester';
import { logger, handleError } from './utils';

const askToContinue: ProceedDecision = async () => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.log('\nWARNING: No monitors are ready yet!');
    console.log('   The API may have just started. Wait a few minutes.');
    const answer = await rl.question('\nContinue anyway? (y/n): ');
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
};

// Main entry point
async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.app.logLevel);
  logger.setRunId(new Date().toISOString());

  console.log('\n' + '='.repeat(80));
  console.log('EVENT BOARD FETCHER - GET ALL DATA');
  console.log('='.repeat(80));
  console.log(`API: ${config.api.baseUrl}`);
  console.log(`Output: ${config.storage.outputDir}/`);

  const client = new EventBoardClient({
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.requestTimeoutMs,
    healthTimeoutMs: config.api.healthTimeoutMs,
  });

  // Only ask when someone is at the terminal and the override is off
  const interactive = process.stdin.isTTY === true && !config.fetch.proceedWithoutReadyMonitors;
  const probe = new HealthProbe(() => client.getHealth(), {
    proceedWithoutReadyMonitors: config.fetch.proceedWithoutReadyMonitors,
    ...(interactive && { decide: askToContinue }),
  });

  const harvester = new DataHarvester({
    probe,
    aggregator: new PaginatedAggregator(client, {
      perPage: config.api.perPage,
      delayMs: config.api.requestDelayMs,
    }),
    store: new DatasetStore(config.storage.outputDir),
    sourceUrl: config.api.baseUrl,
    savePartialDatasets: config.fetch.savePartialDatasets,
  });

  // First Ctrl-C stops after the in-flight request and keeps what was fetched; second one exits
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('System', 'Interrupt received, finishing current request and saving fetched data...');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);
  process.on('SIGTERM', onInterrupt);

  try {
    const report = await harvester.run(controller.signal);
    if (!report.gate.proceed) {
      process.exitCode = 1;
      return;
    }
    console.log(report.interrupted ? '\nFetch interrupted by user' : '\nALL DATA FETCHED');
  } finally {
    process.off('SIGINT', onInterrupt);
    process.off('SIGTERM', onInterrupt);
  }
}

main().catch((error) => {
  logger.error('System', 'Fatal error', handleError(error).toJSON());
  process.exitCode = 1;
});
