import { Dataset, FetchFailure, GateDecision, SummaryIndex } from './types';
import { HealthProbe, formatReadiness } from './eventboard/health-probe';
import { expandTargets } from './eventboard/endpoints';
import { DatasetTarget } from './eventboard/types';
import { PaginatedAggregator, isPartial } from './data/aggregator';
import { DatasetStore, buildSummary, formatSummary } from './data/dataset-store';
import { logger } from './utils';

export type TargetOutcome = 'saved' | 'empty' | 'partial-skipped';

export interface TargetResult {
  name: string;
  outcome: TargetOutcome;
  records: number;
  pagesScraped: number;
  file?: string;
  fetchError?: FetchFailure;
  interrupted?: boolean;
}

export interface HarvestReport {
  gate: GateDecision;
  results: TargetResult[];
  summary?: SummaryIndex;
  summaryPath?: string;
  interrupted: boolean;
}

export interface HarvesterOptions {
  probe: HealthProbe;
  aggregator: PaginatedAggregator;
  store: DatasetStore;
  sourceUrl: string;
  targets?: DatasetTarget[];
  savePartialDatasets?: boolean;
  write?: (text: string) => void;
}

const RULE = '='.repeat(80);

function describeFailure(dataset: Dataset): string {
  const { metadata } = dataset;
  const obtained = `${metadata.totalPagesScraped} page(s), ${dataset.records.length} record(s)`;
  if (dataset.fetchError) {
    const { kind, page, message } = dataset.fetchError;
    return `Partial dataset: ${obtained} before ${kind} failure on page ${page}: ${message}`;
  }
  return `Partial dataset: ${obtained} before the fetch was interrupted`;
}

/**
 * Health gate, then every target in turn: aggregate, persist, and fold the
 * persisted datasets into the summary index.
 */
export class DataHarvester {
  private probe: HealthProbe;
  private aggregator: PaginatedAggregator;
  private store: DatasetStore;
  private sourceUrl: string;
  private targets: DatasetTarget[];
  private savePartialDatasets: boolean;
  private write: (text: string) => void;

  constructor(options: HarvesterOptions) {
    this.probe = options.probe;
    this.aggregator = options.aggregator;
    this.store = options.store;
    this.sourceUrl = options.sourceUrl;
    this.targets = options.targets ?? expandTargets();
    this.savePartialDatasets = options.savePartialDatasets ?? true;
    this.write = options.write ?? ((text) => console.log(text));
  }

  async run(signal?: AbortSignal): Promise<HarvestReport> {
    this.write(`\n${RULE}\nCHECKING API HEALTH\n${RULE}`);
    const { decision, report } = await this.probe.gate();
    if (report) {
      this.write(formatReadiness(report));
    }

    if (!decision.proceed) {
      this.write(`\nHealth check failed (${decision.reason}): ${decision.message}`);
      return { gate: decision, results: [], interrupted: false };
    }

    const results: TargetResult[] = [];
    const saved = new Map<string, Dataset>();
    let interrupted = false;

    for (const target of this.targets) {
      if (signal?.aborted) {
        interrupted = true;
        break;
      }

      this.write(`\n${RULE}\nFETCHING ${target.label.toUpperCase()}\n${RULE}`);
      const dataset = await this.aggregator.fetchAll(target.endpoint, target.params, {
        signal,
        onPage: (progress) =>
          this.write(
            `  Page ${progress.page}/${progress.totalPages} - ${progress.pageRecords} records (${progress.accumulated} total)`
          ),
      });

      const result: TargetResult = {
        name: target.name,
        outcome: 'saved',
        records: dataset.records.length,
        pagesScraped: dataset.metadata.totalPagesScraped,
        ...(dataset.fetchError && { fetchError: dataset.fetchError }),
        ...(dataset.interrupted && { interrupted: true }),
      };

      if (isPartial(dataset)) {
        this.write(`  ${describeFailure(dataset)}`);
      }
      interrupted = interrupted || dataset.interrupted === true;

      if (dataset.records.length === 0) {
        this.write(`  No data available for ${target.name}`);
        results.push({ ...result, outcome: 'empty' });
        continue;
      }

      if (isPartial(dataset) && !this.savePartialDatasets) {
        logger.warn('Harvester', 'Partial dataset not saved', { target: target.name, records: dataset.records.length });
        results.push({ ...result, outcome: 'partial-skipped' });
        continue;
      }

      const outcome = await this.store.save(dataset, target.name);
      if (outcome.saved) {
        this.write(`  Saved: ${outcome.path} (${outcome.records} records)`);
        saved.set(target.name, dataset);
        results.push({ ...result, file: outcome.file });
      }
    }

    const summary = buildSummary(saved, this.sourceUrl);
    const summaryPath = await this.store.writeSummary(summary);

    this.write(`\n${RULE}\nFETCH SUMMARY\n${RULE}\n`);
    this.write(formatSummary(summary, this.store.outputDir));
    if (interrupted) {
      this.write('\nFetch interrupted; data fetched before the interrupt was kept.');
    }

    logger.info('Harvester', 'Run complete', {
      datasets: summary.totalFiles,
      records: summary.totalRecords,
      interrupted,
    });

    return { gate: decision, results, summary, summaryPath, interrupted };
  }
}
