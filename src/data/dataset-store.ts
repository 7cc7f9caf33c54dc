import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { Dataset, DatasetFileInfo, FetchMetadata, SummaryIndex } from '../types';
import { parseRecord, toWireRecord } from './cell-normalizer';
import {
  logger,
  StorageError,
  datasetFileSchema,
  describeIssues,
  errorMessage,
  StoredMetadata,
} from '../utils';

export const SUMMARY_FILE = 'summary.json';
const DATASET_SUFFIX = '_all.json';

export type SaveOutcome =
  | { saved: true; file: string; path: string; records: number }
  | { saved: false; reason: 'empty' };

export function datasetFileName(name: string): string {
  return `${name}${DATASET_SUFFIX}`;
}

function toStoredMetadata(metadata: FetchMetadata): StoredMetadata {
  return {
    source_endpoint: metadata.sourceEndpoint,
    request_params: { ...metadata.requestParams },
    scrape_timestamp: metadata.scrapeTimestamp,
    total_records: metadata.totalRecords,
    total_pages_scraped: metadata.totalPagesScraped,
    ...(metadata.reportedTotalRecords !== undefined && { reported_total_records: metadata.reportedTotalRecords }),
    ...(metadata.reportedTotalPages !== undefined && { reported_total_pages: metadata.reportedTotalPages }),
    ...(metadata.marketType && { market_type: metadata.marketType }),
    ...(metadata.sourceUrl && { source_url: metadata.sourceUrl }),
  };
}

function fromStoredMetadata(
  stored: StoredMetadata,
  fallback: { source?: string; params: Record<string, string | number>; fetchedAt?: string; records: number }
): FetchMetadata {
  const requestParams =
    stored.request_params ??
    Object.fromEntries(
      Object.entries(fallback.params)
        .filter(([key]) => key !== 'page' && key !== 'per_page')
        .map(([key, value]) => [key, String(value)])
    );

  const marketType = stored.market_type ?? undefined;
  const reportedTotalPages = stored.reported_total_pages ?? stored.total_pages;

  return {
    sourceEndpoint: stored.source_endpoint ?? fallback.source ?? 'unknown',
    requestParams,
    scrapeTimestamp: stored.scrape_timestamp ?? fallback.fetchedAt ?? '',
    totalRecords: stored.total_records ?? fallback.records,
    totalPagesScraped: stored.total_pages_scraped ?? stored.total_pages ?? 0,
    ...(stored.reported_total_records !== undefined && { reportedTotalRecords: stored.reported_total_records }),
    ...(reportedTotalPages !== undefined && { reportedTotalPages }),
    ...(marketType && { marketType }),
    ...(stored.source_url && { sourceUrl: stored.source_url }),
  };
}

export function buildSummary(
  datasets: ReadonlyMap<string, Dataset> | Readonly<Record<string, Dataset>>,
  sourceUrl: string,
  fetchTimestamp: string = new Date().toISOString()
): SummaryIndex {
  const entries = datasets instanceof Map ? [...datasets.entries()] : Object.entries(datasets);

  return entries.reduce<SummaryIndex>(
    (summary, [name, dataset]) => {
      summary.datasets[name] = { records: dataset.records.length, file: datasetFileName(name) };
      summary.totalFiles += 1;
      summary.totalRecords += dataset.records.length;
      return summary;
    },
    { fetchTimestamp, sourceUrl, totalFiles: 0, totalRecords: 0, datasets: {} }
  );
}

export function formatSummary(summary: SummaryIndex, outputDir: string): string {
  return [
    `Total Files: ${summary.totalFiles}`,
    `Total Records: ${summary.totalRecords.toLocaleString('en-US')}`,
    `Output Directory: ${outputDir}/`,
    '',
    'Datasets:',
    ...Object.entries(summary.datasets).map(
      ([name, entry]) => `  - ${name}: ${entry.records.toLocaleString('en-US')} records -> ${entry.file}`
    ),
  ].join('\n');
}

export class DatasetStore {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  private async writeJson(path: string, payload: unknown): Promise<void> {
    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(path, JSON.stringify(payload, null, 2), 'utf-8');
    } catch (error) {
      throw new StorageError(path, errorMessage(error));
    }
  }

  /**
   * Persists one dataset. Empty datasets are skipped without touching the
   * filesystem.
   */
  async save(dataset: Dataset, name: string, fetchedAt: Date = new Date()): Promise<SaveOutcome> {
    if (dataset.records.length === 0) {
      logger.info('Storage', 'Skipping empty dataset', { name });
      return { saved: false, reason: 'empty' };
    }

    const file = datasetFileName(name);
    const path = join(this.outputDir, file);
    const payload = {
      metadata: toStoredMetadata(dataset.metadata),
      total_records: dataset.records.length,
      fetched_at: fetchedAt.toISOString(),
      source: dataset.metadata.sourceEndpoint,
      params: { ...dataset.metadata.requestParams },
      ...(dataset.fetchError && { fetch_error: dataset.fetchError }),
      ...(dataset.interrupted && { interrupted: true }),
      data: dataset.records.map(toWireRecord),
    };

    await this.writeJson(path, payload);
    logger.storage('Dataset saved', { name, path, records: dataset.records.length });
    return { saved: true, file, path, records: dataset.records.length };
  }

  async writeSummary(summary: SummaryIndex): Promise<string> {
    const path = join(this.outputDir, SUMMARY_FILE);
    await this.writeJson(path, {
      fetch_timestamp: summary.fetchTimestamp,
      source_url: summary.sourceUrl,
      total_files: summary.totalFiles,
      total_records: summary.totalRecords,
      datasets: summary.datasets,
    });
    logger.storage('Summary saved', { path, datasets: summary.totalFiles });
    return path;
  }

  async load(path: string): Promise<Dataset> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      throw new StorageError(path, errorMessage(error));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(path, `invalid JSON (${errorMessage(error)})`);
    }

    const parsed = datasetFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(path, `not a dataset file (${describeIssues(parsed.error)})`);
    }

    const file = parsed.data;
    return {
      metadata: fromStoredMetadata(file.metadata, {
        source: file.source,
        params: file.params,
        fetchedAt: file.fetched_at,
        records: file.data.length,
      }),
      records: file.data.map(parseRecord),
      ...(file.fetch_error && { fetchError: file.fetch_error }),
      ...(file.interrupted && { interrupted: true }),
    };
  }

  async list(): Promise<DatasetFileInfo[]> {
    let names: string[];
    try {
      names = await readdir(this.outputDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new StorageError(this.outputDir, errorMessage(error));
    }

    const files = names.filter((name) => name.endsWith('.json') && name !== SUMMARY_FILE).sort();
    const infos: DatasetFileInfo[] = [];
    for (const file of files) {
      const path = join(this.outputDir, file);
      try {
        const info = await stat(path);
        infos.push({
          name: basename(file, file.endsWith(DATASET_SUFFIX) ? DATASET_SUFFIX : '.json'),
          file,
          path,
          sizeKb: info.size / 1024,
          modifiedAt: info.mtime,
        });
      } catch (error) {
        throw new StorageError(path, errorMessage(error));
      }
    }
    return infos;
  }
}
