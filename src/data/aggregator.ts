import { Dataset, DataRecord, FetchFailure, PaginationInfo, QueryParams } from '../types';
import { PageFetchError, PageSource } from '../eventboard/types';
import { HttpStatusError, TransportError, logger, sleep, SleepFn } from '../utils';

export const MAX_PER_PAGE = 1000;

export interface AggregatorOptions {
  perPage?: number;
  /** Fixed pause between page requests */
  delayMs?: number;
  sleep?: SleepFn;
  now?: () => Date;
}

export interface PageProgress {
  endpoint: string;
  page: number;
  totalPages: number;
  pageRecords: number;
  accumulated: number;
}

export interface FetchAllOptions {
  signal?: AbortSignal;
  onPage?: (progress: PageProgress) => void;
}

function toFailure(error: PageFetchError, page: number): FetchFailure {
  if (error instanceof TransportError) {
    return { kind: 'transport', message: error.message, page };
  }
  if (error instanceof HttpStatusError) {
    return { kind: 'http', message: error.message, page, status: error.status };
  }
  return { kind: 'api', message: error.message, page };
}

function stringField(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Walks every page of one endpoint/parameter combination, one request at a
 * time, and folds the pages into a single Dataset.
 *
 * A failed page ends the walk: the pages accepted so far become the
 * Dataset's content and the failure is recorded on it instead of thrown.
 * `total_pages` is re-read from every response.
 */
export class PaginatedAggregator {
  private source: PageSource;
  private perPage: number;
  private delayMs: number;
  private sleep: SleepFn;
  private now: () => Date;

  constructor(source: PageSource, options: AggregatorOptions = {}) {
    this.source = source;
    this.perPage = Math.min(Math.max(options.perPage ?? MAX_PER_PAGE, 1), MAX_PER_PAGE);
    this.delayMs = options.delayMs ?? 500;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  async fetchAll(endpoint: string, params: QueryParams = {}, options: FetchAllOptions = {}): Promise<Dataset> {
    const startedAt = this.now().toISOString();
    const records: DataRecord[] = [];
    let page = 1;
    let totalPages = 1;
    let pagesScraped = 0;
    let lastPagination: PaginationInfo | undefined;
    let sourceMetadata: Record<string, unknown> = {};
    let fetchError: FetchFailure | undefined;
    let interrupted = false;

    logger.info('Aggregator', 'Starting paginated fetch', { endpoint, params, perPage: this.perPage });

    while (page <= totalPages) {
      if (options.signal?.aborted) {
        interrupted = true;
        break;
      }

      const result = await this.source.fetchPage({ endpoint, params, page, perPage: this.perPage });

      if (!result.success) {
        fetchError = toFailure(result.error, page);
        logger.warn('Aggregator', 'Page fetch failed, keeping pages fetched so far', {
          endpoint,
          page,
          error: result.error.message,
          recordsKept: records.length,
        });
        break;
      }

      const { pagination, metadata } = result.data;
      totalPages = pagination.totalPages;
      lastPagination = pagination;
      sourceMetadata = metadata;
      records.push(...result.data.records);
      pagesScraped = page;

      options.onPage?.({
        endpoint,
        page,
        totalPages,
        pageRecords: result.data.records.length,
        accumulated: records.length,
      });

      page += 1;

      if (page <= totalPages) {
        await this.sleep(this.delayMs, options.signal);
      }
    }

    if (interrupted) {
      logger.warn('Aggregator', 'Fetch interrupted', { endpoint, pagesScraped, records: records.length });
    }

    const marketType = stringField(sourceMetadata, 'market_type') ?? params.market;
    const sourceUrl = stringField(sourceMetadata, 'source_url');

    const dataset: Dataset = {
      metadata: {
        sourceEndpoint: endpoint,
        requestParams: { ...params },
        scrapeTimestamp: stringField(sourceMetadata, 'scrape_timestamp') ?? startedAt,
        totalRecords: records.length,
        totalPagesScraped: pagesScraped,
        ...(lastPagination && {
          reportedTotalRecords: lastPagination.totalRecords,
          reportedTotalPages: lastPagination.totalPages,
        }),
        ...(marketType && { marketType }),
        ...(sourceUrl && { sourceUrl }),
      },
      records,
      ...(fetchError && { fetchError }),
      ...(interrupted && { interrupted }),
    };

    logger.info('Aggregator', 'Paginated fetch finished', {
      endpoint,
      records: records.length,
      pagesScraped,
      complete: !fetchError && !interrupted,
    });

    return dataset;
  }
}

export function isPartial(dataset: Dataset): boolean {
  return dataset.fetchError !== undefined || dataset.interrupted === true;
}
