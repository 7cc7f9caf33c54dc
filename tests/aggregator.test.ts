import { describe, it, expect, vi } from 'vitest';
import { PaginatedAggregator, isPartial } from '../src/data/aggregator';
import { parseRecord } from '../src/data/cell-normalizer';
import { PageResult, PageSource } from '../src/eventboard/types';
import { DataRecord, PageRequest } from '../src/types';
import { ApiResponseError, HttpStatusError, TransportError } from '../src/utils/errors';

function records(from: number, count: number): DataRecord[] {
  return Array.from({ length: count }, (_, index) => parseRecord({ ID: from + index }));
}

function page(rows: DataRecord[], totalPages: number, metadata: Record<string, unknown> = {}): PageResult {
  return {
    success: true,
    data: {
      records: rows,
      pagination: { page: 1, perPage: 1000, totalPages, totalRecords: 0 },
      metadata,
    },
  };
}

// Serves a fixed result per page number
class ScriptedSource implements PageSource {
  readonly requests: PageRequest[] = [];
  private results: PageResult[];

  constructor(results: PageResult[]) {
    this.results = results;
  }

  async fetchPage(request: PageRequest): Promise<PageResult> {
    this.requests.push(request);
    const result = this.results[request.page - 1];
    if (!result) {
      throw new Error(`Unexpected request for page ${request.page}`);
    }
    return result;
  }
}

const fixedNow = (): Date => new Date('2025-03-01T10:00:00.000Z');

function createAggregator(source: PageSource, perPage?: number) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {});
  const aggregator = new PaginatedAggregator(source, { perPage, sleep, now: fixedNow });
  return { aggregator, sleep };
}

describe('PaginatedAggregator', () => {
  it('should issue exactly one request per page', async () => {
    const source = new ScriptedSource([page(records(1, 2), 3), page(records(3, 2), 3), page(records(5, 2), 3)]);
    const { aggregator } = createAggregator(source);

    const dataset = await aggregator.fetchAll('/crd');

    expect(source.requests.map((request) => request.page)).toEqual([1, 2, 3]);
    expect(dataset.records).toHaveLength(6);
    expect(dataset.metadata.totalPagesScraped).toBe(3);
    expect(dataset.fetchError).toBeUndefined();
  });

  it('should concatenate pages in page order', async () => {
    const source = new ScriptedSource([page(records(1, 3), 2), page(records(4, 2), 2)]);
    const { aggregator } = createAggregator(source);

    const dataset = await aggregator.fetchAll('/event-calendar');

    expect(dataset.records.map((record) => record.get('ID'))).toEqual([1, 2, 3, 4, 5].map((id) => ({ variant: 'scalar', value: id })));
    expect(dataset.metadata.totalRecords).toBe(5);
    expect(dataset.metadata.totalPagesScraped).toBe(2);
    expect(isPartial(dataset)).toBe(false);
  });

  it('should pass query parameters and page size to every request', async () => {
    const source = new ScriptedSource([page(records(1, 1), 2), page(records(2, 1), 2)]);
    const { aggregator } = createAggregator(source, 250);

    await aggregator.fetchAll('/announcements', { market: 'sme' });

    expect(source.requests).toEqual([
      { endpoint: '/announcements', params: { market: 'sme' }, page: 1, perPage: 250 },
      { endpoint: '/announcements', params: { market: 'sme' }, page: 2, perPage: 250 },
    ]);
  });

  it('should clamp the page size to the allowed range', async () => {
    const high = new ScriptedSource([page([], 1)]);
    const low = new ScriptedSource([page([], 1)]);

    await createAggregator(high, 5000).aggregator.fetchAll('/crd');
    await createAggregator(low, 0).aggregator.fetchAll('/crd');

    expect(high.requests[0].perPage).toBe(1000);
    expect(low.requests[0].perPage).toBe(1);
  });

  it('should stop after the first page when no pages are reported', async () => {
    const source = new ScriptedSource([page([], 0)]);
    const { aggregator, sleep } = createAggregator(source);

    const dataset = await aggregator.fetchAll('/crd');

    expect(source.requests).toHaveLength(1);
    expect(dataset.records).toEqual([]);
    expect(dataset.metadata.totalPagesScraped).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should re-read the page count from every response', async () => {
    const source = new ScriptedSource([page(records(1, 1), 2), page(records(2, 1), 3), page(records(3, 1), 3)]);
    const { aggregator } = createAggregator(source);

    const dataset = await aggregator.fetchAll('/crd');

    expect(source.requests).toHaveLength(3);
    expect(dataset.metadata.reportedTotalPages).toBe(3);
  });

  it('should pause between pages but not after the last one', async () => {
    const source = new ScriptedSource([page(records(1, 1), 3), page(records(2, 1), 3), page(records(3, 1), 3)]);
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {});
    const aggregator = new PaginatedAggregator(source, { delayMs: 750, sleep, now: fixedNow });

    await aggregator.fetchAll('/crd');

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(750, undefined);
  });

  it('should keep earlier pages and record an HTTP failure', async () => {
    const source = new ScriptedSource([
      page(records(1, 2), 3),
      { success: false, error: new HttpStatusError(500) },
    ]);
    const { aggregator } = createAggregator(source);

    const dataset = await aggregator.fetchAll('/announcements', { market: 'equity' });

    expect(source.requests).toHaveLength(2);
    expect(dataset.records).toHaveLength(2);
    expect(dataset.metadata.totalPagesScraped).toBe(1);
    expect(dataset.fetchError).toEqual({ kind: 'http', message: 'HTTP 500', page: 2, status: 500 });
    expect(isPartial(dataset)).toBe(true);
  });

  it('should classify transport and API failures', async () => {
    const transport = new ScriptedSource([{ success: false, error: new TransportError('Network error: socket hang up') }]);
    const api = new ScriptedSource([{ success: false, error: new ApiResponseError('Invalid market') }]);

    const first = await createAggregator(transport).aggregator.fetchAll('/crd');
    const second = await createAggregator(api).aggregator.fetchAll('/crd');

    expect(first.fetchError).toEqual({ kind: 'transport', message: 'Network error: socket hang up', page: 1 });
    expect(first.records).toEqual([]);
    expect(first.metadata.totalPagesScraped).toBe(0);
    expect(second.fetchError).toEqual({ kind: 'api', message: 'Invalid market', page: 1 });
  });

  it('should stop and flag the dataset when aborted', async () => {
    const source = new ScriptedSource([page(records(1, 2), 3), page(records(3, 2), 3), page(records(5, 2), 3)]);
    const { aggregator } = createAggregator(source);
    const controller = new AbortController();

    const dataset = await aggregator.fetchAll('/crd', {}, {
      signal: controller.signal,
      onPage: () => controller.abort(),
    });

    expect(source.requests).toHaveLength(1);
    expect(dataset.records).toHaveLength(2);
    expect(dataset.interrupted).toBe(true);
    expect(isPartial(dataset)).toBe(true);
  });

  it('should report progress for each accepted page', async () => {
    const source = new ScriptedSource([page(records(1, 3), 2), page(records(4, 2), 2)]);
    const { aggregator } = createAggregator(source);
    const onPage = vi.fn();

    await aggregator.fetchAll('/crd', {}, { onPage });

    expect(onPage).toHaveBeenNthCalledWith(1, { endpoint: '/crd', page: 1, totalPages: 2, pageRecords: 3, accumulated: 3 });
    expect(onPage).toHaveBeenNthCalledWith(2, { endpoint: '/crd', page: 2, totalPages: 2, pageRecords: 2, accumulated: 5 });
  });

  it('should take descriptive metadata from the remote source', async () => {
    const source = new ScriptedSource([
      page(records(1, 1), 1, {
        scrape_timestamp: '2025-03-01T09:59:00Z',
        market_type: 'equity',
        source_url: 'https://source.test/announcements',
      }),
    ]);
    const { aggregator } = createAggregator(source);

    const dataset = await aggregator.fetchAll('/announcements', { market: 'equity' });

    expect(dataset.metadata).toEqual({
      sourceEndpoint: '/announcements',
      requestParams: { market: 'equity' },
      scrapeTimestamp: '2025-03-01T09:59:00Z',
      totalRecords: 1,
      totalPagesScraped: 1,
      reportedTotalRecords: 0,
      reportedTotalPages: 1,
      marketType: 'equity',
      sourceUrl: 'https://source.test/announcements',
    });
  });

  it('should fall back to the start time and request market', async () => {
    const source = new ScriptedSource([page([], 1)]);
    const { aggregator } = createAggregator(source);

    const dataset = await aggregator.fetchAll('/credit-rating', { market: 'sme' });

    expect(dataset.metadata.scrapeTimestamp).toBe('2025-03-01T10:00:00.000Z');
    expect(dataset.metadata.marketType).toBe('sme');
    expect(dataset.metadata.sourceUrl).toBeUndefined();
  });
});
