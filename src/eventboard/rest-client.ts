import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { PageRequest, ReadinessReport } from '../types';
import { parseRecord } from '../data/cell-normalizer';
import {
  logger,
  TransportError,
  HttpStatusError,
  ApiResponseError,
  ProbeUnavailableError,
  pageEnvelopeSchema,
  healthPayloadSchema,
  apiInfoSchema,
  describeIssues,
  errorMessage,
  ApiInfo,
} from '../utils';
import { PageFetchError, PageResult, PageSource } from './types';

const USER_AGENT = 'eventboard-harvester/1.0';

export interface EventBoardClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  healthTimeoutMs?: number;
  /** Pre-built axios instance; tests pass one with an in-process adapter */
  http?: AxiosInstance;
}

function toTransportError(error: unknown, url: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new TransportError(
      timedOut ? `Request timeout: ${error.message}` : `Network error: ${error.message}`,
      { url, code: error.code },
      timedOut
    );
  }
  return new TransportError(`Network error: ${errorMessage(error)}`, { url });
}

function bodySnippet(data: unknown): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

export class EventBoardClient implements PageSource {
  readonly baseUrl: string;
  private client: AxiosInstance;
  private timeoutMs: number;
  private healthTimeoutMs: number;
  private startTimes = new WeakMap<object, number>();

  constructor(options: EventBoardClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 10000;

    this.client =
      options.http ??
      axios.create({
        headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
      });

    this.client.interceptors.request.use((config) => {
      this.startTimes.set(config, Date.now());
      return config;
    });

    this.client.interceptors.response.use(
      (response) => {
        const started = this.startTimes.get(response.config);
        logger.api(
          'GET',
          response.config.url ?? 'unknown',
          response.status,
          started === undefined ? 0 : Date.now() - started
        );
        return response;
      },
      (error: unknown) => {
        const url = axios.isAxiosError(error) ? error.config?.url ?? 'unknown' : 'unknown';
        logger.warn('EventBoard', 'Request failed before a response arrived', {
          url,
          error: errorMessage(error),
        });
        throw toTransportError(error, url);
      }
    );
  }

  private url(endpoint: string): string {
    const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    return `${this.baseUrl}${path}`;
  }

  private async get(url: string, params: Record<string, string | number>, timeout: number): Promise<AxiosResponse<unknown>> {
    // Status codes are judged by the caller so non-2xx is not a transport failure
    return this.client.get<unknown>(url, { params, timeout, validateStatus: () => true });
  }

  async fetchPage(request: PageRequest): Promise<PageResult> {
    const url = this.url(request.endpoint);
    const params = { ...request.params, page: request.page, per_page: request.perPage };
    const fail = (error: PageFetchError): PageResult => ({ success: false, error });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.get(url, params, this.timeoutMs);
    } catch (error) {
      return fail(toTransportError(error, url));
    }

    if (response.status < 200 || response.status >= 300) {
      return fail(
        new HttpStatusError(response.status, { url, page: request.page, body: bodySnippet(response.data) })
      );
    }

    const parsed = pageEnvelopeSchema.safeParse(response.data);
    if (!parsed.success) {
      return fail(
        new ApiResponseError(`Malformed response envelope: ${describeIssues(parsed.error)}`, {
          url,
          page: request.page,
        })
      );
    }

    const envelope = parsed.data;
    if (!envelope.success) {
      return fail(
        new ApiResponseError(envelope.error ?? 'API reported failure without a message', {
          url,
          page: request.page,
        })
      );
    }

    return {
      success: true,
      data: {
        records: envelope.data.map(parseRecord),
        pagination: {
          page: envelope.pagination.page,
          perPage: envelope.pagination.per_page,
          totalPages: envelope.pagination.total_pages,
          totalRecords: envelope.pagination.total_records,
        },
        metadata: envelope.metadata,
      },
    };
  }

  /**
   * Readiness payload of the remote source. Any failure to obtain a
   * parseable payload is reported as ProbeUnavailableError.
   */
  async getHealth(): Promise<ReadinessReport> {
    const url = this.url('/health');
    let response: AxiosResponse<unknown>;
    try {
      response = await this.get(url, {}, this.healthTimeoutMs);
    } catch (error) {
      throw new ProbeUnavailableError(errorMessage(error), { url });
    }

    const parsed = healthPayloadSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProbeUnavailableError(`unreadable payload (HTTP ${response.status})`, {
        url,
        issues: describeIssues(parsed.error),
      });
    }

    return {
      status: parsed.data.status,
      ready: parsed.data.ready,
      monitors: parsed.data.monitors,
      ...(parsed.data.timestamp && { timestamp: parsed.data.timestamp }),
    };
  }

  async getApiInfo(): Promise<ApiInfo> {
    const url = this.url('/');
    const response = await this.get(url, {}, this.healthTimeoutMs);

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(response.status, { url });
    }

    const parsed = apiInfoSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ApiResponseError(`Malformed API info: ${describeIssues(parsed.error)}`, { url });
    }
    return parsed.data;
  }
}
