import type { LogLevel } from '../utils/logger';

// Core data types

export type ScalarValue = string | number | boolean | null;

// `raw` is the value as the remote source sent it, written back unchanged on save
export type CellValue =
  | { variant: 'scalar'; value: ScalarValue; raw?: unknown }
  | { variant: 'rich'; text: string; kind: string; link?: string; raw: Readonly<Record<string, unknown>> };

// Field order is the order the remote source emitted the fields in
export type DataRecord = ReadonlyMap<string, CellValue>;

export type QueryParams = Readonly<Record<string, string>>;

export interface PaginationInfo {
  page: number;
  perPage: number;
  totalPages: number;
  totalRecords: number;
}

export interface FetchMetadata {
  sourceEndpoint: string;
  requestParams: QueryParams;
  scrapeTimestamp: string;
  totalRecords: number;
  totalPagesScraped: number;
  reportedTotalRecords?: number;
  reportedTotalPages?: number;
  marketType?: string;
  sourceUrl?: string;
}

export type FetchFailureKind = 'transport' | 'http' | 'api';

export interface FetchFailure {
  kind: FetchFailureKind;
  message: string;
  page: number;
  status?: number;
}

export interface Dataset {
  metadata: FetchMetadata;
  records: DataRecord[];
  fetchError?: FetchFailure;
  interrupted?: boolean;
}

// One page as reported by the remote source
export interface PageResponse {
  records: DataRecord[];
  pagination: PaginationInfo;
  metadata: Record<string, unknown>;
}

export interface PageRequest {
  readonly endpoint: string;
  readonly params: QueryParams;
  readonly page: number;
  readonly perPage: number;
}

export interface SummaryEntry {
  records: number;
  file: string;
}

export interface SummaryIndex {
  fetchTimestamp: string;
  sourceUrl: string;
  totalFiles: number;
  totalRecords: number;
  datasets: Record<string, SummaryEntry>;
}

export interface ReadinessReport {
  status: string;
  ready: boolean;
  monitors: Record<string, boolean>;
  timestamp?: string;
}

export type GateDecision =
  | { proceed: true; reason: 'ready' | 'override' }
  | { proceed: false; reason: 'no-ready-monitors' | 'probe-unavailable'; message: string };

export interface DatasetFileInfo {
  name: string;
  file: string;
  path: string;
  sizeKb: number;
  modifiedAt: Date;
}

export interface AppConfig {
  api: {
    baseUrl: string;
    perPage: number;
    requestDelayMs: number;
    requestTimeoutMs: number;
    healthTimeoutMs: number;
  };
  fetch: {
    proceedWithoutReadyMonitors: boolean;
    savePartialDatasets: boolean;
  };
  storage: {
    outputDir: string;
  };
  app: {
    logLevel: LogLevel;
  };
}
