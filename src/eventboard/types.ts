import { PageRequest, PageResponse } from '../types';
import { ApiResponseError, HttpStatusError, TransportError } from '../utils/errors';

// Re-export types that describe the remote source's page contract
export type { PageRequest, PageResponse, PaginationInfo, ReadinessReport } from '../types';

export type PageFetchError = TransportError | HttpStatusError | ApiResponseError;

export type PageResult =
  | { success: true; data: PageResponse }
  | { success: false; error: PageFetchError };

/**
 * Anything that can serve one page of an endpoint. Implementations report
 * failures through the result, never by throwing.
 */
export interface PageSource {
  fetchPage(request: PageRequest): Promise<PageResult>;
}

export interface DatasetTarget {
  /** Dataset name used for files and the summary, e.g. `announcements_equity` */
  name: string;
  family: string;
  label: string;
  endpoint: string;
  params: Readonly<Record<string, string>>;
}
