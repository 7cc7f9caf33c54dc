export { logger, isLogLevel } from './logger';
export type { LogLevel } from './logger';
export {
  HarvestError,
  TransportError,
  HttpStatusError,
  ApiResponseError,
  ProbeUnavailableError,
  StorageError,
  ExportError,
  ConfigError,
  ErrorCode,
  handleError,
  errorMessage,
  isHarvestError,
} from './errors';
export { sleep } from './sleep';
export type { SleepFn } from './sleep';
export {
  pageEnvelopeSchema,
  healthPayloadSchema,
  apiInfoSchema,
  datasetFileSchema,
  describeIssues,
} from './validation';
export type { ApiInfo, StoredMetadata } from './validation';
