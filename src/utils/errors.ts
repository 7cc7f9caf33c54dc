export enum ErrorCode {
  // Network errors (1xxx)
  NETWORK_ERROR = 1001,
  API_TIMEOUT = 1002,
  HTTP_STATUS = 1003,
  API_RESPONSE = 1004,
  PROBE_UNAVAILABLE = 1005,

  // Storage errors (5xxx)
  STORAGE_ERROR = 5001,
  EXPORT_ERROR = 5002,

  // System errors (6xxx)
  SYSTEM_ERROR = 6001,
  CONFIG_ERROR = 6002,
}

export class HarvestError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'HarvestError';
    this.code = code;
    this.details = details;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HarvestError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export class TransportError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>, timedOut: boolean = false) {
    super(timedOut ? ErrorCode.API_TIMEOUT : ErrorCode.NETWORK_ERROR, message, details, true);
    this.name = 'TransportError';
  }
}

export class HttpStatusError extends HarvestError {
  public readonly status: number;

  constructor(status: number, details?: Record<string, unknown>) {
    super(ErrorCode.HTTP_STATUS, `HTTP ${status}`, { ...details, status }, status >= 500);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export class ApiResponseError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.API_RESPONSE, message, details, false);
    this.name = 'ApiResponseError';
  }
}

export class ProbeUnavailableError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.PROBE_UNAVAILABLE, `Health endpoint unavailable: ${message}`, details, true);
    this.name = 'ProbeUnavailableError';
  }
}

export class StorageError extends HarvestError {
  public readonly path: string;

  constructor(path: string, message: string, details?: Record<string, unknown>) {
    super(ErrorCode.STORAGE_ERROR, `Storage failure at ${path}: ${message}`, { ...details, path }, false);
    this.name = 'StorageError';
    this.path = path;
  }
}

export class ExportError extends HarvestError {
  constructor(message: string = 'No records to export', details?: Record<string, unknown>) {
    super(ErrorCode.EXPORT_ERROR, message, details, false);
    this.name = 'ExportError';
  }
}

export class ConfigError extends HarvestError {
  public readonly key: string;

  constructor(key: string, message: string) {
    super(ErrorCode.CONFIG_ERROR, message, { key }, false);
    this.name = 'ConfigError';
    this.key = key;
  }
}

// Error handler helper
export function handleError(error: unknown): HarvestError {
  if (error instanceof HarvestError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.message.includes('ECONNREFUSED') || error.message.includes('ETIMEDOUT')) {
      return new TransportError(error.message);
    }

    return new HarvestError(ErrorCode.SYSTEM_ERROR, error.message, { originalError: error.name });
  }

  return new HarvestError(ErrorCode.SYSTEM_ERROR, 'Unknown error occurred', { error: String(error) });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// Type guard
export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError;
}
