import { AppConfig } from './types';
import { ConfigError } from './utils/errors';
import { LogLevel, isLogLevel } from './utils/logger';

const MAX_PER_PAGE = 1000;

function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

function getIntEnvVar(key: string, defaultValue: number): number {
  const raw = getEnvVar(key, String(defaultValue));
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(key, `Environment variable ${key} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

function getBoolEnvVar(key: string, defaultValue: boolean): boolean {
  const raw = getEnvVar(key, defaultValue ? 'true' : 'false').toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function getLogLevel(): LogLevel {
  const raw = getEnvVar('LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(raw)) {
    throw new ConfigError('LOG_LEVEL', `Environment variable LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`);
  }
  return raw;
}

export function loadConfig(): AppConfig {
  const perPage = getIntEnvVar('PER_PAGE', MAX_PER_PAGE);

  return {
    api: {
      baseUrl: getEnvVar('EVENTBOARD_API_URL', 'http://localhost:8000').replace(/\/+$/, ''),
      perPage: Math.min(Math.max(perPage, 1), MAX_PER_PAGE),
      requestDelayMs: getIntEnvVar('REQUEST_DELAY_MS', 500),
      requestTimeoutMs: getIntEnvVar('REQUEST_TIMEOUT_MS', 30000),
      healthTimeoutMs: getIntEnvVar('HEALTH_TIMEOUT_MS', 10000),
    },
    fetch: {
      proceedWithoutReadyMonitors: getBoolEnvVar('PROCEED_WITHOUT_READY_MONITORS', false),
      savePartialDatasets: getBoolEnvVar('SAVE_PARTIAL_DATASETS', true),
    },
    storage: {
      outputDir: getEnvVar('OUTPUT_DIR', 'fetched_data'),
    },
    app: {
      logLevel: getLogLevel(),
    },
  };
}
