import { createWriteStream, WriteStream } from 'fs';
import { join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
  runId?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

class Logger {
  private minLevel: LogLevel;
  private fileStream: WriteStream | null = null;
  private runId: string | null = null;

  constructor() {
    const level = process.env.LOG_LEVEL?.toLowerCase();
    this.minLevel = isLogLevel(level) ? level : 'info';

    if (process.env.NODE_ENV === 'production') {
      const logDir = process.env.LOG_DIR || join(process.cwd(), 'logs');
      try {
        this.fileStream = createWriteStream(join(logDir, 'harvest.log'), { flags: 'a' });
        this.fileStream.on('error', () => {
          this.fileStream = null;
        });
      } catch {
        // Fall back to console only
        this.fileStream = null;
      }
    }
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setRunId(id: string): void {
    this.runId = id;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private log(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...(data && { data }),
      ...(this.runId && { runId: this.runId }),
    };

    const formatted = JSON.stringify(entry);

    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
    };
    const reset = '\x1b[0m';

    if (process.env.NODE_ENV === 'production') {
      console.log(formatted);
    } else {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      console.log(`${colors[level]}[${entry.timestamp}] [${level.toUpperCase()}] [${component}] ${message}${dataStr}${reset}`);
    }

    if (this.fileStream) {
      this.fileStream.write(formatted + '\n');
    }
  }

  debug(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', component, message, data);
  }

  info(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', component, message, data);
  }

  warn(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', component, message, data);
  }

  error(component: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', component, message, data);
  }

  api(method: string, endpoint: string, status: number, latencyMs: number, data?: Record<string, unknown>): void {
    this.debug('API', `${method} ${endpoint}`, { status, latencyMs, ...data, type: 'API_CALL' });
  }

  storage(action: string, data: Record<string, unknown>): void {
    this.info('Storage', action, { ...data, type: 'STORAGE_EVENT' });
  }
}

export const logger = new Logger();
