// Process-wide logging service built on LogTape: a console sink plus a small
// rotating file that the `logs` command reads back.

import { getRotatingFileSink } from '@logtape/file';
import {
  configure,
  dispose,
  getConsoleSink,
  getLogger,
  type LogLevel as LogTapeLevel,
  type Logger as LogTapeLogger,
  type LogRecord,
} from '@logtape/logtape';
import chalk from 'chalk';
import { mkdirSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { LogLevel } from './types.js';

export interface Logger {
  info(message: string, metadata?: unknown): void;
  error(message: string, metadata?: unknown): void;
  warn(message: string, metadata?: unknown): void;
  debug(message: string, metadata?: unknown): void;
  success(message: string, metadata?: unknown): void;
}

/** Logger owned by the process: opened once at startup, closed at shutdown. */
export interface LoggerService extends Logger {
  close(): Promise<void>;
}

export interface LoggerOptions {
  file?: string;
  level?: LogLevel;
  console?: boolean;
}

export const LOG_CATEGORY = ['autoprint'] as const;
export const DEFAULT_LOG_FILE = join(tmpdir(), 'autoprint.log');
// Same budget as the old tray app's log: 100 KB
export const LOG_FILE_MAX_BYTES = 100 * 1024;

const LEVELS: Record<LogLevel, LogTapeLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warning',
  error: 'error',
};

const LEVEL_LABELS: Record<LogTapeLevel, string> = {
  trace: 'TRACE',
  debug: 'DEBUG',
  info: 'INFO',
  warning: 'WARN',
  error: 'ERROR',
  fatal: 'FATAL',
};

function renderMessage(record: LogRecord): string {
  const text = record.message.map((part) => (typeof part === 'string' ? part : String(part))).join('');
  const metadata = record.properties.metadata;
  if (metadata === undefined || metadata === null) {
    return text;
  }
  if (metadata instanceof Error) {
    return `${text} (${metadata.message})`;
  }
  return `${text} ${typeof metadata === 'string' ? metadata : JSON.stringify(metadata)}`;
}

export function formatConsoleLine(record: LogRecord): string {
  const time = new Date(record.timestamp).toLocaleTimeString('en-US', { hour12: false });
  const line = `🖨  [${time}] ${LEVEL_LABELS[record.level].padEnd(5)} ${renderMessage(record)}`;
  switch (record.level) {
    case 'error':
    case 'fatal':
      return chalk.red(line);
    case 'warning':
      return chalk.yellow(line);
    case 'debug':
    case 'trace':
      return chalk.gray(line);
    default:
      return line;
  }
}

// Plain text format: timestamp LEVEL: message
export function formatFileLine(record: LogRecord): string {
  const timestamp = new Date(record.timestamp).toISOString();
  return `${timestamp} ${LEVEL_LABELS[record.level].padEnd(5)}: ${renderMessage(record)}\n`;
}

class LogTapeService implements LoggerService {
  constructor(private readonly logger: LogTapeLogger) {}

  // Messages go in as a property so braces in paths and templates are not
  // taken for LogTape placeholders.
  info(message: string, metadata?: unknown): void {
    this.logger.info('{message}', { message, metadata });
  }

  error(message: string, metadata?: unknown): void {
    this.logger.error('{message}', { message, metadata });
  }

  warn(message: string, metadata?: unknown): void {
    this.logger.warning('{message}', { message, metadata });
  }

  debug(message: string, metadata?: unknown): void {
    this.logger.debug('{message}', { message, metadata });
  }

  success(message: string, metadata?: unknown): void {
    this.logger.info('{message}', { message: `✅ ${message}`, metadata });
  }

  async close(): Promise<void> {
    await dispose();
  }
}

export async function createLogger(options: LoggerOptions = {}): Promise<LoggerService> {
  const file = options.file ?? DEFAULT_LOG_FILE;
  const level = options.level ?? 'info';
  const sinks = options.console === false ? ['file' as const] : (['console', 'file'] as const);

  mkdirSync(dirname(file), { recursive: true });

  await configure({
    sinks: {
      console: getConsoleSink({ formatter: formatConsoleLine }),
      file: getRotatingFileSink(file, {
        maxSize: LOG_FILE_MAX_BYTES,
        maxFiles: 1,
        formatter: formatFileLine,
      }),
    },
    loggers: [
      { category: [...LOG_CATEGORY], lowestLevel: LEVELS[level], sinks: [...sinks] },
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ],
    reset: true,
  });

  return new LogTapeService(getLogger([...LOG_CATEGORY]));
}

// Scope-aware logger wrapper
export class ScopedLogger implements Logger {
  constructor(
    private readonly logger: Logger,
    private readonly scope?: string
  ) {}

  private formatMessage(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }

  info(message: string, metadata?: unknown): void {
    this.logger.info(this.formatMessage(message), metadata);
  }

  error(message: string, metadata?: unknown): void {
    this.logger.error(this.formatMessage(message), metadata);
  }

  warn(message: string, metadata?: unknown): void {
    this.logger.warn(this.formatMessage(message), metadata);
  }

  debug(message: string, metadata?: unknown): void {
    this.logger.debug(this.formatMessage(message), metadata);
  }

  success(message: string, metadata?: unknown): void {
    this.logger.success(this.formatMessage(message), metadata);
  }
}

export function createScopedLogger(baseLogger: Logger, scope: string): Logger {
  return new ScopedLogger(baseLogger, scope);
}
