import chalk from 'chalk';
import { existsSync, readFileSync } from 'fs';

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  scope?: string;
}

// Plain text format: timestamp LEVEL: [scope] message
const LOG_LINE = /^(\S+)\s+(\w+)\s*:\s*(?:\[([^\]]+)\]\s*)?(.*)$/;

export function parseLogLine(line: string): LogEntry | undefined {
  const match = line.match(LOG_LINE);
  if (!match) {
    return undefined;
  }
  const [, timestamp, level, scope, message] = match;
  return {
    timestamp,
    level: level.toLowerCase(),
    message: message.trim(),
    ...(scope ? { scope } : {}),
  };
}

export function readLogEntries(logFile: string, maxLines?: number): LogEntry[] {
  const entries: LogEntry[] = [];
  for (const line of readFileSync(logFile, 'utf-8').split('\n')) {
    if (!line.trim()) continue;
    const entry = parseLogLine(line);
    if (entry) entries.push(entry);
  }

  if (maxLines !== undefined && entries.length > maxLines) {
    return entries.slice(-maxLines);
  }
  return entries;
}

export function formatLogLevel(level: string): string {
  switch (level) {
    case 'error':
      return chalk.red('ERROR');
    case 'warn':
      return chalk.yellow('WARN ');
    case 'info':
      return chalk.cyan('INFO ');
    case 'debug':
      return chalk.gray('DEBUG');
    default:
      return chalk.white(level.toUpperCase().padEnd(5));
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const scope = entry.scope ? `${chalk.blue(`[${entry.scope}]`)} ` : '';
  return `${chalk.gray(entry.timestamp)} ${formatLogLevel(entry.level)} ${scope}${entry.message}`;
}

/**
 * Print the last `lines` entries of the log file. Returns the number shown.
 */
export function displayLogs(
  logFile: string,
  options: { lines: number; json?: boolean },
  write: (line: string) => void = console.log
): number {
  if (!existsSync(logFile)) {
    write(chalk.yellow(`No log file found at ${logFile}`));
    return 0;
  }

  const entries = readLogEntries(logFile, options.lines);
  if (entries.length === 0) {
    write(chalk.yellow('No logs found'));
    return 0;
  }

  if (options.json) {
    write(JSON.stringify(entries, null, 2));
  } else {
    for (const entry of entries) {
      write(formatLogEntry(entry));
    }
  }
  return entries.length;
}
