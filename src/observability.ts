import process from 'node:process';
import { inspect, stripVTControlCharacters } from 'node:util';

import { config, type LogLevel } from './config.js';

type LogMetadata = Record<string, unknown>;

let stderrAvailable = true;

process.stderr.on('error', () => {
  stderrAvailable = false;
});

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[config.logging.level];
}

function hasMetadata(meta?: LogMetadata): meta is LogMetadata {
  return meta !== undefined && Object.keys(meta).length > 0;
}

function formatMetadata(meta?: LogMetadata): string {
  if (!hasMetadata(meta)) return '';

  return ` ${inspect(meta, { breakLength: Infinity, colors: false, compact: true, sorted: true })}`;
}

function createTimestamp(): string {
  return new Date().toISOString();
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  if (config.logging.format === 'json') {
    const entry: Record<string, unknown> = {
      timestamp: createTimestamp(),
      level: level.toUpperCase(),
      message,
    };
    if (hasMetadata(meta)) {
      Object.assign(entry, meta);
    }
    return JSON.stringify(entry);
  }
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${formatMetadata(meta)}`;
}

export function safeWriteStderr(text: string): void {
  if (!stderrAvailable) return;
  if (process.stderr.destroyed || process.stderr.writableEnded) {
    stderrAvailable = false;
    return;
  }
  try {
    process.stderr.write(text);
  } catch {
    // Logging must never take down the process (e.g. EPIPE).
    stderrAvailable = false;
  }
}

function writeLog(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (!shouldLog(level)) return;

  const line = formatLogEntry(level, message, meta);
  safeWriteStderr(`${stripVTControlCharacters(line)}\n`);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  writeLog('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  writeLog('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  writeLog('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});
  writeLog('error', message, errorMeta);
}

/** Drops everything from the first `?` on, so query-string tokens stay out of logs. */
export function stripQuery(rawUrl: string): string {
  const index = rawUrl.indexOf('?');
  return index === -1 ? rawUrl : rawUrl.slice(0, index);
}
