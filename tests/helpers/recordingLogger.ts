import type { Logger, LogLevel } from '../../src/bootstrap/logger.js';

export type LogEntry = { readonly level: LogLevel; readonly message: string };

export type RecordingLogger = Logger & { readonly entries: LogEntry[] };

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (message: string): void => {
      entries.push({ level, message });
    };
  return {
    entries,
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    debug: record('debug'),
  };
}
