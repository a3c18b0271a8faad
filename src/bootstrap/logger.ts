import fs from 'node:fs';
import path from 'node:path';
import { ensureDirectorySync } from '../io/dir.js';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type Logger = {
  readonly info: (message: string, ...metadata: unknown[]) => void;
  readonly warn: (message: string, ...metadata: unknown[]) => void;
  readonly error: (message: string, ...metadata: unknown[]) => void;
  readonly debug: (message: string, ...metadata: unknown[]) => void;
};

export type ProcessLogger = Logger & {
  readonly logPath: string;
  readonly close: () => Promise<void>;
};

export type ConsoleSink = {
  readonly log: (line: string) => void;
  readonly error: (line: string) => void;
};

export type ProcessLoggerOptions = {
  readonly name?: string;
  readonly directory?: string;
  /** Levels echoed to the console besides the log file. */
  readonly echo?: readonly LogLevel[];
  readonly console?: ConsoleSink;
};

const noop = (): void => {};

export const noopLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};

function formatMetadata(metadata: readonly unknown[]): unknown[] | undefined {
  if (!metadata.length) {
    return undefined;
  }

  return metadata.map((entry) => {
    if (typeof entry === 'string') {
      return entry;
    }
    if (entry instanceof Error) {
      return { name: entry.name, message: entry.message };
    }

    try {
      return JSON.parse(JSON.stringify(entry)) as unknown;
    } catch (_error) {
      return String(entry);
    }
  });
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

export function serialiseLog(level: LogLevel, message: string, metadata: readonly unknown[]): string {
  const payload: Record<string, unknown> = {
    ts: formatTimestamp(),
    level,
    message,
  };

  const formattedMetadata = formatMetadata(metadata);
  if (formattedMetadata) {
    payload.metadata = formattedMetadata;
  }

  return `${JSON.stringify(payload)}\n`;
}

const defaultConsole: ConsoleSink = {
  // eslint-disable-next-line no-console
  log: (line) => console.log(line),
  // eslint-disable-next-line no-console
  error: (line) => console.error(line),
};

export function createProcessLogger(options: ProcessLoggerOptions = {}): ProcessLogger {
  const {
    name = 'tr-export',
    directory = path.join(process.cwd(), 'logs'),
    echo = ['info', 'warn', 'error'],
    console: sink = defaultConsole,
  } = options;

  ensureDirectorySync(directory);

  const timestamp = formatTimestamp().replace(/[:.]/g, '-');
  const logPath = path.join(directory, `${name}-${timestamp}.log`);
  const stream = fs.createWriteStream(logPath, { flags: 'a' });
  const echoed = new Set<LogLevel>(echo);

  let closed = false;

  const write = (level: LogLevel, message: string, metadata: readonly unknown[]) => {
    if (echoed.has(level)) {
      if (level === 'error' || level === 'warn') {
        sink.error(message);
      } else {
        sink.log(message);
      }
    }

    if (closed) {
      return;
    }

    stream.write(serialiseLog(level, message, metadata));
  };

  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;

    await new Promise<void>((resolve, reject) => {
      stream.end((error: Error | null | undefined): void => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };

  return {
    logPath,
    info: (message: string, ...metadata: unknown[]) => write('info', message, metadata),
    warn: (message: string, ...metadata: unknown[]) => write('warn', message, metadata),
    error: (message: string, ...metadata: unknown[]) => write('error', message, metadata),
    debug: (message: string, ...metadata: unknown[]) => write('debug', message, metadata),
    close,
  };
}
