import fs from 'node:fs';
import path from 'node:path';

import { DateTime } from 'luxon';

import { ensureDirectorySync } from '../io/dir.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

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

export type ProcessLoggerOptions = {
  readonly name?: string;
  readonly directory?: string;
  readonly minLevel?: LogLevel;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const noop = (): void => undefined;

export const silentLogger: Logger = { info: noop, warn: noop, error: noop, debug: noop };

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
      return JSON.parse(JSON.stringify(entry));
    } catch (_error) {
      return String(entry);
    }
  });
}

function formatTimestamp(): string {
  return DateTime.utc().toISO() ?? new Date().toISOString();
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

/**
 * Logger de proceso en formato JSONL. Cada ejecución del CLI escribe en su
 * propio archivo `<name>-<timestamp>.log` dentro de `directory`.
 */
export function createProcessLogger(options: ProcessLoggerOptions = {}): ProcessLogger {
  const { name = 'process', directory = path.join(process.cwd(), 'logs'), minLevel = 'debug' } = options;

  ensureDirectorySync(directory);

  const timestamp = DateTime.utc().toFormat("yyyyLLdd'T'HHmmss");
  const logPath = path.join(directory, `${name}-${timestamp}.log`);
  const stream = fs.createWriteStream(logPath, { flags: 'a' });
  const threshold = LEVEL_ORDER[minLevel];

  let closed = false;

  const write = (level: LogLevel, message: string, metadata: readonly unknown[]) => {
    if (closed || LEVEL_ORDER[level] < threshold) {
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
      stream.once('error', reject);
      stream.end(() => resolve());
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

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
