import { readFile } from 'node:fs/promises';

import { ensureDirectoryForFile } from './dir.js';
import { writeFileAtomic } from './writeFileAtomic.js';

export type JsonlUpsertOperation = 'insert' | 'update';

export type JsonlUpsertResult = Map<string, JsonlUpsertOperation>;

const jsonlLocks = new Map<string, Promise<void>>();

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const extractKeyFromLine = (line: string, keyField: string): string | null => {
  try {
    const record: unknown = JSON.parse(line);
    if (!isPlainObject(record)) {
      return null;
    }
    const key = record[keyField];
    if (typeof key === 'string' && key.trim()) {
      return key;
    }
  } catch {
    // líneas corruptas se descartan al reescribir
  }
  return null;
};

const readExistingEntries = async (
  filePath: string,
  keyField: string,
): Promise<{ order: string[]; rows: Map<string, string> }> => {
  try {
    const content = await readFile(filePath, 'utf8');
    const lines = content.split(/\r?\n/);
    const order: string[] = [];
    const rows = new Map<string, string>();
    for (const rawLine of lines) {
      const line = rawLine.trim();
      if (!line) {
        continue;
      }
      const key = extractKeyFromLine(line, keyField);
      if (!key) {
        continue;
      }
      if (!rows.has(key)) {
        order.push(key);
      }
      rows.set(key, line);
    }
    return { order, rows };
  } catch (error) {
    if (isMissingFile(error)) {
      return { order: [], rows: new Map() };
    }
    throw error;
  }
};

const formatLines = (order: readonly string[], rows: Map<string, string>): string => {
  const lines: string[] = [];
  for (const key of order) {
    const line = rows.get(key);
    if (!line) {
      continue;
    }
    lines.push(line);
  }
  return lines.length ? `${lines.join('\n')}\n` : '';
};

/**
 * Inserta o reemplaza objetos en un archivo JSONL identificándolos por
 * `keyField`. Las escrituras sobre un mismo archivo se serializan.
 */
export async function upsertJsonl<T extends Record<string, unknown>>(
  filePath: string,
  keyField: keyof T & string,
  records: readonly T[],
): Promise<JsonlUpsertResult> {
  if (!records.length) {
    return new Map();
  }

  const previous = jsonlLocks.get(filePath) ?? Promise.resolve();
  const task = previous.then(async () => {
    await ensureDirectoryForFile(filePath);
    const { order, rows } = await readExistingEntries(filePath, keyField);
    const operations: JsonlUpsertResult = new Map();

    for (const record of records) {
      const key = record[keyField];
      if (typeof key !== 'string' || !key.trim()) {
        throw new Error(`Registro sin clave "${keyField}" válida.`);
      }
      if (!rows.has(key)) {
        order.push(key);
        operations.set(key, 'insert');
      } else {
        operations.set(key, 'update');
      }
      rows.set(key, JSON.stringify(record));
    }

    await writeFileAtomic(filePath, formatLines(order, rows));

    return operations;
  });

  const lockPromise = task.then(() => undefined, () => undefined);
  jsonlLocks.set(filePath, lockPromise);

  try {
    return await task;
  } finally {
    if (jsonlLocks.get(filePath) === lockPromise) {
      jsonlLocks.delete(filePath);
    }
  }
}
