import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_INPUT_COLUMN } from '../config.js';
import { SetupError } from '../errors.js';

export type TargetExtras = Readonly<Record<string, string | number>>;

export type Target = {
  readonly address: string;
  /** Resto de columnas de la fila de entrada. */
  readonly extras: TargetExtras;
};

export type TargetListOptions = {
  readonly column?: string;
  readonly offset?: number;
  readonly limit?: number;
};

export const parseCsvLine = (line: string): string[] => {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i += 1) {
    const char = line[i];
    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (char === ',' && !inQuotes) {
      values.push(current);
      current = '';
      continue;
    }
    current += char;
  }

  values.push(current);
  return values;
};

const toExtraValue = (raw: string): string | number => {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return trimmed;
  }
  const numeric = Number(trimmed);
  return Number.isFinite(numeric) ? numeric : trimmed;
};

export function parseCsvTargets(content: string, column: string = DEFAULT_INPUT_COLUMN): Target[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (!lines.length) {
    return [];
  }

  const header = parseCsvLine(lines[0]).map((name) => name.trim());
  const columnIndex = header.indexOf(column);
  if (columnIndex < 0) {
    throw new SetupError(`La columna "${column}" no existe en la cabecera: ${header.join(', ')}`);
  }

  const targets: Target[] = [];
  for (const line of lines.slice(1)) {
    const values = parseCsvLine(line);
    const address = (values[columnIndex] ?? '').trim();
    if (!address) {
      continue;
    }
    const extras: Record<string, string | number> = {};
    header.forEach((name, index) => {
      const value = values[index];
      if (index !== columnIndex && name && value !== undefined && value.trim() !== '') {
        extras[name] = toExtraValue(value);
      }
    });
    targets.push({ address, extras });
  }
  return targets;
}

/** Una dirección por línea; se ignoran líneas vacías y comentarios `#`. */
export function parsePlainTargets(content: string): Target[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
    .map((address) => ({ address, extras: {} }));
}

export function selectTargets(targets: readonly Target[], options: TargetListOptions = {}): Target[] {
  const seen = new Set<string>();
  const unique = targets.filter((target) => {
    if (seen.has(target.address)) {
      return false;
    }
    seen.add(target.address);
    return true;
  });

  const offset = Math.max(0, options.offset ?? 0);
  const end = options.limit === undefined ? undefined : offset + Math.max(0, options.limit);
  return unique.slice(offset, end);
}

export async function loadTargets(filePath: string, options: TargetListOptions = {}): Promise<Target[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new SetupError(`No se pudo leer la lista de entrada ${filePath}.`, { cause: error });
  }

  const parsed =
    path.extname(filePath).toLowerCase() === '.csv'
      ? parseCsvTargets(content, options.column)
      : parsePlainTargets(content);
  return selectTargets(parsed, options);
}
