import process from 'node:process';

import { FetchArgsSchema, type FetchArgs } from './schema.js';

const BOOLEAN_TRUE = new Set(['1', 'true', 'yes', 'on']);
const BOOLEAN_FALSE = new Set(['0', 'false', 'no', 'off']);

export type ArgSource = Readonly<Record<string, unknown>>;

export function coerceBool(value: unknown, label = 'valor'): boolean | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    if (value === 1) {
      return true;
    }
    if (value === 0) {
      return false;
    }
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (BOOLEAN_TRUE.has(normalized)) {
      return true;
    }
    if (BOOLEAN_FALSE.has(normalized)) {
      return false;
    }
  }

  throw new Error(`El ${label} debe ser booleano. Usa true/false, yes/no, on/off o 1/0.`);
}

export function toOptionalString(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }

  return String(value);
}

export function toOptionalNumber(value: unknown, label: string): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') {
      return undefined;
    }
    const parsed = Number.parseFloat(trimmed);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  throw new Error(`El ${label} debe ser numérico.`);
}

type EnvDescriptor =
  | string
  | readonly string[]
  | { readonly key: string; readonly transform?: (value: string) => unknown }
  | readonly { readonly key: string; readonly transform?: (value: string) => unknown }[];

export type EnvMapping = Readonly<Record<string, EnvDescriptor>>;

const isDescriptorList = (descriptor: EnvDescriptor): descriptor is Extract<EnvDescriptor, readonly unknown[]> =>
  Array.isArray(descriptor);

export function mapEnvFallbacks(
  source: ArgSource,
  mapping: EnvMapping,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...source };

  for (const [property, descriptor] of Object.entries(mapping)) {
    const current = result[property];
    if (current !== undefined && current !== null && current !== '') {
      continue;
    }

    const entries = isDescriptorList(descriptor) ? descriptor : [descriptor];
    for (const entry of entries) {
      if (typeof entry === 'string') {
        const raw = env[entry];
        if (raw !== undefined && raw !== '') {
          result[property] = raw;
          break;
        }
        continue;
      }

      const raw = env[entry.key];
      if (raw === undefined || raw === '') {
        continue;
      }
      result[property] = entry.transform ? entry.transform(raw) : raw;
      break;
    }
  }

  return result;
}

/** Fusiona fuentes de izquierda a derecha; los valores `undefined` no pisan. */
export function mergeArgChain(...sources: ReadonlyArray<ArgSource | undefined>): Record<string, unknown> {
  const target: Record<string, unknown> = {};
  for (const source of sources) {
    if (!source) {
      continue;
    }
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) {
        continue;
      }
      target[key] = value;
    }
  }
  return target;
}

export function normalizeFetchArgs(input: ArgSource): FetchArgs {
  const normalized = {
    input: toOptionalString(input.input),
    output: toOptionalString(input.output),
    dumpDir: toOptionalString(input.dumpDir),
    dump: coerceBool(input.dump, 'dump'),
    column: toOptionalString(input.column),
    template: toOptionalString(input.template),
    storageStatePath: toOptionalString(input.storageStatePath),
    protoDir: toOptionalString(input.protoDir),
    limit: toOptionalNumber(input.limit, 'limit'),
    offset: toOptionalNumber(input.offset, 'offset'),
    refetch: coerceBool(input.refetch, 'refetch'),
    poolSize: toOptionalNumber(input.poolSize, 'poolSize'),
    concurrency: toOptionalNumber(input.concurrency, 'concurrency'),
    paceMs: toOptionalNumber(input.paceMs, 'paceMs'),
    maxFrames: toOptionalNumber(input.maxFrames, 'maxFrames'),
    frameTimeoutMs: toOptionalNumber(input.frameTimeoutMs, 'frameTimeoutMs'),
    totalTimeoutMs: toOptionalNumber(input.totalTimeoutMs, 'totalTimeoutMs'),
  };

  return FetchArgsSchema.parse(normalized);
}
