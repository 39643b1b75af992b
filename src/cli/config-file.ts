import { promises as fs } from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import { SetupError } from '../errors.js';

const BooleanLikeSchema = z
  .preprocess((value) => {
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
      return value;
    }
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
      }
      if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
      }
      return value;
    }
    return value;
  }, z.boolean())
  .optional();

const NumberLikeSchema = z.preprocess((value) => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  const parsed = Number.parseFloat(String(value));
  return Number.isFinite(parsed) ? parsed : value;
}, z.number().optional());

const PathSchema = z.string().trim().min(1).optional();

const FetchConfigSchema = z
  .object({
    input: PathSchema,
    output: PathSchema,
    dumpDir: PathSchema,
    dump: BooleanLikeSchema,
    column: z.string().trim().min(1).optional(),
    template: PathSchema,
    storageStatePath: PathSchema,
    protoDir: PathSchema,
    limit: NumberLikeSchema,
    offset: NumberLikeSchema,
    refetch: BooleanLikeSchema,
    poolSize: NumberLikeSchema,
    concurrency: NumberLikeSchema,
    paceMs: NumberLikeSchema,
    maxFrames: NumberLikeSchema,
    frameTimeoutMs: NumberLikeSchema,
    totalTimeoutMs: NumberLikeSchema,
  })
  .strict();

const ConfigSchema = z.union([z.object({ fetch: FetchConfigSchema }), FetchConfigSchema]);

export type FetchConfig = z.infer<typeof FetchConfigSchema>;

function formatError(error: z.ZodError, sourcePath: string): SetupError {
  const details = error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
  return new SetupError(`Configuración inválida en ${sourcePath}: ${details}`);
}

/**
 * Lee valores por defecto de `fetch` desde YAML, ya sea en la raíz o bajo la
 * clave `fetch`. Las rutas relativas se resuelven contra el directorio del archivo.
 */
export async function loadFetchConfig(filePath: string): Promise<FetchConfig> {
  const resolvedPath = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.readFile(resolvedPath, 'utf8');
  } catch (error) {
    throw new SetupError(`No se pudo leer la configuración ${resolvedPath}.`, { cause: error });
  }

  let raw: unknown = {};
  if (content.trim().length) {
    try {
      raw = parse(content);
    } catch (error) {
      throw new SetupError(`YAML inválido en ${resolvedPath}.`, { cause: error });
    }
  }
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw formatError(parsed.error, resolvedPath);
  }

  const config = 'fetch' in parsed.data ? parsed.data.fetch : parsed.data;
  const baseDir = path.dirname(resolvedPath);
  const resolve = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(baseDir, value);

  return {
    ...config,
    input: resolve(config.input),
    output: resolve(config.output),
    dumpDir: resolve(config.dumpDir),
    template: resolve(config.template),
    storageStatePath: resolve(config.storageStatePath),
    protoDir: resolve(config.protoDir),
  };
}
