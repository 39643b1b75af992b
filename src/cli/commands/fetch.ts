import type { Command } from 'commander';

import {
  DEFAULT_CONCURRENCY,
  DEFAULT_INPUT_COLUMN,
  DEFAULT_PACE_MS,
  DEFAULT_POOL_SIZE,
  DEFAULT_STREAM_LIMITS,
  defaultPaths,
} from '../../config.js';
import type { Environment } from '../../bootstrap/env.js';
import { runBulkExtraction, type BulkProgress, type BulkSummary } from '../../extraction/bulk.js';
import { FileRecordSink } from '../../io/records.js';
import { loadTargets } from '../../io/targets.js';
import { loadFetchConfig } from '../config-file.js';
import { mapEnvFallbacks, mergeArgChain, normalizeFetchArgs, type EnvMapping } from '../normalize.js';
import type { FetchArgs } from '../schema.js';
import { createRuntime } from './runtime.js';
import {
  printJson,
  reportFailure,
  resolveEnv,
  resolveEnvironment,
  resolveServices,
  type CommandContext,
} from './shared.js';

const ENV_MAPPING: EnvMapping = {
  input: 'HASHDIVE_INPUT',
  output: 'HASHDIVE_OUTPUT_DIR',
  dumpDir: 'HASHDIVE_DUMP_DIR',
  column: 'HASHDIVE_INPUT_COLUMN',
  poolSize: 'HASHDIVE_POOL_SIZE',
  concurrency: 'HASHDIVE_CONCURRENCY',
  paceMs: 'HASHDIVE_PACE_MS',
  maxFrames: 'HASHDIVE_MAX_FRAMES',
  frameTimeoutMs: 'HASHDIVE_FRAME_TIMEOUT_MS',
  totalTimeoutMs: 'HASHDIVE_TOTAL_TIMEOUT_MS',
};

type FetchOptions = {
  config?: string;
  input?: string;
  output?: string;
  limit?: string;
  offset?: string;
  refetch?: boolean;
  poolSize?: string;
  concurrency?: string;
  paceMs?: string;
  maxFrames?: string;
  frameTimeout?: string;
  totalTimeout?: string;
  dumpDir?: string;
  dump?: boolean;
  column?: string;
  template?: string;
  storageState?: string;
  protoDir?: string;
};

export function buildDefaults(environment: Environment): Record<string, unknown> {
  const paths = defaultPaths();
  return {
    input: paths.input,
    output: paths.output,
    dumpDir: paths.dumps,
    column: DEFAULT_INPUT_COLUMN,
    template: environment.templatePath,
    storageStatePath: environment.storageStatePath,
    protoDir: environment.protoDir,
    poolSize: DEFAULT_POOL_SIZE,
    concurrency: DEFAULT_CONCURRENCY,
    paceMs: DEFAULT_PACE_MS,
    maxFrames: DEFAULT_STREAM_LIMITS.maxFrames,
    frameTimeoutMs: DEFAULT_STREAM_LIMITS.perFrameTimeoutMs,
    totalTimeoutMs: DEFAULT_STREAM_LIMITS.totalTimeoutMs,
  };
}

function buildOverrides(options: FetchOptions): Record<string, unknown> {
  return {
    input: options.input,
    output: options.output,
    limit: options.limit,
    offset: options.offset,
    refetch: options.refetch,
    poolSize: options.poolSize,
    concurrency: options.concurrency,
    paceMs: options.paceMs,
    maxFrames: options.maxFrames,
    frameTimeoutMs: options.frameTimeout,
    totalTimeoutMs: options.totalTimeout,
    dumpDir: options.dumpDir,
    // commander fija `dump: true` por defecto con `--no-dump`; solo cuenta si se desactiva.
    dump: options.dump === false ? false : undefined,
    column: options.column,
    template: options.template,
    storageStatePath: options.storageState,
    protoDir: options.protoDir,
  };
}

export async function resolveFetchArgs(options: FetchOptions, context: CommandContext): Promise<FetchArgs> {
  const environment = resolveEnvironment(context);
  const envArgs = mapEnvFallbacks({}, ENV_MAPPING, resolveEnv(context));
  const fileArgs = options.config ? await loadFetchConfig(options.config) : undefined;
  return normalizeFetchArgs(mergeArgChain(buildDefaults(environment), envArgs, fileArgs, buildOverrides(options)));
}

function formatProgress(progress: BulkProgress): string {
  const prefix = `[${progress.index}/${progress.total}]`;
  switch (progress.outcome) {
    case 'skipped':
      return `${prefix} Omitido ${progress.target}${progress.error ? ` (${progress.error})` : ' (ya existe)'}`;
    case 'fetched':
      return `${prefix} ✓ ${progress.target} (${progress.framesProcessed ?? 0} frames)`;
    case 'partial':
      return `${prefix} ~ ${progress.target} parcial (${progress.framesProcessed ?? 0} frames): ${progress.error ?? ''}`;
    default:
      return `${prefix} ✗ ${progress.target}: ${progress.error ?? 'error desconocido'}`;
  }
}

function printSummary(json: boolean, summary: BulkSummary, logPath: string): void {
  if (json) {
    printJson({ ok: true, command: 'fetch', summary, log: logPath });
    return;
  }
  console.log('\n=== Resumen ===');
  console.log(`Total: ${summary.total}`);
  console.log(`Extraídos: ${summary.succeeded}`);
  console.log(`Omitidos: ${summary.skipped}`);
  console.log(`Errores: ${summary.failed}`);
  console.log(`Log: ${logPath}`);
}

export function registerFetchCommand(program: Command, context: CommandContext): Command {
  return program
    .command('fetch')
    .description('Extrae en lote los registros de las direcciones de la lista de entrada.')
    .option('-c, --config <path>', 'Archivo YAML con valores por defecto.')
    .option('-i, --input <path>', 'Lista de entrada (CSV con cabecera o texto plano).')
    .option('-o, --output <dir>', 'Directorio de salida de los registros.')
    .option('--limit <n>', 'Número máximo de objetivos a procesar.')
    .option('--offset <n>', 'Objetivos a saltar al inicio de la lista.')
    .option('--refetch', 'Vuelve a extraer objetivos con registro existente.')
    .option('--pool-size <n>', 'Sesiones máximas en el pool.')
    .option('--concurrency <n>', 'Extracciones simultáneas.')
    .option('--pace-ms <ms>', 'Pausa tras cada extracción.')
    .option('--max-frames <n>', 'Frames máximos por extracción.')
    .option('--frame-timeout <ms>', 'Espera máxima por frame antes de sondear con ping.')
    .option('--total-timeout <ms>', 'Duración máxima de cada extracción.')
    .option('--dump-dir <dir>', 'Directorio de volcado de frames.')
    .option('--no-dump', 'No guarda los frames decodificados.')
    .option('--column <name>', 'Columna del CSV con la dirección.')
    .option('--template <path>', 'Plantilla JSON de la petición.')
    .option('--storage-state <path>', 'Estado de sesión de Playwright con las cookies.')
    .option('--proto-dir <dir>', 'Directorio con BackMsg.proto y ForwardMsg.proto.')
    .action(async function action(this: Command, options: FetchOptions) {
      const globals = context.resolveGlobals(this);

      let args: FetchArgs;
      try {
        args = await resolveFetchArgs(options, context);
      } catch (error) {
        reportFailure(globals.json, 'fetch', error);
        return;
      }

      if (globals.dryRun) {
        if (globals.json) {
          printJson({ ok: true, dryRun: true, command: 'fetch', args });
        } else {
          console.log(`[dry-run] hashdive-stream fetch ${args.input} -> ${args.output}`);
          console.log(
            `pool=${args.poolSize} concurrency=${args.concurrency} pace=${args.paceMs}ms offset=${args.offset} limit=${args.limit ?? 'todos'}`,
          );
        }
        return;
      }

      const logger = resolveServices(context).createLogger('fetch');
      const unregisterLogger = context.shutdown?.register(() => logger.close());

      try {
        const targets = await loadTargets(args.input, { column: args.column, offset: args.offset, limit: args.limit });
        const runtime = await createRuntime(context, logger, args);
        const { pool } = runtime;
        const unregisterPool = pool ? context.shutdown?.register(() => pool.closeAll()) : undefined;

        if (!globals.json) {
          console.log(`Procesando ${targets.length} objetivo(s) -> ${args.output}`);
        }
        logger.info('fetch-start', { targets: targets.length, args });

        const sink = new FileRecordSink({ outputDir: args.output, dumpsDir: args.dump ? args.dumpDir : null });
        try {
          const summary = await runBulkExtraction(
            targets,
            { ...runtime, sink, logger },
            {
              concurrency: args.concurrency,
              paceMs: args.paceMs,
              refetch: args.refetch,
              dumpFrames: args.dump,
              extraction: {
                limits: {
                  maxFrames: args.maxFrames,
                  perFrameTimeoutMs: args.frameTimeoutMs,
                  totalTimeoutMs: args.totalTimeoutMs,
                },
              },
              shouldStop: () => context.shutdown?.isShuttingDown() ?? false,
              onProgress: (progress) => {
                if (globals.json) {
                  console.log(JSON.stringify({ event: 'target', ...progress }));
                } else {
                  console.log(formatProgress(progress));
                }
              },
            },
          );
          printSummary(globals.json, summary, logger.logPath);
        } finally {
          unregisterPool?.();
          await pool?.closeAll();
        }
      } catch (error) {
        logger.error('fetch-failed', { message: error instanceof Error ? error.message : String(error) });
        reportFailure(globals.json, 'fetch', error);
      } finally {
        unregisterLogger?.();
        await logger.close();
      }
    });
}
