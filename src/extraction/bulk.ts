import { setTimeout as delay } from 'node:timers/promises';

import pLimit from 'p-limit';

import { describeError, silentLogger } from '../bootstrap/logger.js';
import { DEFAULT_CONCURRENCY, DEFAULT_PACE_MS, POOL_SWEEP_INTERVAL_MS } from '../config.js';
import { toRecordFile, type RecordSink } from '../io/records.js';
import type { Target } from '../io/targets.js';
import { runExtraction, type ExtractionDependencies, type ExtractionOptions, type ExtractionResult } from './run.js';

export type BulkOutcome = 'fetched' | 'partial' | 'skipped' | 'failed';

export type BulkProgress = {
  readonly index: number;
  readonly total: number;
  readonly target: string;
  readonly outcome: BulkOutcome;
  readonly framesProcessed?: number;
  readonly file?: string;
  readonly error?: string;
};

export type BulkSummary = {
  readonly total: number;
  readonly succeeded: number;
  readonly skipped: number;
  readonly failed: number;
};

export type BulkDependencies = ExtractionDependencies & {
  readonly sink: RecordSink;
};

export type BulkOptions = {
  readonly concurrency?: number;
  /** Pausa tras cada extracción, por ranura de concurrencia. */
  readonly paceMs?: number;
  readonly refetch?: boolean;
  readonly dumpFrames?: boolean;
  readonly extraction?: ExtractionOptions;
  readonly sweepIntervalMs?: number;
  readonly onProgress?: (progress: BulkProgress) => void;
  /** Se consulta antes de cada objetivo; `true` omite los restantes. */
  readonly shouldStop?: () => boolean;
};

const outcomeOf = (result: ExtractionResult): BulkOutcome => {
  if (result.success) {
    return 'fetched';
  }
  return result.framesProcessed > 0 ? 'partial' : 'failed';
};

/**
 * Extrae cada objetivo con a lo sumo `concurrency` ejecuciones simultáneas.
 * Los objetivos con registro existente se omiten salvo `refetch`. Un registro
 * parcial se guarda igualmente y cuenta como fallo en el resumen.
 */
export async function runBulkExtraction(
  targets: readonly Target[],
  deps: BulkDependencies,
  options: BulkOptions = {},
): Promise<BulkSummary> {
  const logger = deps.logger ?? silentLogger;
  const {
    concurrency = DEFAULT_CONCURRENCY,
    paceMs = DEFAULT_PACE_MS,
    refetch = false,
    dumpFrames = false,
    sweepIntervalMs = POOL_SWEEP_INTERVAL_MS,
  } = options;
  const total = targets.length;
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));

  let succeeded = 0;
  let skipped = 0;
  let failed = 0;

  const report = (progress: BulkProgress): void => {
    if (progress.outcome === 'fetched') {
      succeeded += 1;
    } else if (progress.outcome === 'skipped') {
      skipped += 1;
    } else {
      failed += 1;
    }
    logger.info('bulk-target', progress);
    options.onProgress?.(progress);
  };

  const processTarget = async (target: Target, index: number): Promise<void> => {
    const base = { index, total, target: target.address };

    if (options.shouldStop?.()) {
      report({ ...base, outcome: 'skipped', error: 'detenido' });
      return;
    }
    if (!refetch && (await deps.sink.exists(target.address))) {
      report({ ...base, outcome: 'skipped' });
      return;
    }

    const result = await runExtraction(target.address, deps, {
      ...options.extraction,
      keepFrames: dumpFrames || options.extraction?.keepFrames,
    });
    const outcome = outcomeOf(result);

    try {
      if (outcome === 'failed') {
        report({ ...base, outcome, framesProcessed: 0, error: result.error });
      } else {
        const file = await deps.sink.write(toRecordFile(result, target.extras), result.error);
        if (dumpFrames) {
          await deps.sink.dumpFrames(target.address, result.frames);
        }
        report({ ...base, outcome, framesProcessed: result.framesProcessed, file, error: result.error });
      }
    } catch (error) {
      logger.error('bulk-write-failed', { target: target.address, message: describeError(error) });
      report({ ...base, outcome: 'failed', framesProcessed: result.framesProcessed, error: describeError(error) });
    }

    if (paceMs > 0) {
      await delay(paceMs);
    }
  };

  const { pool } = deps;
  const sweeper = pool
    ? setInterval(() => {
        pool.sweepExpired().catch((error: unknown) => {
          logger.warn('pool-sweep-failed', { message: describeError(error) });
        });
      }, sweepIntervalMs)
    : null;
  sweeper?.unref();

  logger.info('bulk-start', { total, concurrency, paceMs, refetch });
  try {
    await Promise.all(targets.map((target, position) => limit(() => processTarget(target, position + 1))));
  } finally {
    if (sweeper) {
      clearInterval(sweeper);
    }
  }

  const summary: BulkSummary = { total, succeeded, skipped, failed };
  logger.info('bulk-summary', summary);
  return summary;
}
