import { describeError, silentLogger, type Logger } from '../bootstrap/logger.js';
import { decodeFrame, type DecodedFrame, type FrameCodec } from '../codec/frame-codec.js';
import type { OpenOptions, StreamLimits } from '../config.js';
import { createPipeline, foldFrame, type PipelineState } from '../parser/pipeline.js';
import type { UserRecord } from '../parser/record.js';
import type { TagCounts } from '../parser/tags.js';
import { buildRequest, type RequestTemplate } from '../request/template.js';
import type { SessionPool } from '../ws/pool.js';
import type { StreamingSession } from '../ws/session.js';

export type ExtractionDependencies = {
  readonly codec: FrameCodec;
  readonly template: RequestTemplate;
  /** Sesión nueva (sin abrir) para cuando no hay pool o está agotado. */
  readonly createSession: () => StreamingSession;
  readonly pool?: SessionPool<StreamingSession> | null;
  readonly logger?: Logger;
};

export type ExtractionOptions = {
  readonly limits?: Partial<StreamLimits>;
  readonly openOptions?: Partial<OpenOptions>;
  readonly queryParameter?: string;
  /** Conserva los frames decodificados en el resultado (para volcados). */
  readonly keepFrames?: boolean;
};

export type ExtractionResult = {
  readonly target: string;
  readonly record: UserRecord;
  /** Se observó la señal terminal. */
  readonly success: boolean;
  readonly complete: boolean;
  readonly framesProcessed: number;
  readonly frames: readonly DecodedFrame[];
  readonly tagCounts: TagCounts;
  readonly durationMs: number;
  readonly error?: string;
};

type Lease = {
  readonly session: StreamingSession;
  readonly pooled: boolean;
  /** `reusable = false` retira la sesión: solo vuelve al pool tras un stream completo. */
  readonly dispose: (reusable: boolean) => Promise<void>;
};

async function acquireSession(
  deps: ExtractionDependencies,
  options: ExtractionOptions,
  logger: Logger,
): Promise<Lease | null> {
  const { pool } = deps;
  if (pool) {
    const leased = await pool.lease();
    if (leased) {
      return {
        session: leased,
        pooled: true,
        dispose: (reusable) => (reusable ? pool.release(leased) : pool.discard(leased)),
      };
    }
    logger.warn('pool-fallback-direct', pool.stats());
  }

  const session = deps.createSession();
  if (!(await session.open(options.openOptions))) {
    await session.close();
    return null;
  }
  return { session, pooled: false, dispose: () => session.close() };
}

/**
 * Ejecuta una extracción completa para `target`: envía la petición, consume
 * el stream y pliega cada frame en el registro. Los fallos de transporte,
 * decodificación o extracción no lanzan: se reflejan en el resultado.
 */
export async function runExtraction(
  target: string,
  deps: ExtractionDependencies,
  options: ExtractionOptions = {},
): Promise<ExtractionResult> {
  const logger = deps.logger ?? silentLogger;
  const startedAt = Date.now();
  const frames: DecodedFrame[] = [];
  let state: PipelineState = createPipeline();

  const finish = (error?: string): ExtractionResult => {
    const result: ExtractionResult = {
      target,
      record: state.record,
      success: state.complete,
      complete: state.complete,
      framesProcessed: state.framesProcessed,
      frames,
      tagCounts: state.tagCounts,
      durationMs: Date.now() - startedAt,
      ...(error === undefined ? {} : { error }),
    };
    logger.info('extraction-finished', {
      target,
      success: result.success,
      frames: result.framesProcessed,
      durationMs: result.durationMs,
      error,
    });
    return result;
  };

  let payload: Uint8Array;
  try {
    payload = deps.codec.encode(buildRequest(deps.template, target, options.queryParameter));
  } catch (error) {
    logger.error('request-encode-failed', { target, message: describeError(error) });
    return finish(`No se pudo codificar la petición: ${describeError(error)}`);
  }

  const lease = await acquireSession(deps, options, logger);
  if (!lease) {
    return finish('No se pudo abrir una sesión.');
  }
  logger.info('extraction-start', { target, session: lease.session.id, pooled: lease.pooled });

  let failure: string | undefined;
  try {
    const stale = lease.session.discardPending();
    if (stale) {
      logger.warn('stale-frames-discarded', { target, session: lease.session.id, frames: stale });
    }
    if (!(await lease.session.send(payload))) {
      failure = 'No se pudo enviar la petición.';
    } else {
      for await (const frame of lease.session.receiveStream(options.limits)) {
        let decoded: DecodedFrame;
        try {
          decoded = decodeFrame(deps.codec, frame);
        } catch (error) {
          logger.warn('frame-decode-failed', { target, size: frame.size, message: describeError(error) });
          continue;
        }

        if (options.keepFrames) {
          frames.push(decoded);
        }
        const folded = foldFrame(state, decoded);
        state = folded.state;
        logger.debug('frame-classified', { target, index: state.framesProcessed, tag: folded.message.tag });

        if (state.complete) {
          break;
        }
      }
      if (!state.complete) {
        failure = 'El stream terminó sin la señal de fin.';
      }
    }
  } catch (error) {
    logger.error('extraction-failed', { target, message: describeError(error) });
    failure = describeError(error);
  } finally {
    await lease.dispose(failure === undefined && state.complete);
  }

  return finish(failure);
}
