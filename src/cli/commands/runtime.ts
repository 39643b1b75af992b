import { REQUIRED_COOKIES, HASHDIVE_DOMAIN } from '../../config.js';
import type { ProcessLogger } from '../../bootstrap/logger.js';
import type { FrameCodec } from '../../codec/frame-codec.js';
import { requireCredentials } from '../../credentials/storage-state.js';
import { loadTemplate, type RequestTemplate } from '../../request/template.js';
import { SessionPool } from '../../ws/pool.js';
import { createSessionConfig, type SessionConfig } from '../../ws/session-config.js';
import type { StreamingSession } from '../../ws/session.js';
import { resolveEnvironment, resolveServices, type CommandContext } from './shared.js';

export type RuntimeOptions = {
  readonly storageStatePath: string;
  readonly protoDir: string;
  readonly template: string;
  readonly poolSize?: number;
};

export type Runtime = {
  readonly codec: FrameCodec;
  readonly template: RequestTemplate;
  readonly sessionConfig: SessionConfig;
  readonly createSession: () => StreamingSession;
  readonly pool: SessionPool<StreamingSession> | null;
};

/**
 * Prepara todo lo necesario antes de abrir la primera sesión. Cualquier fallo
 * aquí es un `SetupError` y aborta el comando.
 */
export async function createRuntime(
  context: CommandContext,
  logger: ProcessLogger,
  options: RuntimeOptions,
): Promise<Runtime> {
  const environment = resolveEnvironment(context);
  const services = resolveServices(context);

  const credentials = await requireCredentials(HASHDIVE_DOMAIN, REQUIRED_COOKIES, {
    storageStatePath: options.storageStatePath,
    override: environment.cookieOverride,
  });
  logger.info('credentials-loaded', { names: Object.keys(credentials) });

  const template = await loadTemplate(options.template);
  const codec = services.loadCodec(options.protoDir);

  const sessionConfig = createSessionConfig(credentials, {
    url: environment.wsUrl,
    origin: environment.origin,
    userAgent: environment.userAgent,
  });
  const createSession = (): StreamingSession => services.createSession(sessionConfig, logger);

  const pool =
    options.poolSize === undefined
      ? null
      : new SessionPool<StreamingSession>({ createSession, maxSessions: options.poolSize, logger });

  return { codec, template, sessionConfig, createSession, pool };
}
