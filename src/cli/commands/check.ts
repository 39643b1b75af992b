import process from 'node:process';

import type { Command } from 'commander';

import { HASHDIVE_DOMAIN, KEEPALIVE_TIMEOUT_MS, REQUIRED_COOKIES } from '../../config.js';
import { requireCredentials } from '../../credentials/storage-state.js';
import { createSessionConfig } from '../../ws/session-config.js';
import { printJson, reportFailure, resolveEnvironment, resolveServices, type CommandContext } from './shared.js';

type CheckOptions = {
  storageState?: string;
  timeout?: string;
};

type CheckReport = {
  readonly cookies: readonly string[];
  readonly opened: boolean;
  readonly pong: boolean;
};

export function registerCheckCommand(program: Command, context: CommandContext): Command {
  return program
    .command('check')
    .description('Verifica cookies y conectividad: abre una sesión, envía un ping y la cierra.')
    .option('--storage-state <path>', 'Estado de sesión de Playwright con las cookies.')
    .option('--timeout <ms>', 'Tiempo máximo de apertura.')
    .action(async function action(this: Command, options: CheckOptions) {
      const globals = context.resolveGlobals(this);
      const environment = resolveEnvironment(context);
      const storageStatePath = options.storageState ?? environment.storageStatePath;

      if (globals.dryRun) {
        if (globals.json) {
          printJson({ ok: true, dryRun: true, command: 'check', url: environment.wsUrl, storageState: storageStatePath });
        } else {
          console.log(`[dry-run] hashdive-stream check ${environment.wsUrl} (${storageStatePath})`);
        }
        return;
      }

      const services = resolveServices(context);
      const logger = services.createLogger('check');
      try {
        const credentials = await requireCredentials(HASHDIVE_DOMAIN, REQUIRED_COOKIES, {
          storageStatePath,
          override: environment.cookieOverride,
        });

        const config = createSessionConfig(credentials, {
          url: environment.wsUrl,
          origin: environment.origin,
          userAgent: environment.userAgent,
        });
        const session = services.createSession(config, logger);
        const timeoutMs = options.timeout === undefined ? undefined : Number.parseInt(options.timeout, 10);
        const opened = await session.open({
          maxRetries: 1,
          ...(timeoutMs !== undefined && Number.isFinite(timeoutMs) ? { timeoutMs } : {}),
        });

        let pong = false;
        if (opened) {
          pong = await session.ping(KEEPALIVE_TIMEOUT_MS);
        }
        await session.close();

        const report: CheckReport = { cookies: Object.keys(credentials), opened, pong };
        logger.info('check-finished', report);

        if (globals.json) {
          printJson({ ok: opened && pong, command: 'check', ...report });
        } else {
          console.log(`Cookies: ${report.cookies.join(', ')}`);
          console.log(`Conexión: ${opened ? 'abierta' : 'fallida'}`);
          console.log(`Ping: ${pong ? 'ok' : 'sin respuesta'}`);
        }
        if (!opened || !pong) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportFailure(globals.json, 'check', error);
      } finally {
        await logger.close();
      }
    });
}
