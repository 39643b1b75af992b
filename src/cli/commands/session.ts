import process from 'node:process';
import { setTimeout as delay } from 'node:timers/promises';

import type { Command } from 'commander';
import { chromium, type BrowserContext } from 'playwright-core';

import {
  HASHDIVE_ANALYZE_USER_URL,
  HASHDIVE_DOMAIN,
  LOGIN_CHECK_INTERVAL_MS,
  LOGIN_TIMEOUT_MS,
  REQUIRED_COOKIES,
} from '../../config.js';
import { describeError, type Logger } from '../../bootstrap/logger.js';
import { matchesDomain } from '../../credentials/storage-state.js';
import { ensureDirectoryForFile } from '../../io/dir.js';
import { printJson, reportFailure, resolveEnvironment, resolveServices, type CommandContext } from './shared.js';

type SessionOutcome = 'ready' | 'missing';

type SessionOptions = {
  storageState?: string;
  timeout?: string;
};

async function waitForCookies(
  context: BrowserContext,
  timeoutMs: number,
  logger: Logger,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  let check = 0;

  while (Date.now() < deadline) {
    check += 1;
    const cookies = await context.cookies();
    const present = new Set(
      cookies.filter((cookie) => matchesDomain(cookie.domain, HASHDIVE_DOMAIN)).map((cookie) => cookie.name),
    );
    const missing = REQUIRED_COOKIES.filter((name) => !present.has(name));
    logger.info('login-check', { check, missing });
    if (!missing.length) {
      return true;
    }
    await delay(LOGIN_CHECK_INTERVAL_MS);
  }

  return false;
}

export function registerSessionCommand(program: Command, context: CommandContext): Command {
  return program
    .command('session')
    .description('Abre un navegador para iniciar sesión en Hashdive y guarda las cookies resultantes.')
    .option('--storage-state <path>', 'Destino del estado de sesión.')
    .option('--timeout <ms>', 'Tiempo máximo para completar el login.')
    .action(async function action(this: Command, options: SessionOptions) {
      const globals = context.resolveGlobals(this);
      const environment = resolveEnvironment(context);
      const storageStatePath = options.storageState ?? environment.storageStatePath;
      const parsedTimeout = options.timeout === undefined ? Number.NaN : Number.parseInt(options.timeout, 10);
      const timeoutMs = Number.isFinite(parsedTimeout) && parsedTimeout > 0 ? parsedTimeout : LOGIN_TIMEOUT_MS;

      if (globals.dryRun) {
        if (globals.json) {
          printJson({ ok: true, dryRun: true, command: 'session', storageState: storageStatePath, timeoutMs });
        } else {
          console.log(`[dry-run] hashdive-stream session -> ${storageStatePath}`);
        }
        return;
      }

      const logger = resolveServices(context).createLogger('session');
      let outcome: SessionOutcome = 'missing';

      try {
        logger.info('launch', { headless: environment.headless, channel: environment.browserChannel });
        const browser = await chromium.launch({
          headless: environment.headless,
          channel: environment.browserChannel,
        });
        const unregister = context.shutdown?.register(() => browser.close());

        try {
          const browserContext = await browser.newContext({ viewport: null });
          const page = await browserContext.newPage();
          await page.goto(HASHDIVE_ANALYZE_USER_URL, { waitUntil: 'domcontentloaded' });

          if (!globals.json) {
            console.log('Inicia sesión en la ventana del navegador. Las cookies se guardarán al detectarse.');
          }

          if (await waitForCookies(browserContext, timeoutMs, logger)) {
            await ensureDirectoryForFile(storageStatePath);
            await browserContext.storageState({ path: storageStatePath });
            outcome = 'ready';
            logger.info('session-detected', { storageState: storageStatePath });
          } else {
            logger.warn('session-missing', { timeoutMs });
          }
        } finally {
          unregister?.();
          await browser.close();
        }

        if (globals.json) {
          printJson({ ok: outcome === 'ready', command: 'session', outcome, storageState: storageStatePath });
        } else if (outcome === 'ready') {
          console.log(`Sesión guardada en ${storageStatePath}`);
        } else {
          console.error(`No se detectó login tras ${Math.round(timeoutMs / 1000)} s.`);
        }
        if (outcome !== 'ready') {
          process.exitCode = 1;
        }
      } catch (error) {
        logger.error('session-error', { message: describeError(error) });
        reportFailure(globals.json, 'session', error);
      } finally {
        await logger.close();
      }
    });
}
