import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { test } from 'node:test';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { readEnvironment } from '../src/bootstrap/env.js';
import { silentLogger, type ProcessLogger } from '../src/bootstrap/logger.js';
import { registerCheckCommand } from '../src/cli/commands/check.js';
import { registerFetchCommand } from '../src/cli/commands/fetch.js';
import { registerReplayCommand } from '../src/cli/commands/replay.js';
import { registerSessionCommand } from '../src/cli/commands/session.js';
import type { CommandContext } from '../src/cli/commands/shared.js';
import { registerUserCommand } from '../src/cli/commands/user.js';
import { buildProgram } from '../src/cli/index.js';
import type { SessionConfig } from '../src/ws/session-config.js';
import { TOTAL_POSITIONS, profileStream } from './fixtures/frames.js';
import { FakeSession, JsonCodec, toFrames, type FakeSessionOptions } from './fixtures/sessions.js';

const TEMPLATE_PATH = fileURLToPath(new URL('../templates/analyze-user.json', import.meta.url));
const COOKIES = 'ajs_anonymous_id=anon; _streamlit_user=test-user; _streamlit_xsrf=test-xsrf';

const memoryLogger: ProcessLogger = { ...silentLogger, logPath: 'memoria.log', close: async () => undefined };

type Harness = {
  readonly dir: string;
  readonly configs: SessionConfig[];
  readonly sessions: FakeSession[];
  readonly loggers: string[];
  readonly context: CommandContext;
};

async function createHarness(
  options: { json?: boolean; dryRun?: boolean; cookies?: string | null; session?: FakeSessionOptions; env?: NodeJS.ProcessEnv } = {},
): Promise<Harness> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hashdive-cli-'));
  const configs: SessionConfig[] = [];
  const sessions: FakeSession[] = [];
  const loggers: string[] = [];
  const environment = readEnvironment(
    {
      HASHDIVE_TEMPLATE: TEMPLATE_PATH,
      ...(options.cookies === null ? {} : { HASHDIVE_COOKIES: options.cookies ?? COOKIES }),
    },
    dir,
  );

  const context: CommandContext = {
    resolveGlobals: () => ({ json: Boolean(options.json), dryRun: Boolean(options.dryRun) }),
    env: options.env ?? {},
    environment,
    services: {
      createLogger: (name) => {
        loggers.push(name);
        return memoryLogger;
      },
      loadCodec: () => new JsonCodec(),
      createSession: (config) => {
        configs.push(config);
        const session = new FakeSession(options.session ?? { frames: toFrames(profileStream()) });
        sessions.push(session);
        return session;
      },
    },
  };
  return { dir, configs, sessions, loggers, context };
}

type Captured = { stdout: string[]; stderr: string[]; exitCode: number | string | undefined };

async function run(register: (program: Command, context: CommandContext) => Command, harness: Harness, argv: string[]) {
  const program = new Command();
  program.exitOverride();
  register(program, harness.context);

  const captured: Captured = { stdout: [], stderr: [], exitCode: undefined };
  const originalLog = console.log;
  const originalError = console.error;
  console.log = (message?: unknown) => {
    captured.stdout.push(String(message));
  };
  console.error = (message?: unknown) => {
    captured.stderr.push(String(message));
  };

  try {
    await program.parseAsync(['node', 'hashdive-stream', ...argv]);
  } finally {
    console.log = originalLog;
    console.error = originalError;
    captured.exitCode = process.exitCode;
    process.exitCode = undefined;
  }
  return captured;
}

const lastJson = (lines: readonly string[]): unknown => JSON.parse(lines[lines.length - 1]);

test('buildProgram registra los comandos del CLI', () => {
  const program = buildProgram();
  assert.equal(program.name(), 'hashdive-stream');
  assert.deepEqual(
    program.commands.map((command) => command.name()),
    ['fetch', 'user', 'replay', 'check', 'session'],
  );
});

test('fetch en dry-run muestra los argumentos resueltos con su precedencia', async () => {
  const harness = await createHarness({ json: true, dryRun: true, env: { HASHDIVE_CONCURRENCY: '3', HASHDIVE_PACE_MS: '500' } });
  try {
    const output = await run(registerFetchCommand, harness, [
      'fetch',
      '--input',
      'lista.txt',
      '--output',
      'salida',
      '--pace-ms',
      '0',
      '--limit',
      '10',
      '--no-dump',
    ]);

    const printed = lastJson(output.stdout);
    assert.deepEqual(printed, {
      ok: true,
      dryRun: true,
      command: 'fetch',
      args: {
        input: 'lista.txt',
        output: 'salida',
        dumpDir: path.join(process.cwd(), 'logs', 'messages'),
        dump: false,
        column: 'user_address',
        template: TEMPLATE_PATH,
        storageStatePath: path.join(harness.dir, 'state', 'storage', 'hashdive.json'),
        protoDir: path.join(harness.dir, 'proto', 'streamlit'),
        limit: 10,
        offset: 0,
        refetch: false,
        poolSize: 10,
        concurrency: 3,
        paceMs: 0,
        maxFrames: 300,
        frameTimeoutMs: 10000,
        totalTimeoutMs: 120000,
      },
    });
    assert.equal(harness.sessions.length, 0);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('fetch extrae la lista, escribe registros y volcados e imprime el resumen', async () => {
  const harness = await createHarness({ json: true });
  const input = path.join(harness.dir, 'users.csv');
  const output = path.join(harness.dir, 'users');
  const dumps = path.join(harness.dir, 'messages');
  await fs.writeFile(input, 'user_address,rank\n0xaaa,1\n0xbbb,2\n0xaaa,3\n');

  try {
    const printed = await run(registerFetchCommand, harness, [
      'fetch',
      '--input',
      input,
      '--output',
      output,
      '--dump-dir',
      dumps,
      '--pool-size',
      '2',
      '--pace-ms',
      '0',
    ]);

    assert.equal(printed.exitCode, undefined);
    assert.deepEqual(lastJson(printed.stdout), {
      ok: true,
      command: 'fetch',
      summary: { total: 2, succeeded: 2, skipped: 0, failed: 0 },
      log: 'memoria.log',
    });
    assert.deepEqual(
      printed.stdout.slice(0, 2).map((line) => JSON.parse(line).outcome),
      ['fetched', 'fetched'],
    );

    const record = JSON.parse(await fs.readFile(path.join(output, '0xaaa.json'), 'utf8'));
    assert.equal(record.user_address, '0xaaa');
    assert.equal(record.total_positions, 42);
    assert.deepEqual(record.input, { rank: 1 });
    const dump = JSON.parse(await fs.readFile(path.join(dumps, '0xbbb.frames.json'), 'utf8'));
    assert.equal(dump.length, 28);
    const index = (await fs.readFile(path.join(output, 'index.jsonl'), 'utf8')).trim().split('\n');
    assert.equal(index.length, 2);

    assert.equal(harness.sessions.length, 1);
    assert.equal(harness.sessions[0].sent.length, 2);
    assert.equal(harness.sessions[0].closes, 1);
    assert.equal(harness.configs[0].headers.Cookie, COOKIES);
    assert.deepEqual(harness.configs[0].subprotocols, ['streamlit', 'test-xsrf']);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('fetch sin cookies falla antes de abrir sesiones', async () => {
  const harness = await createHarness({ json: true, cookies: null });
  const input = path.join(harness.dir, 'users.txt');
  await fs.writeFile(input, '0xaaa\n');

  try {
    const printed = await run(registerFetchCommand, harness, ['fetch', '--input', input]);
    assert.equal(printed.exitCode, 1);
    const failure = lastJson(printed.stderr);
    assert.deepEqual(failure, {
      ok: false,
      command: 'fetch',
      error:
        'Faltan cookies de hashdive.com: ajs_anonymous_id, _streamlit_user, _streamlit_xsrf. Ejecute "hashdive-stream session" o defina HASHDIVE_COOKIES.',
    });
    assert.equal(harness.sessions.length, 0);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('user imprime el registro sin escribirlo con --no-save', async () => {
  const harness = await createHarness({ json: true });
  try {
    const printed = await run(registerUserCommand, harness, ['user', '0xabc', '--no-save']);
    const payload = lastJson(printed.stdout);

    assert.equal(printed.exitCode, undefined);
    assert.ok(typeof payload === 'object' && payload !== null && 'record' in payload);
    const { record } = payload;
    assert.ok(typeof record === 'object' && record !== null);
    assert.deepEqual(
      {
        ok: 'ok' in payload ? payload.ok : undefined,
        address: 'user_address' in record ? record.user_address : undefined,
        positions: 'total_positions' in record ? record.total_positions : undefined,
        complete: 'complete' in record ? record.complete : undefined,
      },
      { ok: true, address: '0xabc', positions: 42, complete: true },
    );
    assert.equal(harness.sessions[0].closes, 1);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('user guarda el registro parcial y sale con código 1', async () => {
  const harness = await createHarness({ session: { frames: toFrames([TOTAL_POSITIONS]) } });
  const output = path.join(harness.dir, 'users');
  try {
    const printed = await run(registerUserCommand, harness, ['user', '0xabc', '--output', output, '--no-dump']);

    assert.equal(printed.exitCode, 1);
    assert.deepEqual(printed.stderr, ['Extracción incompleta: El stream terminó sin la señal de fin.']);
    const stored = JSON.parse(await fs.readFile(path.join(output, '0xabc.json'), 'utf8'));
    assert.equal(stored.complete, false);
    assert.equal(stored.frames_processed, 1);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('replay reconstruye el registro desde un volcado', async () => {
  const harness = await createHarness({ json: true });
  const dump = path.join(harness.dir, '0xfeed.frames.json');
  const output = path.join(harness.dir, 'replayed.json');
  await fs.writeFile(dump, JSON.stringify(profileStream()));

  try {
    const printed = await run(registerReplayCommand, harness, ['replay', dump, '--output', output]);
    const payload = lastJson(printed.stdout);
    assert.ok(typeof payload === 'object' && payload !== null && 'frames' in payload);
    assert.equal(payload.frames, 28);

    const stored = JSON.parse(await fs.readFile(output, 'utf8'));
    assert.equal(stored.user_address, '0xfeed');
    assert.equal(stored.complete, true);
    assert.equal(stored.frames_processed, 28);
    assert.equal(stored.rank_all_time_amount, '$1.1M');
    assert.equal(harness.sessions.length, 0);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('replay rechaza volcados que no son un arreglo de frames', async () => {
  const harness = await createHarness();
  const dump = path.join(harness.dir, 'roto.frames.json');
  await fs.writeFile(dump, '{"frames":[]}');

  try {
    const printed = await run(registerReplayCommand, harness, ['replay', dump]);
    assert.equal(printed.exitCode, 1);
    assert.deepEqual(printed.stderr, [`[replay] El volcado ${dump} debe ser un arreglo de frames decodificados.`]);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('check abre una sesión, hace ping y la cierra', async () => {
  const harness = await createHarness({ json: true });
  try {
    const printed = await run(registerCheckCommand, harness, ['check']);
    assert.equal(printed.exitCode, undefined);
    assert.deepEqual(lastJson(printed.stdout), {
      ok: true,
      command: 'check',
      cookies: ['ajs_anonymous_id', '_streamlit_user', '_streamlit_xsrf'],
      opened: true,
      pong: true,
    });
    assert.equal(harness.sessions[0].closes, 1);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('check sale con código 1 si la sesión no abre', async () => {
  const harness = await createHarness({ session: { openResult: false } });
  try {
    const printed = await run(registerCheckCommand, harness, ['check']);
    assert.equal(printed.exitCode, 1);
    assert.deepEqual(printed.stdout.slice(1), ['Conexión: fallida', 'Ping: sin respuesta']);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('check en dry-run no crea log ni lee el estado de sesión', async () => {
  const harness = await createHarness({ json: true, dryRun: true });
  const storageState = path.join(harness.dir, 'roto.json');
  await fs.writeFile(storageState, 'no es json');

  try {
    const printed = await run(registerCheckCommand, harness, ['check', '--storage-state', storageState]);
    assert.equal(printed.exitCode, undefined);
    assert.deepEqual(lastJson(printed.stdout), {
      ok: true,
      dryRun: true,
      command: 'check',
      url: 'wss://hashdive.com/_stcore/stream',
      storageState,
    });
    assert.deepEqual(harness.loggers, []);
    assert.equal(harness.sessions.length, 0);
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});

test('session en dry-run no abre el navegador', async () => {
  const harness = await createHarness({ json: true, dryRun: true });
  try {
    const printed = await run(registerSessionCommand, harness, ['session', '--timeout', '1000']);
    assert.deepEqual(lastJson(printed.stdout), {
      ok: true,
      dryRun: true,
      command: 'session',
      storageState: path.join(harness.dir, 'state', 'storage', 'hashdive.json'),
      timeoutMs: 1000,
    });
  } finally {
    await fs.rm(harness.dir, { recursive: true, force: true });
  }
});
