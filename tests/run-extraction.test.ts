import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';

import { runExtraction, type ExtractionDependencies } from '../src/extraction/run.js';
import { loadTemplate } from '../src/request/template.js';
import { SessionPool } from '../src/ws/pool.js';
import type { StreamingSession } from '../src/ws/session.js';
import { TOTAL_POSITIONS, finished, markdown, profileStream, rank } from './fixtures/frames.js';
import { startServer, sessionFor } from './fixtures/server.js';
import { FakeSession, JsonCodec, binaryFrame, rawFrame, toFrames, type FakeSessionOptions } from './fixtures/sessions.js';

const TEMPLATE_PATH = fileURLToPath(new URL('../templates/analyze-user.json', import.meta.url));

async function setup(options: FakeSessionOptions = {}) {
  const template = await loadTemplate(TEMPLATE_PATH);
  const codec = new JsonCodec();
  const sessions: FakeSession[] = [];
  const deps: ExtractionDependencies = {
    codec,
    template,
    createSession: () => {
      const session = new FakeSession(options);
      sessions.push(session);
      return session;
    },
  };
  return { codec, sessions, deps };
}

test('runExtraction reconstruye el registro y cierra la sesión directa', async () => {
  const { codec, sessions, deps } = await setup({ frames: toFrames(profileStream()) });

  const result = await runExtraction('0xABC', deps);

  assert.equal(result.success, true);
  assert.equal(result.complete, true);
  assert.equal(result.framesProcessed, 28);
  assert.equal(result.record.total_positions, 42);
  assert.deepEqual(result.record.trader_types, ['Whale']);
  assert.equal(result.error, undefined);
  assert.deepEqual(result.frames, []);
  assert.equal(codec.encoded.length, 1);
  assert.deepEqual(codec.encoded[0].rerunScript, {
    queryString: 'user_address=0xABC',
    widgetStates: {},
    pageScriptHash: '',
    pageName: 'Analyze_User',
    contextInfo: {
      timezone: 'Europe/Istanbul',
      timezoneOffset: -180,
      locale: 'en-US',
      url: 'https://hashdive.com/Analyze_User',
      isEmbedded: false,
      colorScheme: 'light',
    },
  });
  assert.equal(sessions.length, 1);
  assert.equal(sessions[0].sent.length, 1);
  assert.equal(sessions[0].closes, 1);
});

test('runExtraction se detiene en la señal terminal', async () => {
  const { deps } = await setup({ frames: toFrames([TOTAL_POSITIONS, finished(), rank(1, '1k')]) });

  const result = await runExtraction('0xabc', deps, { keepFrames: true });

  assert.equal(result.success, true);
  assert.equal(result.framesProcessed, 2);
  assert.equal(result.frames.length, 2);
  assert.equal(result.record.rank_1d_place, null);
});

test('un stream sin señal de fin devuelve un registro parcial', async () => {
  const { deps } = await setup({ frames: toFrames([TOTAL_POSITIONS]) });

  const result = await runExtraction('0xabc', deps);

  assert.equal(result.success, false);
  assert.equal(result.complete, false);
  assert.equal(result.framesProcessed, 1);
  assert.equal(result.record.total_positions, 42);
  assert.equal(result.error, 'El stream terminó sin la señal de fin.');
});

test('maxFrames corta la extracción antes de la señal de fin', async () => {
  const { deps } = await setup({ frames: toFrames(profileStream()) });

  const result = await runExtraction('0xabc', deps, { limits: { maxFrames: 3 } });

  assert.equal(result.success, false);
  assert.equal(result.framesProcessed, 3);
  assert.equal(result.record.trader_type_descriptions.Whale, 'Large positions across many markets.');
});

test('los frames que no se decodifican se omiten', async () => {
  const text = '{"scriptFinished":"FINISHED_SUCCESSFULLY"}';
  const { deps } = await setup({
    frames: [
      rawFrame('no es json'),
      binaryFrame(TOTAL_POSITIONS),
      { payload: text, kind: 'text', size: text.length, receivedAt: 0 },
    ],
  });

  const result = await runExtraction('0xabc', deps);

  assert.equal(result.success, true);
  assert.equal(result.framesProcessed, 2);
  assert.equal(result.tagCounts.totalPositions, 1);
  assert.equal(result.tagCounts.streamComplete, 1);
});

test('un fallo al codificar no abre ninguna sesión', async () => {
  const { codec, sessions, deps } = await setup();
  codec.failEncode = true;

  const result = await runExtraction('0xabc', deps);

  assert.equal(result.success, false);
  assert.equal(result.framesProcessed, 0);
  assert.equal(result.error, 'No se pudo codificar la petición: Petición inválida para BackMsg: prueba');
  assert.equal(sessions.length, 0);
});

test('errores de apertura y de envío se reflejan en el resultado', async () => {
  const closed = await setup({ openResult: false });
  const notOpened = await runExtraction('0xabc', closed.deps);
  assert.equal(notOpened.error, 'No se pudo abrir una sesión.');
  assert.equal(closed.sessions[0].closes, 1);

  const silent = await setup({ sendResult: false });
  const notSent = await runExtraction('0xabc', silent.deps);
  assert.equal(notSent.error, 'No se pudo enviar la petición.');
  assert.equal(notSent.success, false);
  assert.equal(silent.sessions[0].closes, 1);
});

test('un error del transporte conserva lo ya extraído', async () => {
  const { sessions, deps } = await setup({
    frames: toFrames([TOTAL_POSITIONS]),
    streamError: new Error('socket reiniciado'),
  });

  const result = await runExtraction('0xabc', deps);

  assert.equal(result.success, false);
  assert.equal(result.error, 'socket reiniciado');
  assert.equal(result.record.total_positions, 42);
  assert.equal(sessions[0].closes, 1);
});

test('con pool la sesión se devuelve en lugar de cerrarse', async () => {
  const { sessions, deps } = await setup({ frames: toFrames([TOTAL_POSITIONS, finished()]) });
  const pool = new SessionPool<StreamingSession>({ createSession: deps.createSession, maxSessions: 1 });

  const first = await runExtraction('0xabc', { ...deps, pool });
  const second = await runExtraction('0xdef', { ...deps, pool });

  assert.equal(first.success, true);
  assert.equal(second.success, true);
  assert.equal(sessions.length, 1);
  assert.equal(sessions[0].closes, 0);
  assert.equal(sessions[0].sent.length, 2);
  assert.equal(sessions[0].discards, 2);
  assert.deepEqual(pool.stats(), { total: 1, inUse: 0, idle: 1 });
  await pool.closeAll();
});

test('con pool una extracción incompleta retira la sesión en lugar de devolverla', async () => {
  const { sessions, deps } = await setup({ frames: toFrames([TOTAL_POSITIONS]) });
  const pool = new SessionPool<StreamingSession>({ createSession: deps.createSession, maxSessions: 1 });

  const partial = await runExtraction('0xabc', { ...deps, pool });
  assert.equal(partial.success, false);
  assert.equal(sessions[0].closes, 1);
  assert.deepEqual(pool.stats(), { total: 0, inUse: 0, idle: 0 });

  await runExtraction('0xdef', { ...deps, pool });
  assert.equal(sessions.length, 2);
  assert.equal(sessions[1].sent.length, 1);
  await pool.closeAll();
});

test('con el pool agotado se usa una sesión directa', async () => {
  const { sessions, deps } = await setup({ frames: toFrames([finished()]) });
  const pool = new SessionPool<StreamingSession>({ createSession: deps.createSession, maxSessions: 1 });
  const held = await pool.lease();
  assert.ok(held);

  const result = await runExtraction('0xabc', { ...deps, pool });

  assert.equal(result.success, true);
  assert.equal(sessions.length, 2);
  assert.equal(sessions[1].closes, 1);
  assert.equal(sessions[0].closes, 0);
  await pool.closeAll();
});

const positions = (count: number) => markdown(`<div>Total Positions</div><div>${count}</div>`);

/** Responde cada petición con un stream propio de la dirección pedida. */
function profileServer(positionsFor: Record<string, number>, trailing = false) {
  let connections = 0;
  const server = startServer((socket) => {
    connections += 1;
    socket.on('message', (data) => {
      const address = /user_address=(0x[0-9a-f]+)/.exec(data.toString())?.[1] ?? '';
      const count = positionsFor[address] ?? 0;
      const frames = [{ newSession: { scriptRunId: address } }, positions(count), finished()];
      if (trailing) {
        frames.push(positions(count));
      }
      for (const frame of frames) {
        socket.send(Buffer.from(JSON.stringify(frame)), { binary: true });
      }
    });
  });
  return { server, connections: () => connections };
}

test('una extracción cortada no deja sus frames a la siguiente sesión del pool', async () => {
  const { deps } = await setup();
  const { server: starting, connections } = profileServer({ '0xaaa': 111, '0xbbb': 222 });
  const server = await starting;
  const pool = new SessionPool<StreamingSession>({ createSession: () => sessionFor(server.url), maxSessions: 1 });
  const pooled = { ...deps, pool, createSession: () => sessionFor(server.url) };

  try {
    const first = await runExtraction('0xaaa', pooled, { limits: { maxFrames: 1, totalTimeoutMs: 2_000 } });
    const second = await runExtraction('0xbbb', pooled, { limits: { totalTimeoutMs: 2_000 } });

    assert.equal(first.success, false);
    assert.equal(first.record.total_positions, null);
    assert.equal(second.success, true);
    assert.equal(second.framesProcessed, 3);
    assert.equal(second.record.total_positions, 222);
    assert.equal(connections(), 2);
  } finally {
    await pool.closeAll();
    await server.stop();
  }
});

test('los frames que llegan tras la señal de fin se descartan antes de reutilizar la sesión', async () => {
  const { deps } = await setup();
  const { server: starting, connections } = profileServer({ '0xaaa': 111, '0xbbb': 222 }, true);
  const server = await starting;
  const pool = new SessionPool<StreamingSession>({ createSession: () => sessionFor(server.url), maxSessions: 1 });
  const pooled = { ...deps, pool, createSession: () => sessionFor(server.url) };

  try {
    const first = await runExtraction('0xaaa', pooled, { limits: { totalTimeoutMs: 2_000 } });
    await delay(100);
    const second = await runExtraction('0xbbb', pooled, { limits: { totalTimeoutMs: 2_000 } });

    assert.equal(first.success, true);
    assert.equal(first.record.total_positions, 111);
    assert.equal(second.success, true);
    assert.equal(second.framesProcessed, 3);
    assert.equal(second.record.total_positions, 222);
    assert.equal(connections(), 1);
  } finally {
    await pool.closeAll();
    await server.stop();
  }
});
