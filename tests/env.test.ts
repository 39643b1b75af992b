import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';

import { coerceBoolean, readEnvironment } from '../src/bootstrap/env.js';

const BASE_DIR = path.join(path.sep, 'srv', 'hashdive');

test('readEnvironment aplica valores por defecto relativos al directorio base', () => {
  const environment = readEnvironment({}, BASE_DIR);

  assert.deepEqual(environment, {
    nodeEnv: 'development',
    timezone: 'UTC',
    wsUrl: 'wss://hashdive.com/_stcore/stream',
    origin: 'https://hashdive.com',
    userAgent: environment.userAgent,
    protoDir: path.join(BASE_DIR, 'proto', 'streamlit'),
    templatePath: path.join(BASE_DIR, 'templates', 'analyze-user.json'),
    storageStatePath: path.join(BASE_DIR, 'state', 'storage', 'hashdive.json'),
    cookieOverride: undefined,
    logDir: path.join(BASE_DIR, 'logs'),
    headless: false,
    browserChannel: 'chrome',
  });
  assert.match(environment.userAgent, /^Mozilla\/5\.0 /);
});

test('readEnvironment respeta las variables definidas', () => {
  const environment = readEnvironment(
    {
      NODE_ENV: 'test',
      HASHDIVE_WS_URL: 'ws://127.0.0.1:8501/_stcore/stream',
      HASHDIVE_PROTO_DIR: 'vendor/proto',
      STORAGE_STATE_PATH: '/tmp/state.json',
      HASHDIVE_COOKIES: '  _streamlit_xsrf=test-xsrf  ',
      HEADLESS: 'yes',
      BROWSER_CHANNEL: 'msedge',
    },
    BASE_DIR,
  );

  assert.equal(environment.nodeEnv, 'test');
  assert.equal(environment.wsUrl, 'ws://127.0.0.1:8501/_stcore/stream');
  assert.equal(environment.protoDir, path.join(BASE_DIR, 'vendor', 'proto'));
  assert.equal(environment.storageStatePath, path.resolve('/tmp/state.json'));
  assert.equal(environment.cookieOverride, '_streamlit_xsrf=test-xsrf');
  assert.equal(environment.headless, true);
  assert.equal(environment.browserChannel, 'msedge');
});

test('readEnvironment rechaza URLs inválidas', () => {
  assert.throws(() => readEnvironment({ HASHDIVE_WS_URL: 'no-es-url' }, BASE_DIR));
});

test('coerceBoolean usa el valor por defecto ante literales desconocidos', () => {
  assert.equal(coerceBoolean(undefined, true), true);
  assert.equal(coerceBoolean('off', true), false);
  assert.equal(coerceBoolean('quizá', false), false);
});
