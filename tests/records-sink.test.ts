import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';

import { DateTime } from 'luxon';

import type { ExtractionResult } from '../src/extraction/run.js';
import { FileRecordSink, INDEX_FILENAME, recordOf, toRecordFile } from '../src/io/records.js';
import { emptyRecord, mergeRecord } from '../src/parser/record.js';

const FETCHED_AT = DateTime.fromISO('2025-03-01T10:00:00.000Z', { zone: 'utc' });

function result(target: string, overrides: Partial<ExtractionResult> = {}): ExtractionResult {
  return {
    target,
    record: mergeRecord(emptyRecord(), { total_positions: 7, trader_type: 'Whale' }),
    success: true,
    complete: true,
    framesProcessed: 12,
    frames: [],
    tagCounts: { totalPositions: 1, typeLabel: 1 },
    durationMs: 40,
    ...overrides,
  };
}

test('toRecordFile antepone la dirección y añade metadatos de la extracción', () => {
  const file = toRecordFile(result('0xabc'), { rank: 3 }, FETCHED_AT);

  assert.equal(Object.keys(file)[0], 'user_address');
  assert.equal(file.user_address, '0xabc');
  assert.equal(file.fetched_at, '2025-03-01T10:00:00.000Z');
  assert.equal(file.frames_processed, 12);
  assert.deepEqual(file.input, { rank: 3 });
  assert.deepEqual(file.tag_counts, { totalPositions: 1, typeLabel: 1 });
  assert.deepEqual(recordOf(file), result('0xabc').record);
});

test('FileRecordSink escribe el registro, el índice y el volcado', async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'hashdive-sink-'));
  const outputDir = path.join(dir, 'users');
  const dumpsDir = path.join(dir, 'messages');
  const sink = new FileRecordSink({ outputDir, dumpsDir });

  try {
    assert.equal(await sink.exists('0xabc'), false);

    const filePath = await sink.write(toRecordFile(result('0xabc'), {}, FETCHED_AT));
    assert.equal(filePath, path.join(outputDir, '0xabc.json'));
    assert.equal(await sink.exists('0xabc'), true);

    const stored: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    assert.deepEqual(stored, toRecordFile(result('0xabc'), {}, FETCHED_AT));

    await sink.write(
      toRecordFile(result('0xdef', { success: false, complete: false, framesProcessed: 3 }), {}, FETCHED_AT),
      'El stream terminó sin la señal de fin.',
    );
    await sink.write(toRecordFile(result('0xabc', { framesProcessed: 20 }), {}, FETCHED_AT));

    const index = (await readFile(path.join(outputDir, INDEX_FILENAME), 'utf8'))
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line));
    assert.deepEqual(index, [
      {
        user_address: '0xabc',
        fetched_at: '2025-03-01T10:00:00.000Z',
        complete: true,
        frames_processed: 20,
        filled_fields: 2,
        file: '0xabc.json',
      },
      {
        user_address: '0xdef',
        fetched_at: '2025-03-01T10:00:00.000Z',
        complete: false,
        frames_processed: 3,
        filled_fields: 2,
        file: '0xdef.json',
        error: 'El stream terminó sin la señal de fin.',
      },
    ]);

    const dumpPath = await sink.dumpFrames('0xabc', [{ scriptFinished: 'FINISHED_SUCCESSFULLY' }]);
    assert.equal(dumpPath, path.join(dumpsDir, '0xabc.frames.json'));
    assert.deepEqual(JSON.parse(await readFile(path.join(dumpsDir, '0xabc.frames.json'), 'utf8')), [
      { scriptFinished: 'FINISHED_SUCCESSFULLY' },
    ]);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('sin directorio de volcado dumpFrames no escribe nada', async () => {
  const sink = new FileRecordSink({ outputDir: path.join(os.tmpdir(), 'hashdive-sin-volcado') });
  assert.equal(await sink.dumpFrames('0xabc', []), null);
  assert.equal(sink.recordPath('0x abc/../x'), path.join(os.tmpdir(), 'hashdive-sin-volcado', '0x-abc-..-x.json'));
});
