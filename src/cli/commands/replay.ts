import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { z } from 'zod';

import type { DecodedFrame } from '../../codec/frame-codec.js';
import { SetupError } from '../../errors.js';
import { toRecordFile } from '../../io/records.js';
import { writeJsonAtomic } from '../../io/writeFileAtomic.js';
import { parseFrames } from '../../parser/pipeline.js';
import { printJson, reportFailure, type CommandContext } from './shared.js';

const DumpSchema = z.array(z.record(z.unknown()));

const DUMP_SUFFIX = '.frames.json';

type ReplayOptions = {
  address?: string;
  output?: string;
};

export async function readFrameDump(filePath: string): Promise<DecodedFrame[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new SetupError(`No se pudo leer el volcado ${filePath}.`, { cause: error });
  }
  const parsed = DumpSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SetupError(`El volcado ${filePath} debe ser un arreglo de frames decodificados.`);
  }
  return parsed.data;
}

export function addressFromDump(filePath: string): string {
  const base = path.basename(filePath);
  return base.endsWith(DUMP_SUFFIX) ? base.slice(0, -DUMP_SUFFIX.length) : path.parse(base).name;
}

export function registerReplayCommand(program: Command, context: CommandContext): Command {
  return program
    .command('replay')
    .description('Reconstruye un registro a partir de un volcado de frames, sin conexión.')
    .argument('<dump>', 'Archivo <dirección>.frames.json generado por fetch o user.')
    .option('--address <address>', 'Dirección a usar en el registro (por defecto, la del nombre del archivo).')
    .option('-o, --output <file>', 'Escribe el registro en este archivo además de imprimirlo.')
    .action(async function action(this: Command, dump: string, options: ReplayOptions) {
      const globals = context.resolveGlobals(this);

      try {
        const frames = await readFrameDump(dump);
        const state = parseFrames(frames);
        const target = options.address?.trim() || addressFromDump(dump);
        const file = toRecordFile({
          target,
          record: state.record,
          success: state.complete,
          complete: state.complete,
          framesProcessed: state.framesProcessed,
          frames: [],
          tagCounts: state.tagCounts,
          durationMs: 0,
        });

        if (options.output && !globals.dryRun) {
          await writeJsonAtomic(options.output, file);
        }

        if (globals.json) {
          printJson({ ok: true, command: 'replay', frames: frames.length, record: file });
        } else {
          printJson(file);
        }
      } catch (error) {
        reportFailure(globals.json, 'replay', error);
      }
    });
}
