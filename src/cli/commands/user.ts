import process from 'node:process';

import type { Command } from 'commander';

import { runExtraction } from '../../extraction/run.js';
import { FileRecordSink, toRecordFile } from '../../io/records.js';
import type { FetchArgs } from '../schema.js';
import { resolveFetchArgs } from './fetch.js';
import { createRuntime } from './runtime.js';
import { printJson, reportFailure, resolveServices, type CommandContext } from './shared.js';

type UserOptions = {
  config?: string;
  output?: string;
  save?: boolean;
  dumpDir?: string;
  dump?: boolean;
  maxFrames?: string;
  frameTimeout?: string;
  totalTimeout?: string;
  template?: string;
  storageState?: string;
  protoDir?: string;
};

export function registerUserCommand(program: Command, context: CommandContext): Command {
  return program
    .command('user')
    .description('Extrae el registro de una sola dirección y lo imprime.')
    .argument('<address>', 'Dirección del usuario.')
    .option('-c, --config <path>', 'Archivo YAML con valores por defecto.')
    .option('-o, --output <dir>', 'Directorio de salida de los registros.')
    .option('--no-save', 'Solo imprime el registro, sin escribirlo en disco.')
    .option('--dump-dir <dir>', 'Directorio de volcado de frames.')
    .option('--no-dump', 'No guarda los frames decodificados.')
    .option('--max-frames <n>', 'Frames máximos de la extracción.')
    .option('--frame-timeout <ms>', 'Espera máxima por frame antes de sondear con ping.')
    .option('--total-timeout <ms>', 'Duración máxima de la extracción.')
    .option('--template <path>', 'Plantilla JSON de la petición.')
    .option('--storage-state <path>', 'Estado de sesión de Playwright con las cookies.')
    .option('--proto-dir <dir>', 'Directorio con BackMsg.proto y ForwardMsg.proto.')
    .action(async function action(this: Command, address: string, options: UserOptions) {
      const globals = context.resolveGlobals(this);
      const target = address.trim();

      let args: FetchArgs;
      try {
        args = await resolveFetchArgs(options, context);
      } catch (error) {
        reportFailure(globals.json, 'user', error);
        return;
      }

      if (globals.dryRun) {
        if (globals.json) {
          printJson({ ok: true, dryRun: true, command: 'user', target, args });
        } else {
          console.log(`[dry-run] hashdive-stream user ${target}`);
        }
        return;
      }

      const logger = resolveServices(context).createLogger('user');
      const unregisterLogger = context.shutdown?.register(() => logger.close());
      try {
        const runtime = await createRuntime(context, logger, { ...args, poolSize: undefined });
        const result = await runExtraction(
          target,
          { ...runtime, logger },
          {
            keepFrames: args.dump,
            limits: {
              maxFrames: args.maxFrames,
              perFrameTimeoutMs: args.frameTimeoutMs,
              totalTimeoutMs: args.totalTimeoutMs,
            },
          },
        );

        const file = toRecordFile(result);
        if (options.save !== false && result.framesProcessed > 0) {
          const sink = new FileRecordSink({ outputDir: args.output, dumpsDir: args.dump ? args.dumpDir : null });
          await sink.write(file, result.error);
          await sink.dumpFrames(target, result.frames);
        }

        if (globals.json) {
          printJson({ ok: result.success, command: 'user', error: result.error, record: file });
        } else {
          printJson(file);
          if (!result.success) {
            console.error(`Extracción incompleta: ${result.error ?? 'sin señal de fin'}`);
          }
        }
        if (!result.success) {
          process.exitCode = 1;
        }
      } catch (error) {
        logger.error('user-failed', { message: error instanceof Error ? error.message : String(error) });
        reportFailure(globals.json, 'user', error);
      } finally {
        unregisterLogger?.();
        await logger.close();
      }
    });
}
