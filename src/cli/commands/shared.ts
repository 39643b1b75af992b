import process from 'node:process';

import type { Command } from 'commander';

import { ENV, type Environment } from '../../bootstrap/env.js';
import { createProcessLogger, type ProcessLogger } from '../../bootstrap/logger.js';
import type { ShutdownRegistry } from '../../bootstrap/signals.js';
import { ProtobufFrameCodec, type FrameCodec } from '../../codec/frame-codec.js';
import { HashdiveSession, type StreamingSession } from '../../ws/session.js';
import type { SessionConfig } from '../../ws/session-config.js';

export type GlobalOptions = { json: boolean; dryRun: boolean };

/** Puntos de construcción que los tests sustituyen por dobles en proceso. */
export type CommandServices = {
  readonly createLogger: (name: string) => ProcessLogger;
  readonly loadCodec: (protoDir: string) => FrameCodec;
  readonly createSession: (config: SessionConfig, logger: ProcessLogger) => StreamingSession;
};

export type CommandContext = {
  readonly resolveGlobals: (command: Command) => GlobalOptions;
  readonly env?: NodeJS.ProcessEnv;
  readonly environment?: Environment;
  readonly shutdown?: ShutdownRegistry;
  readonly services?: Partial<CommandServices>;
};

export function resolveEnv(context: CommandContext): NodeJS.ProcessEnv {
  return context.env ?? process.env;
}

export function resolveEnvironment(context: CommandContext): Environment {
  return context.environment ?? ENV;
}

export function resolveServices(context: CommandContext): CommandServices {
  const environment = resolveEnvironment(context);
  return {
    createLogger:
      context.services?.createLogger ??
      ((name) => createProcessLogger({ name, directory: environment.logDir })),
    loadCodec: context.services?.loadCodec ?? ((protoDir) => ProtobufFrameCodec.fromDirectory(protoDir)),
    createSession:
      context.services?.createSession ?? ((config, logger) => new HashdiveSession(config, { logger })),
  };
}

export function printJson(value: unknown, stream: 'stdout' | 'stderr' = 'stdout'): void {
  const text = JSON.stringify(value, null, 2);
  if (stream === 'stderr') {
    console.error(text);
    return;
  }
  console.log(text);
}

/** Informa un error de preparación y marca la salida con código 1. */
export function reportFailure(json: boolean, command: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    printJson({ ok: false, command, error: message }, 'stderr');
  } else {
    console.error(`[${command}] ${message}`);
  }
  process.exitCode = 1;
}
