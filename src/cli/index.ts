#!/usr/bin/env node
import { pathToFileURL } from 'node:url';
import process from 'node:process';

import { Command, CommanderError } from 'commander';

import { createShutdownRegistry, type ShutdownRegistry } from '../bootstrap/signals.js';
import { attachHelp } from './help.js';
import { registerCheckCommand } from './commands/check.js';
import { registerFetchCommand } from './commands/fetch.js';
import { registerReplayCommand } from './commands/replay.js';
import { registerSessionCommand } from './commands/session.js';
import { registerUserCommand } from './commands/user.js';
import type { CommandContext, GlobalOptions } from './commands/shared.js';

const OUTPUT_STATE: GlobalOptions = { json: false, dryRun: false };

export type ProgramOverrides = Omit<Partial<CommandContext>, 'resolveGlobals'>;

export function buildProgram(overrides: ProgramOverrides = {}): Command {
  const program = new Command('hashdive-stream');
  program
    .option('--json', 'Imprime los resultados en formato JSON')
    .option('--dry-run', 'Muestra las acciones sin ejecutarlas');

  program.showHelpAfterError('(usa --help para más detalles)');
  program.allowExcessArguments(false);

  const shutdown: ShutdownRegistry = overrides.shutdown ?? createShutdownRegistry();

  const context: CommandContext = {
    ...overrides,
    shutdown,
    resolveGlobals: (command: Command) => {
      const root = command.parent ?? command;
      const opts = root.opts<{ json?: boolean; dryRun?: boolean }>();
      const resolved: GlobalOptions = { json: Boolean(opts.json), dryRun: Boolean(opts.dryRun) };
      OUTPUT_STATE.json = resolved.json;
      OUTPUT_STATE.dryRun = resolved.dryRun;
      return resolved;
    },
  };

  registerFetchCommand(program, context);
  registerUserCommand(program, context);
  registerReplayCommand(program, context);
  registerCheckCommand(program, context);
  registerSessionCommand(program, context);

  attachHelp(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const root = actionCommand.parent ?? program;
    const opts = root.opts<{ json?: boolean; dryRun?: boolean }>();
    OUTPUT_STATE.json = Boolean(opts.json);
    OUTPUT_STATE.dryRun = Boolean(opts.dryRun);
    if (!OUTPUT_STATE.dryRun && !overrides.shutdown) {
      shutdown.bind();
    }
  });

  return program;
}

export async function runCli(
  argv: readonly string[] = process.argv.slice(2),
  overrides: ProgramOverrides = {},
): Promise<void> {
  const program = buildProgram(overrides);

  try {
    await program.parseAsync(['node', 'hashdive-stream', ...argv]);
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return;
    }
    if (error instanceof Error) {
      console.error(error.message);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

const isDirectExecution = (() => {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }

  try {
    return pathToFileURL(entry).href === import.meta.url;
  } catch {
    return false;
  }
})();

if (isDirectExecution) {
  await runCli();
}
