#!/usr/bin/env node
import { pathToFileURL } from 'node:url';
import process from 'node:process';

import { Command, CommanderError } from 'commander';

import { loadDotenvFiles } from '../bootstrap/env.js';
import { attachHelp } from './help.js';
import { registerLoginCommand } from './commands/login.js';
import { registerSyncCommand } from './commands/sync.js';
import type { CommandContext } from './commands/shared.js';

export function buildProgram(context: CommandContext = {}): Command {
  const program = new Command('tr-export');
  program
    .option('-c, --config <path>', 'Archivo de configuración YAML')
    .option('--log-dir <dir>', 'Carpeta de los logs JSONL');

  program.showHelpAfterError('(usa --help para más detalles)');
  program.exitOverride();

  registerSyncCommand(program, context);
  registerLoginCommand(program, context);

  attachHelp(program);

  return program;
}

export async function runCli(
  argv: readonly string[] = process.argv.slice(2),
  context: CommandContext = {},
): Promise<void> {
  loadDotenvFiles(context.cwd);
  const program = buildProgram(context);

  try {
    await program.parseAsync(['node', 'tr-export', ...argv]);
  } catch (error) {
    // commander already printed its own usage errors
    if (error instanceof CommanderError) {
      if (error.exitCode !== 0) {
        process.exitCode = error.exitCode;
      }
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
