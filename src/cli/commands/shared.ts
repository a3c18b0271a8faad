import process from 'node:process';

import type { Command } from 'commander';

import { LoginClient, type Prompt } from '../../auth/login.js';
import { createTerminalPrompt } from '../../auth/prompt.js';
import { readExportEnv, type ExportEnv } from '../../bootstrap/env.js';
import { createProcessLogger, type ProcessLogger, type ProcessLoggerOptions } from '../../bootstrap/logger.js';
import { STREAM_URL } from '../../config.js';
import { webSocketTransportFactory, type TransportFactory } from '../../stream/transport.js';
import type { CliOptions, NetworkSettings } from '../settings.js';

export type PromptSession = {
  readonly ask: Prompt;
  readonly close: () => void;
};

/** Everything a command touches outside its own process state; tests swap these out. */
export type CommandContext = {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly bindSignals?: boolean;
  readonly createLogger?: (options: ProcessLoggerOptions) => ProcessLogger;
  readonly transportFactory?: (network: NetworkSettings) => TransportFactory;
  readonly loginClient?: () => LoginClient;
  readonly openPrompt?: () => PromptSession;
  readonly stdout?: (line: string) => void;
};

export function resolveEnv(context: CommandContext): ExportEnv {
  return readExportEnv(context.env ?? process.env);
}

export const resolveCwd = (context: CommandContext): string => context.cwd ?? process.cwd();

export const resolveLoggerFactory = (context: CommandContext): ((options: ProcessLoggerOptions) => ProcessLogger) =>
  context.createLogger ?? createProcessLogger;

export function resolveTransportFactory(context: CommandContext, network: NetworkSettings): TransportFactory {
  if (context.transportFactory) {
    return context.transportFactory(network);
  }
  return webSocketTransportFactory(STREAM_URL, { receiveTimeoutMs: network.receiveTimeoutMs });
}

export const resolveLoginClient = (context: CommandContext): LoginClient =>
  context.loginClient ? context.loginClient() : new LoginClient();

export const resolvePrompt = (context: CommandContext): PromptSession =>
  context.openPrompt ? context.openPrompt() : createTerminalPrompt();

export const writeStdout = (context: CommandContext, line: string): void => {
  if (context.stdout) {
    context.stdout(line);
    return;
  }
  // eslint-disable-next-line no-console
  console.log(line);
};

/** Options shared by `sync` and `login`, read from the root program as well as the subcommand. */
export function readCliOptions(command: Command): CliOptions {
  const merged = command.optsWithGlobals<{
    config?: string;
    format?: string;
    out?: string;
    details?: boolean;
    token?: string;
    logDir?: string;
  }>();
  return {
    config: merged.config,
    format: merged.format,
    out: merged.out,
    details: merged.details,
    token: merged.token,
    logDir: merged.logDir,
  };
}
